export type { JudgeCallResult, JudgeClientConfig } from "./chat-client";
export {
	callJudge,
	classifyError,
	DEFAULT_JUDGE_MODEL,
	DEFAULT_JUDGE_URL,
	describeJudgeError,
	toBaseURL,
} from "./chat-client";
export { buildAnswerabilityPrompt, buildFactErrorPrompt } from "./prompt-template";
