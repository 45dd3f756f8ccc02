import OpenAI, {
	APIConnectionError,
	APIConnectionTimeoutError,
	APIError,
} from "openai";
import { z } from "zod";
import type { JudgeError } from "@/types/record";

/** Configuration for the chat-completions judge */
export interface JudgeClientConfig {
	/** Bearer credential sent with every request. */
	apiKey: string;
	/** Full chat-completions URL, e.g. https://api.groq.com/openai/v1/chat/completions */
	url: string;
	/** Judge model ID. Defaults to 'llama-3.3-70b-versatile'. */
	model?: string;
	/** Sampling temperature. Omitted from the request when undefined. */
	temperature?: number;
}

/** Result of a single judge call */
export type JudgeCallResult =
	| { success: true; content: string }
	| { success: false; error: JudgeError };

export const DEFAULT_JUDGE_MODEL = "llama-3.3-70b-versatile";
export const DEFAULT_JUDGE_URL =
	"https://api.groq.com/openai/v1/chat/completions";

const ChatCompletionShape = z.object({
	choices: z
		.array(
			z.object({
				message: z.object({
					content: z.string(),
				}),
			}),
		)
		.nonempty(),
});

/**
 * The SDK appends `/chat/completions` itself, so a full endpoint URL is
 * trimmed back to its base.
 */
export function toBaseURL(url: string): string {
	return url.replace(/\/chat\/completions\/?$/, "");
}

/**
 * Creates a client for a single judge call. Retries are disabled: one
 * request per record, failures are reported to the caller.
 */
function createClient(config: JudgeClientConfig): OpenAI {
	return new OpenAI({
		baseURL: toBaseURL(config.url),
		apiKey: config.apiKey,
		maxRetries: 0,
	});
}

/**
 * Sends the prompt as a single user message and returns the content of the
 * first choice. Never throws: transport, status and body problems come back
 * as a failed result with the error kind.
 */
export async function callJudge(
	prompt: string,
	config: JudgeClientConfig,
): Promise<JudgeCallResult> {
	const model = config.model || DEFAULT_JUDGE_MODEL;

	let body: unknown;
	try {
		const client = createClient(config);
		body = await client.chat.completions.create({
			model,
			messages: [
				{
					role: "user",
					content: prompt,
				},
			],
			temperature: config.temperature,
		});
	} catch (error) {
		return { success: false, error: classifyError(error) };
	}

	// Non-JSON bodies come back from the SDK as raw text
	if (typeof body === "string") {
		return {
			success: false,
			error: {
				kind: "invalid-json",
				message: `Response body is not JSON: ${body.slice(0, 200)}`,
			},
		};
	}

	const parsed = ChatCompletionShape.safeParse(body);
	if (!parsed.success) {
		return {
			success: false,
			error: {
				kind: "unexpected-response",
				message: `Unexpected API response: ${JSON.stringify(body)}`,
			},
		};
	}

	return { success: true, content: parsed.data.choices[0].message.content };
}

/**
 * Maps a thrown SDK or runtime error to a judge error kind.
 * The timeout check must precede the connection check: the timeout error is
 * a subclass of the connection error.
 */
export function classifyError(error: unknown): JudgeError {
	if (error instanceof APIConnectionTimeoutError) {
		return { kind: "timeout", message: error.message };
	}
	if (error instanceof APIConnectionError) {
		const cause = error.cause instanceof Error ? ` (${error.cause.message})` : "";
		return { kind: "connection", message: `${error.message}${cause}` };
	}
	if (error instanceof APIError) {
		return error.status !== undefined
			? { kind: "http", message: error.message, status: error.status }
			: { kind: "request", message: error.message };
	}
	if (error instanceof SyntaxError) {
		return { kind: "invalid-json", message: error.message };
	}
	const message = error instanceof Error ? error.message : String(error);
	return { kind: "request", message };
}

const ERROR_LABELS: Record<JudgeError["kind"], string> = {
	http: "HTTP Error",
	connection: "Connection Error",
	timeout: "Timeout Error",
	request: "Request Exception",
	"invalid-json": "Invalid JSON response",
	"unexpected-response": "Unexpected API response",
};

/**
 * Renders the judge error as the `Error: ...` text stored in a record's
 * `evaluation` field.
 */
export function describeJudgeError(error: JudgeError): string {
	return `Error: ${ERROR_LABELS[error.kind]} - ${error.message}`;
}
