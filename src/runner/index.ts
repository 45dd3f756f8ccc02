export type {
	JudgmentStore,
	RecordOrigin,
	WriteMode,
} from "./judgment-store";
export { FileJudgmentStore, MemoryJudgmentStore } from "./judgment-store";
export type {
	CliConfig,
	JudgeFn,
	RecordSource,
	RunDependencies,
	RunOutcome,
	RunPaths,
	RunStatus,
} from "./orchestrator";
export {
	formatDuration,
	formatRate,
	judgeRecord,
	ProgressLogger,
	parseCliArgs,
	resolveRunPaths,
	resultDirName,
	runEvaluation,
} from "./orchestrator";
export type {
	NamingDefaults,
	PipelineDefinition,
	PipelineName,
} from "./pipelines";
export {
	ANSWERABILITY_PIPELINE,
	FACT_ERROR_PIPELINE,
	getPipeline,
	isAnswerabilityRejection,
	isFactErrorRejection,
	isPipelineName,
	PIPELINE_NAMES,
	shouldReuse,
} from "./pipelines";
export {
	computeScores,
	countJudgeFailures,
	formatScoreSummary,
	isFullySupported,
	writeScores,
} from "./scorer";
