import { buildAnswerabilityPrompt, buildFactErrorPrompt } from "@/judge";
import type { JudgedRecord, PredictionRecord } from "@/types/record";
import type { WriteMode } from "./judgment-store";

// --- Types ---

export type PipelineName = "fact-error" | "answerability";

export const PIPELINE_NAMES: readonly PipelineName[] = [
	"fact-error",
	"answerability",
];

/** Run parameters that only feed file naming. */
export interface NamingDefaults {
	temp: number;
	noiseRate: number;
	correctRate: number;
}

/**
 * Everything that differs between the two evaluation pipelines. The runner
 * and scorer are shared and read their behavior from here.
 */
export interface PipelineDefinition {
	name: PipelineName;
	/** Human-readable label for logs */
	label: string;
	buildPrompt(record: PredictionRecord): string;
	/** Temperature forwarded to the judge request, if any */
	judgeTemperature?: number;
	/** Whether a cached judgment may stand in for judging `current` again */
	canReuse(cached: JudgedRecord, current: PredictionRecord): boolean;
	/** Whether the judge's text counts toward `rejecttt` */
	isRejection(evaluation: string): boolean;
	/** Report `correct_tt`, `correct_rate` and `noise_rate` in the summary */
	reportsCorrectRejections: boolean;
	writeMode: WriteMode;
	defaults: NamingDefaults;
	/** Returns a reason when the record cannot be judged, otherwise null */
	skipReason(record: PredictionRecord): string | null;
}

// --- Fact-error pipeline ---

/**
 * The demonstrations in the fact-error prompt open every positive verdict
 * with "Yes", so only a leading "Yes" counts; a "Yes" later in the text does
 * not.
 */
export function isFactErrorRejection(evaluation: string): boolean {
	return (
		evaluation.includes("has identified") || /^\s*Yes\b/.test(evaluation)
	);
}

export const FACT_ERROR_PIPELINE: PipelineDefinition = {
	name: "fact-error",
	label: "Fact-error detection",
	buildPrompt: (record) => buildFactErrorPrompt(record.prediction ?? ""),
	judgeTemperature: 0.7,
	canReuse: () => true,
	isRejection: isFactErrorRejection,
	reportsCorrectRejections: true,
	writeMode: "truncate",
	defaults: { temp: 0.2, noiseRate: 0.6, correctRate: 0.0 },
	skipReason: () => null,
};

// --- Answerability pipeline ---

export function isAnswerabilityRejection(evaluation: string): boolean {
	return evaluation.includes("not addressed");
}

export const ANSWERABILITY_PIPELINE: PipelineDefinition = {
	name: "answerability",
	label: "Answerability",
	buildPrompt: (record) =>
		buildAnswerabilityPrompt(record.query ?? "", record.prediction ?? ""),
	canReuse: (cached, current) =>
		cached.query === current.query &&
		cached.prediction === current.prediction &&
		typeof cached.evaluation === "string" &&
		cached.evaluation !== "",
	isRejection: isAnswerabilityRejection,
	reportsCorrectRejections: false,
	writeMode: "append",
	defaults: { temp: 0.7, noiseRate: 1.0, correctRate: 0.0 },
	skipReason: (record) =>
		!record.query || !record.prediction
			? "missing 'query' or 'prediction'"
			: null,
};

const PIPELINES: Record<PipelineName, PipelineDefinition> = {
	"fact-error": FACT_ERROR_PIPELINE,
	answerability: ANSWERABILITY_PIPELINE,
};

export function getPipeline(name: PipelineName): PipelineDefinition {
	return PIPELINES[name];
}

export function isPipelineName(value: string): value is PipelineName {
	return PIPELINE_NAMES.some((name) => name === value);
}

/**
 * Applies the pipeline's reuse policy, with the option of treating cached
 * judge failures as misses so they are judged again.
 */
export function shouldReuse(
	pipeline: PipelineDefinition,
	cached: JudgedRecord | undefined,
	current: PredictionRecord,
	retryFailed: boolean,
): cached is JudgedRecord {
	if (!cached) return false;
	if (retryFailed && cached.judge_error) return false;
	return pipeline.canReuse(cached, current);
}
