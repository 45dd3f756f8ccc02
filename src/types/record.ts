import { z } from "zod";

// --- Dataset ---

export const DatasetSchema = z.enum([
	"en",
	"zh",
	"en_int",
	"zh_int",
	"en_fact",
	"zh_fact",
]);

// --- Prediction Record Schema ---

/**
 * One line of the prediction file produced by the generation step.
 * Unknown fields are kept so they survive into the judged output.
 */
export const PredictionRecordSchema = z
	.object({
		id: z.union([z.string(), z.number()]),
		query: z.string().optional(),
		prediction: z.string().optional(),
		label: z.array(z.number()).optional(),
	})
	.passthrough();

// --- Judge Error Schema ---

export const JudgeErrorKindSchema = z.enum([
	"http",
	"connection",
	"timeout",
	"request",
	"invalid-json",
	"unexpected-response",
]);

export const JudgeErrorSchema = z.object({
	kind: JudgeErrorKindSchema,
	message: z.string(),
	status: z.number().optional(),
});

// --- Judged Record Schema ---

/**
 * A prediction record plus the judge's verdict text. `evaluation` is optional
 * on read so output lines written by older runs without it still load.
 */
export const JudgedRecordSchema = PredictionRecordSchema.extend({
	evaluation: z.string().optional(),
	judge_error: JudgeErrorSchema.optional(),
}).passthrough();

// --- Score Summary ---

/**
 * Aggregate scores written to the result file. Key order matters for the
 * serialized file and follows the field order below.
 */
export interface ScoreSummary {
	reject_rate: number;
	all_rate: number;
	/** Fact-error pipeline only */
	correct_rate?: number;
	tt: number;
	rejecttt: number;
	/** Fact-error pipeline only */
	correct_tt?: number;
	nums: number;
	/** Fact-error pipeline only */
	noise_rate?: number;
}

// --- Inferred TypeScript types ---

export type Dataset = z.infer<typeof DatasetSchema>;
export type PredictionRecord = z.infer<typeof PredictionRecordSchema>;
export type JudgeErrorKind = z.infer<typeof JudgeErrorKindSchema>;
export type JudgeError = z.infer<typeof JudgeErrorSchema>;
export type JudgedRecord = z.infer<typeof JudgedRecordSchema>;

/**
 * Key used by the resume cache. Prediction files carry numeric ids as often as
 * string ones, and both must hit the same cache entry.
 */
export function recordKey(record: Pick<PredictionRecord, "id">): string {
	return String(record.id);
}
