import { rename, writeFile } from "node:fs/promises";
import type { JudgedRecord, ScoreSummary } from "@/types/record";
import type { PipelineDefinition } from "./pipelines";

/**
 * A record's passages all support the answer: at least one relevant passage
 * and no irrelevant ones.
 */
export function isFullySupported(label: readonly number[] | undefined): boolean {
	if (!Array.isArray(label)) return false;
	return label.includes(1) && !label.includes(0);
}

function ratio(numerator: number, denominator: number): number {
	return denominator > 0 ? numerator / denominator : 0;
}

/**
 * Computes the aggregate scores for a run. Safe on an empty record list:
 * every rate is 0.
 */
export function computeScores(
	records: readonly JudgedRecord[],
	pipeline: PipelineDefinition,
	noiseRate: number,
): ScoreSummary {
	let rejecttt = 0;
	let tt = 0;
	let correctTt = 0;

	for (const record of records) {
		const supported = isFullySupported(record.label);
		if (pipeline.isRejection(record.evaluation ?? "")) {
			rejecttt++;
			if (supported) correctTt++;
		}
		if (supported) tt++;
	}

	const nums = records.length;

	if (!pipeline.reportsCorrectRejections) {
		return {
			reject_rate: ratio(rejecttt, nums),
			all_rate: ratio(tt, nums),
			tt,
			rejecttt,
			nums,
		};
	}

	return {
		reject_rate: ratio(rejecttt, nums),
		all_rate: ratio(tt, nums),
		correct_rate: ratio(correctTt, rejecttt),
		tt,
		rejecttt,
		correct_tt: correctTt,
		nums,
		noise_rate: noiseRate,
	};
}

/**
 * Counts records whose stored judgment is a failed judge call.
 */
export function countJudgeFailures(records: readonly JudgedRecord[]): number {
	return records.filter((r) => r.judge_error !== undefined).length;
}

/**
 * Formats the console summary printed at the end of a run.
 */
export function formatScoreSummary(summary: ScoreSummary): string {
	const lines = [
		`Total relevant items (tt): ${summary.tt}`,
		`Total results: ${summary.nums}`,
		`Ratio of relevant items: ${summary.all_rate.toFixed(4)}`,
		`Rejections (rejecttt): ${summary.rejecttt} | reject_rate: ${summary.reject_rate.toFixed(4)}`,
	];
	if (summary.correct_tt !== undefined && summary.correct_rate !== undefined) {
		lines.push(
			`Correct rejections (correct_tt): ${summary.correct_tt} | correct_rate: ${summary.correct_rate.toFixed(4)}`,
		);
	}
	return lines.join("\n");
}

/**
 * Writes the score summary as pretty-printed JSON.
 * Uses atomic write (temp file, then rename).
 */
export async function writeScores(
	filePath: string,
	summary: ScoreSummary,
): Promise<void> {
	const tempPath = `${filePath}.tmp`;
	await writeFile(tempPath, JSON.stringify(summary, null, 4), "utf-8");
	await rename(tempPath, filePath);
}
