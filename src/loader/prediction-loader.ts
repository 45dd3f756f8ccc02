import { readFile } from "node:fs/promises";
import type { z } from "zod";
import { type PredictionRecord, PredictionRecordSchema } from "@/types/record";

export interface LineError {
	/** 1-based line number in the source file */
	line: number;
	/** The offending line, trimmed */
	text: string;
	error: string;
}

export interface JsonLinesResult<T> {
	items: T[];
	errors: LineError[];
}

export interface PredictionLoadResult {
	records: PredictionRecord[];
	errors: LineError[];
}

/**
 * Parses newline-delimited JSON, validating each line against the schema.
 * Blank lines are ignored; lines that fail to parse or validate are collected
 * as errors and left out of the items.
 */
export function parseJsonLines<S extends z.ZodTypeAny>(
	content: string,
	schema: S,
): JsonLinesResult<z.infer<S>> {
	const items: z.infer<S>[] = [];
	const errors: LineError[] = [];

	const lines = content.split(/\r?\n/);
	for (let i = 0; i < lines.length; i++) {
		const text = (lines[i] ?? "").trim();
		if (text === "") continue;

		let json: unknown;
		try {
			json = JSON.parse(text);
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			errors.push({ line: i + 1, text, error: `Invalid JSON: ${message}` });
			continue;
		}

		const result = schema.safeParse(json);
		if (!result.success) {
			const issueMessages = result.error.issues
				.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
				.join("; ");
			errors.push({
				line: i + 1,
				text,
				error: `Validation failed: ${issueMessages}`,
			});
			continue;
		}

		items.push(result.data);
	}

	return { items, errors };
}

/**
 * Loads the prediction file for a run. Read errors (including a missing
 * file) propagate; bad lines are returned in `errors`.
 */
export async function loadPredictions(
	filePath: string,
): Promise<PredictionLoadResult> {
	const raw = await readFile(filePath, "utf-8");
	const { items, errors } = parseJsonLines(raw, PredictionRecordSchema);
	return { records: items, errors };
}
