import { appendFile, readFile, writeFile } from "node:fs/promises";
import { parseJsonLines } from "@/loader";
import {
	type JudgedRecord,
	JudgedRecordSchema,
	recordKey,
} from "@/types/record";

// --- Types ---

/**
 * How the output file is prepared when a store is opened.
 *
 * - `truncate`: the file is emptied after loading; every record of the run,
 *   fresh or reused, is written again in input order.
 * - `append`: existing lines are kept; only fresh judgments are appended.
 */
export type WriteMode = "truncate" | "append";

/** Whether a saved record came from a judge call or from the cache. */
export type RecordOrigin = "fresh" | "reused";

/**
 * Key-value store of judgments keyed by record id. The runner consults it
 * before judging and hands it every record it settles on.
 */
export interface JudgmentStore {
	/** Number of cached judgments available for reuse. */
	readonly size: number;
	lookup(id: string): JudgedRecord | undefined;
	save(record: JudgedRecord, origin: RecordOrigin): Promise<void>;
	close(): Promise<void>;
}

// --- File-backed store ---

/**
 * Judgment store backed by the newline-delimited JSON output file.
 * Each save is a single append so progress survives a crash mid-run.
 */
export class FileJudgmentStore implements JudgmentStore {
	private readonly cache: Map<string, JudgedRecord>;
	private readonly filePath: string;
	private readonly mode: WriteMode;

	private constructor(
		filePath: string,
		mode: WriteMode,
		cache: Map<string, JudgedRecord>,
	) {
		this.filePath = filePath;
		this.mode = mode;
		this.cache = cache;
	}

	/**
	 * Loads any existing judgments from `filePath`, then prepares the file for
	 * writing according to `mode`. Later lines win over earlier ones with the
	 * same id.
	 */
	static async open(
		filePath: string,
		mode: WriteMode,
	): Promise<FileJudgmentStore> {
		const cache = new Map<string, JudgedRecord>();

		const existing = await readIfExists(filePath);
		if (existing !== null) {
			const { items, errors } = parseJsonLines(existing, JudgedRecordSchema);
			for (const err of errors) {
				console.warn(
					`  ! Skipping line ${err.line} of ${filePath}: ${err.error}`,
				);
			}
			for (const record of items) {
				cache.set(recordKey(record), record);
			}
			console.log(`Loaded ${cache.size} existing judgment(s) from ${filePath}`);
		}

		if (mode === "truncate" || existing === null) {
			await writeFile(filePath, "", "utf-8");
		} else if (existing !== "" && !existing.endsWith("\n")) {
			// A run cut off mid-write leaves a partial last line; new lines start after it
			await appendFile(filePath, "\n", "utf-8");
		}

		return new FileJudgmentStore(filePath, mode, cache);
	}

	get size(): number {
		return this.cache.size;
	}

	lookup(id: string): JudgedRecord | undefined {
		return this.cache.get(id);
	}

	async save(record: JudgedRecord, origin: RecordOrigin): Promise<void> {
		this.cache.set(recordKey(record), record);
		// In append mode a reused record is already on disk
		if (this.mode === "append" && origin === "reused") return;
		await appendFile(this.filePath, `${JSON.stringify(record)}\n`, "utf-8");
	}

	async close(): Promise<void> {
		// Every save is flushed on write; nothing is held open.
	}
}

// --- In-memory store ---

/**
 * Judgment store without a file. Seeded and saved records are available for
 * reuse; saves are also collected in `saved` in the order they arrive.
 */
export class MemoryJudgmentStore implements JudgmentStore {
	private readonly cache = new Map<string, JudgedRecord>();
	readonly saved: { record: JudgedRecord; origin: RecordOrigin }[] = [];

	constructor(seed: JudgedRecord[] = []) {
		for (const record of seed) {
			this.cache.set(recordKey(record), record);
		}
	}

	get size(): number {
		return this.cache.size;
	}

	lookup(id: string): JudgedRecord | undefined {
		return this.cache.get(id);
	}

	async save(record: JudgedRecord, origin: RecordOrigin): Promise<void> {
		this.cache.set(recordKey(record), record);
		this.saved.push({ record, origin });
	}

	async close(): Promise<void> {}
}

async function readIfExists(filePath: string): Promise<string | null> {
	try {
		return await readFile(filePath, "utf-8");
	} catch (err) {
		if (isNotFound(err)) return null;
		throw err;
	}
}

function isNotFound(err: unknown): boolean {
	return (
		typeof err === "object" &&
		err !== null &&
		"code" in err &&
		err.code === "ENOENT"
	);
}
