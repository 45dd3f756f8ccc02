import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { JudgedRecord } from "@/types/record";
import { FileJudgmentStore, MemoryJudgmentStore } from "../judgment-store";

// --- Helpers ---

function judged(id: string, evaluation: string): JudgedRecord {
	return { id, query: `Q${id}`, prediction: `A${id}`, evaluation };
}

function toLines(records: JudgedRecord[]): string {
	return records.map((r) => `${JSON.stringify(r)}\n`).join("");
}

async function readLines(filePath: string): Promise<unknown[]> {
	const content = await readFile(filePath, "utf-8");
	return content
		.split("\n")
		.filter((line) => line !== "")
		.map((line): unknown => JSON.parse(line));
}

let tempDir: string;
let outputFile: string;

beforeEach(async () => {
	tempDir = await mkdtemp(join(tmpdir(), "rag-judge-store-"));
	outputFile = join(tempDir, "output.json");
	vi.spyOn(console, "log").mockImplementation(() => {});
	vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(async () => {
	vi.restoreAllMocks();
	await rm(tempDir, { recursive: true, force: true });
});

// --- Tests ---

describe("FileJudgmentStore", () => {
	test("creates an empty output file when none exists", async () => {
		const store = await FileJudgmentStore.open(outputFile, "append");

		expect(store.size).toBe(0);
		expect(await readFile(outputFile, "utf-8")).toBe("");
	});

	test("loads existing judgments keyed by id", async () => {
		await writeFile(outputFile, toLines([judged("1", "Yes"), judged("2", "NO")]));

		const store = await FileJudgmentStore.open(outputFile, "append");

		expect(store.size).toBe(2);
		expect(store.lookup("2")).toEqual(judged("2", "NO"));
		expect(store.lookup("3")).toBeUndefined();
	});

	test("numeric ids in the file are looked up by their string form", async () => {
		await writeFile(outputFile, `${JSON.stringify({ id: 5, evaluation: "Yes" })}\n`);

		const store = await FileJudgmentStore.open(outputFile, "append");

		expect(store.lookup("5")).toEqual({ id: 5, evaluation: "Yes" });
	});

	test("later lines win over earlier lines with the same id", async () => {
		await writeFile(outputFile, toLines([judged("1", "first"), judged("1", "second")]));

		const store = await FileJudgmentStore.open(outputFile, "append");

		expect(store.size).toBe(1);
		expect(store.lookup("1")?.evaluation).toBe("second");
	});

	test("skips malformed lines with a warning", async () => {
		await writeFile(outputFile, `{broken\n${JSON.stringify(judged("1", "Yes"))}\n`);

		const store = await FileJudgmentStore.open(outputFile, "append");

		expect(store.size).toBe(1);
		expect(console.warn).toHaveBeenCalledTimes(1);
	});

	test("truncate mode empties the file and rewrites every saved record", async () => {
		await writeFile(outputFile, toLines([judged("1", "Yes"), judged("2", "NO")]));

		const store = await FileJudgmentStore.open(outputFile, "truncate");
		expect(await readFile(outputFile, "utf-8")).toBe("");

		const cached = store.lookup("1");
		expect(cached).toBeDefined();
		if (cached) await store.save(cached, "reused");
		await store.save(judged("3", "fresh verdict"), "fresh");
		await store.close();

		expect(await readLines(outputFile)).toEqual([
			judged("1", "Yes"),
			judged("3", "fresh verdict"),
		]);
	});

	test("append mode keeps existing lines and writes only fresh records", async () => {
		await writeFile(outputFile, toLines([judged("1", "Yes")]));

		const store = await FileJudgmentStore.open(outputFile, "append");
		const cached = store.lookup("1");
		if (cached) await store.save(cached, "reused");
		await store.save(judged("2", "NO"), "fresh");
		await store.close();

		expect(await readLines(outputFile)).toEqual([
			judged("1", "Yes"),
			judged("2", "NO"),
		]);
	});

	test("append mode starts new lines after a partial last line", async () => {
		await writeFile(
			outputFile,
			`${JSON.stringify(judged("1", "Yes"))}\n{"id":"2","query":"Q2","predic`,
		);

		const store = await FileJudgmentStore.open(outputFile, "append");
		await store.save(judged("2", "fresh"), "fresh");
		await store.close();

		const reopened = await FileJudgmentStore.open(outputFile, "append");
		expect(reopened.lookup("1")).toEqual(judged("1", "Yes"));
		expect(reopened.lookup("2")).toEqual(judged("2", "fresh"));
		expect(console.warn).toHaveBeenCalledTimes(2);
	});

	test("append mode leaves a complete file untouched", async () => {
		const content = toLines([judged("1", "Yes")]);
		await writeFile(outputFile, content);

		await FileJudgmentStore.open(outputFile, "append");

		expect(await readFile(outputFile, "utf-8")).toBe(content);
	});

	test("saved records can be looked up", async () => {
		const store = await FileJudgmentStore.open(outputFile, "truncate");

		await store.save(judged("7", "NO"), "fresh");

		expect(store.lookup("7")).toEqual(judged("7", "NO"));
		expect(store.size).toBe(1);
	});

	test("writes each record as a single line of JSON", async () => {
		const store = await FileJudgmentStore.open(outputFile, "truncate");

		await store.save(
			{ id: "1", prediction: "line one\nline two", evaluation: "NO" },
			"fresh",
		);

		expect(await readFile(outputFile, "utf-8")).toBe(
			'{"id":"1","prediction":"line one\\nline two","evaluation":"NO"}\n',
		);
	});
});

describe("MemoryJudgmentStore", () => {
	test("serves seeded records and collects saves in order", async () => {
		const store = new MemoryJudgmentStore([judged("1", "Yes")]);

		expect(store.size).toBe(1);
		expect(store.lookup("1")?.evaluation).toBe("Yes");

		await store.save(judged("2", "NO"), "fresh");
		await store.save(judged("1", "Yes"), "reused");

		expect(store.saved.map((s) => [s.record.id, s.origin])).toEqual([
			["2", "fresh"],
			["1", "reused"],
		]);
		expect(store.lookup("2")?.evaluation).toBe("NO");
		expect(store.size).toBe(2);
	});
});
