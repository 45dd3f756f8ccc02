import { access } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { JudgeCallResult } from "@/judge";
import {
	callJudge,
	DEFAULT_JUDGE_MODEL,
	DEFAULT_JUDGE_URL,
	describeJudgeError,
} from "@/judge";
import { loadPredictions } from "@/loader";
import {
	type Dataset,
	DatasetSchema,
	type JudgedRecord,
	type PredictionRecord,
	recordKey,
	type ScoreSummary,
} from "@/types/record";
import type { JudgmentStore } from "./judgment-store";
import { FileJudgmentStore } from "./judgment-store";
import type { PipelineDefinition, PipelineName } from "./pipelines";
import {
	getPipeline,
	isPipelineName,
	PIPELINE_NAMES,
	shouldReuse,
} from "./pipelines";
import {
	computeScores,
	countJudgeFailures,
	formatScoreSummary,
	writeScores,
} from "./scorer";

// --- Types ---

/**
 * CLI configuration parsed from command-line arguments.
 */
export interface CliConfig {
	/** Which evaluation pipeline to run */
	pipeline: PipelineName;
	/** Name of the model whose predictions are judged (file naming only) */
	modelName: string;
	/** Dataset tag (file naming only) */
	dataset: Dataset;
	/** Bearer credential for the judge endpoint */
	apiKey: string;
	/** Full chat-completions URL of the judge endpoint */
	url: string;
	/** Generation temperature of the judged run (file naming only) */
	temp: number;
	/** Number of external passages (file naming only) */
	passageNum: number;
	/** Rate of noisy passages (file naming; reported by fact-error) */
	noiseRate: number;
	/** Rate of correct passages (file naming only) */
	correctRate: number;
	/** Model ID sent to the judge endpoint */
	judgeModel: string;
	/** Directory holding the result-en/ and result-zh/ folders (default: cwd) */
	outputRoot: string;
	/** Judge cached records again when their stored judgment is a failed call */
	retryFailed: boolean;
}

/** Files a run reads and writes. */
export interface RunPaths {
	resultDir: string;
	inputFile: string;
	outputFile: string;
	resultFile: string;
}

export type RunStatus = "completed" | "empty" | "missing-input";

export interface RunOutcome {
	status: RunStatus;
	paths: RunPaths;
	/** Judged records in input order, fresh and reused */
	records: JudgedRecord[];
	summary: ScoreSummary | null;
	judgedCount: number;
	reusedCount: number;
	skippedCount: number;
	/** Input lines dropped as malformed */
	invalidLines: number;
}

/** Sends one prompt to the judge. */
export type JudgeFn = (
	prompt: string,
	temperature: number | undefined,
) => Promise<JudgeCallResult>;

/** Collaborators a run can be given instead of the defaults. */
export interface RunDependencies {
	judge?: JudgeFn;
	store?: JudgmentStore;
}

export type RecordSource = "judged" | "reused" | "skipped";

// --- Progress Logger ---

/**
 * Prints one line per settled record. The ETA is projected from the most
 * recent judge calls; reused and skipped records are not timed.
 */
export class ProgressLogger {
	private settled = 0;
	private readonly total: number;
	private readonly startTime = Date.now();
	private readonly judgeWindow: number[] = [];
	private readonly windowSize: number;

	constructor(total: number, windowSize = 10) {
		this.total = total;
		this.windowSize = windowSize;
	}

	log(id: string, source: RecordSource, durationMs: number): void {
		this.settled++;
		if (source === "judged") {
			this.judgeWindow.push(durationMs);
			if (this.judgeWindow.length > this.windowSize) this.judgeWindow.shift();
		}

		const elapsed = formatDuration(Date.now() - this.startTime);
		console.log(
			`[${this.settled}/${this.total}] Record: ${id} | ${source} | Elapsed: ${elapsed} | ETA: ${this.eta()}`,
		);
	}

	private eta(): string {
		const remaining = this.total - this.settled;
		if (remaining === 0) return formatDuration(0);
		if (this.judgeWindow.length === 0) return "calculating...";

		const mean =
			this.judgeWindow.reduce((sum, d) => sum + d, 0) / this.judgeWindow.length;
		return formatDuration(mean * remaining);
	}
}

/**
 * Formats milliseconds into a human-readable duration string.
 */
export function formatDuration(ms: number): string {
	if (ms < 1000) return `${Math.round(ms)}ms`;

	const seconds = Math.floor(ms / 1000);
	const minutes = Math.floor(seconds / 60);
	const hours = Math.floor(minutes / 60);

	if (hours > 0) {
		return `${hours}h${(minutes % 60).toString().padStart(2, "0")}m`;
	}
	if (minutes > 0) {
		return `${minutes}m${(seconds % 60).toString().padStart(2, "0")}s`;
	}
	return `${seconds}s`;
}

// --- CLI Argument Parsing ---

const USAGE = `Usage: npm start -- <${PIPELINE_NAMES.join("|")}> [--modelname <name>] [--dataset <${DatasetSchema.options.join("|")}>] [--api-key <key>] [--url <url>] [--temp <n>] [--passage-num <n>] [--noise-rate <n>] [--correct-rate <n>] [--judge-model <id>] [--output-root <dir>] [--retry-failed]`;

function parseNumberArg(flag: string, value: string | undefined): number {
	const parsed = Number.parseFloat(value ?? "");
	if (Number.isNaN(parsed)) {
		throw new Error(`${flag} expects a number, got '${value ?? ""}'`);
	}
	return parsed;
}

function parseDatasetArg(value: string | undefined): Dataset {
	const result = DatasetSchema.safeParse(value);
	if (!result.success) {
		throw new Error(
			`--dataset must be one of ${DatasetSchema.options.join(", ")}, got '${value ?? ""}'`,
		);
	}
	return result.data;
}

/**
 * Parses command-line arguments into a CliConfig object. The first
 * positional argument selects the pipeline; its defaults fill in the
 * naming parameters not given on the command line.
 */
export function parseCliArgs(argv: string[]): CliConfig {
	const [command, ...args] = argv.slice(2); // Remove 'node' and script path

	if (command === undefined || !isPipelineName(command)) {
		throw new Error(`Unknown or missing pipeline '${command ?? ""}'\n${USAGE}`);
	}
	const { defaults } = getPipeline(command);

	const config: CliConfig = {
		pipeline: command,
		modelName: "groq",
		dataset: "en",
		apiKey: process.env.JUDGE_API_KEY ?? "",
		url: DEFAULT_JUDGE_URL,
		temp: defaults.temp,
		passageNum: 5,
		noiseRate: defaults.noiseRate,
		correctRate: defaults.correctRate,
		judgeModel: DEFAULT_JUDGE_MODEL,
		outputRoot: process.cwd(),
		retryFailed: false,
	};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];

		switch (arg) {
			case "--modelname":
				config.modelName = args[++i] ?? config.modelName;
				break;
			case "--dataset":
				config.dataset = parseDatasetArg(args[++i]);
				break;
			case "--api-key":
				config.apiKey = args[++i] ?? "";
				break;
			case "--url":
				config.url = args[++i] ?? DEFAULT_JUDGE_URL;
				break;
			case "--temp":
				config.temp = parseNumberArg(arg, args[++i]);
				break;
			case "--passage-num":
				config.passageNum = Number.parseInt(args[++i] ?? "5", 10);
				break;
			case "--noise-rate":
				config.noiseRate = parseNumberArg(arg, args[++i]);
				break;
			case "--correct-rate":
				config.correctRate = parseNumberArg(arg, args[++i]);
				break;
			case "--judge-model":
				config.judgeModel = args[++i] ?? DEFAULT_JUDGE_MODEL;
				break;
			case "--output-root":
				config.outputRoot = resolve(args[++i] ?? ".");
				break;
			case "--retry-failed":
				config.retryFailed = true;
				break;
			default:
				console.warn(`Ignoring unknown argument: ${arg}`);
		}
	}

	return config;
}

// --- File Naming ---

/**
 * Formats a rate the way the generation step writes it into file names:
 * whole numbers keep one decimal place (1 -> "1.0").
 */
export function formatRate(value: number): string {
	if (Number.isInteger(value)) return value.toFixed(1);
	// Exponents carry at least two digits: 1e-7 -> "1e-07"
	return String(value).replace(
		/e([+-])(\d)$/,
		(_, sign: string, digit: string) => `e${sign}0${digit}`,
	);
}

export function resultDirName(dataset: Dataset): string {
	return dataset.startsWith("zh") ? "result-zh" : "result-en";
}

/**
 * Derives the input, output and result file paths from the run parameters.
 *
 * Stem: prediction_{dataset}_{model}_temp{t}_noise{n}_passage{p}_correct{c}
 */
export function resolveRunPaths(config: CliConfig): RunPaths {
	const resultDir = join(config.outputRoot, resultDirName(config.dataset));
	const stem = [
		"prediction",
		config.dataset,
		config.modelName,
		`temp${formatRate(config.temp)}`,
		`noise${formatRate(config.noiseRate)}`,
		`passage${config.passageNum}`,
		`correct${formatRate(config.correctRate)}`,
	].join("_");

	return {
		resultDir,
		inputFile: join(resultDir, `${stem}.json`),
		outputFile: join(resultDir, `${stem}_chatgpt.json`),
		resultFile: join(resultDir, `${stem}_chatgptresult.json`),
	};
}

// --- Judging ---

/**
 * Judges one record. A failed call is still a judged record: its
 * `evaluation` holds the error text and `judge_error` the structured error.
 */
export async function judgeRecord(
	record: PredictionRecord,
	pipeline: PipelineDefinition,
	judge: JudgeFn,
): Promise<JudgedRecord> {
	const result = await judge(
		pipeline.buildPrompt(record),
		pipeline.judgeTemperature,
	);

	if (result.success) {
		return { ...record, evaluation: result.content, judge_error: undefined };
	}

	const description = describeJudgeError(result.error);
	console.warn(`  ! Judge failed for record ${recordKey(record)}: ${description}`);
	return { ...record, evaluation: description, judge_error: result.error };
}

async function fileExists(filePath: string): Promise<boolean> {
	try {
		await access(filePath);
		return true;
	} catch {
		return false;
	}
}

// --- Main Orchestrator ---

/**
 * Runs one evaluation pipeline end to end: load predictions, reuse or judge
 * each record in input order, then score the run.
 */
export async function runEvaluation(
	config: CliConfig,
	deps: RunDependencies = {},
): Promise<RunOutcome> {
	const pipeline = getPipeline(config.pipeline);
	const paths = resolveRunPaths(config);

	const outcome: RunOutcome = {
		status: "completed",
		paths,
		records: [],
		summary: null,
		judgedCount: 0,
		reusedCount: 0,
		skippedCount: 0,
		invalidLines: 0,
	};

	console.log(`${pipeline.label} evaluation`);
	console.log(`Input: ${paths.inputFile}`);

	if (!(await fileExists(paths.inputFile))) {
		console.error(
			`Error: Evaluation file not found at ${paths.inputFile}. Please ensure it exists.`,
		);
		return { ...outcome, status: "missing-input" };
	}

	const { records: inputs, errors } = await loadPredictions(paths.inputFile);
	if (errors.length > 0) {
		console.warn(
			`\nWarning: ${errors.length} malformed line(s) in ${paths.inputFile}:`,
		);
		for (const err of errors) {
			console.warn(`  line ${err.line}: ${err.error}`);
		}
	}
	outcome.invalidLines = errors.length;

	const store =
		deps.store ?? (await FileJudgmentStore.open(paths.outputFile, pipeline.writeMode));
	const judge: JudgeFn =
		deps.judge ??
		((prompt, temperature) =>
			callJudge(prompt, {
				apiKey: config.apiKey,
				url: config.url,
				model: config.judgeModel,
				temperature,
			}));

	console.log(
		`Loaded ${inputs.length} record(s) | Cached judgments: ${store.size} | Judge: ${config.judgeModel}`,
	);

	const progress = new ProgressLogger(inputs.length);

	try {
		for (const input of inputs) {
			const startMs = Date.now();
			const id = recordKey(input);
			const cached = store.lookup(id);

			if (shouldReuse(pipeline, cached, input, config.retryFailed)) {
				await store.save(cached, "reused");
				outcome.records.push(cached);
				outcome.reusedCount++;
				progress.log(id, "reused", Date.now() - startMs);
				continue;
			}

			const reason = pipeline.skipReason(input);
			if (reason !== null) {
				console.warn(`  ! Skipping record ${id}: ${reason}`);
				outcome.skippedCount++;
				progress.log(id, "skipped", Date.now() - startMs);
				continue;
			}

			const judged = await judgeRecord(input, pipeline, judge);
			await store.save(judged, "fresh");
			outcome.records.push(judged);
			outcome.judgedCount++;
			progress.log(id, "judged", Date.now() - startMs);
		}
	} finally {
		await store.close();
	}

	console.log(
		`\nFinished: ${outcome.judgedCount} judged, ${outcome.reusedCount} reused, ${outcome.skippedCount} skipped (${outcome.records.length} results)`,
	);

	const failures = countJudgeFailures(outcome.records);
	if (failures > 0) {
		console.warn(
			`  ! ${failures} result(s) hold a failed judge call; rerun with --retry-failed to judge them again.`,
		);
	}

	if (outcome.records.length === 0) {
		console.warn(
			"No results were processed. Skipping score calculation and file output.",
		);
		return { ...outcome, status: "empty" };
	}

	const summary = computeScores(outcome.records, pipeline, config.noiseRate);
	console.log(formatScoreSummary(summary));

	await writeScores(paths.resultFile, summary);
	console.log(`Scores saved to ${paths.resultFile}`);

	return { ...outcome, summary };
}
