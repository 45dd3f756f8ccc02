import { parseCliArgs, runEvaluation } from "@/runner";

async function main(): Promise<void> {
	const config = parseCliArgs(process.argv);
	const outcome = await runEvaluation(config);
	if (outcome.status === "missing-input") {
		process.exitCode = 1;
	}
}

main().catch((err) => {
	console.error("Fatal error:", err instanceof Error ? err.message : String(err));
	process.exit(1);
});
