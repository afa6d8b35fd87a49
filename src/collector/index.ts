import { config, envInfo } from "../shared/config.js";
import { createPool } from "../shared/db.js";
import { getErrorMessage } from "../shared/errors.js";
import { createPgStore } from "../store/pgStore.js";
import { PipelineError, formatSummary, runPipeline, type RunSummary } from "../pipeline/orchestrator.js";
import { JOB_NAMES, buildJob, isJobName, type JobName } from "./jobs.js";

type RunOptions = {
  jobs: JobName[];
  dryRun: boolean;
  batchSize: number;
  failFast: boolean;
};

const parseArgs = (argv: string[]): RunOptions => {
  const args = new Map<string, string | boolean>();
  for (const arg of argv) {
    if (arg === "--dry-run") {
      args.set("dry-run", true);
      continue;
    }
    if (arg === "--fail-fast") {
      args.set("fail-fast", true);
      continue;
    }
    if (arg.startsWith("--job=")) {
      args.set("job", arg.split("=")[1]);
      continue;
    }
    if (arg.startsWith("--batch-size=")) {
      args.set("batch-size", arg.split("=")[1]);
      continue;
    }
    throw new Error(`Unknown argument: ${arg}`);
  }

  const job = args.get("job");
  let jobs: JobName[] = [...JOB_NAMES];
  if (typeof job === "string" && job !== "all") {
    if (!isJobName(job)) {
      throw new Error(`Unknown job "${job}" (expected one of: ${JOB_NAMES.join(", ")}, all)`);
    }
    jobs = [job];
  }

  const batchSizeArg = args.get("batch-size");
  const batchSize = typeof batchSizeArg === "string" ? Number(batchSizeArg) : config.load.batchSize;
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new Error(`--batch-size must be a positive integer (got ${String(batchSizeArg)})`);
  }

  return {
    jobs,
    dryRun: Boolean(args.get("dry-run")),
    batchSize,
    failFast: Boolean(args.get("fail-fast")) || config.load.failFast
  };
};

const run = async () => {
  if (!config.apiKey) {
    const details = envInfo.envFileExists ? `Check ${envInfo.envFile}.` : `Expected ${envInfo.envFile} (not found).`;
    throw new Error(`API_KEY is required. ${details}`);
  }

  const options = parseArgs(process.argv.slice(2));
  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.warn("Stop requested; finishing the current batch");
    controller.abort();
  });

  const summaries: RunSummary[] = [];
  for (const name of options.jobs) {
    const job = buildJob(name, {
      apiBaseUrl: config.apiBaseUrl,
      apiKey: config.apiKey,
      apiKeyHeader: config.apiKeyHeader,
      timeoutMs: config.extract.timeoutMs,
      maxAttempts: config.extract.maxAttempts,
      batchSize: options.batchSize,
      failFast: options.failFast
    });
    try {
      const summary = await runPipeline(job, {
        openStore: async () => createPgStore(createPool(config.db)),
        signal: controller.signal,
        dryRun: options.dryRun
      });
      summaries.push(summary);
      console.log(formatSummary(summary));
    } catch (error) {
      if (error instanceof PipelineError) {
        console.error(formatSummary(error.summary));
      }
      throw error;
    }
  }

  const partial = summaries.filter((summary) => (summary.load?.failedBatches.length ?? 0) > 0);
  if (partial.length > 0) {
    console.warn(`Partial success: ${partial.map((summary) => summary.job).join(", ")} had failed batches`);
  }
};

run().catch((err) => {
  console.error("Collector failed:", getErrorMessage(err));
  process.exitCode = 1;
});
