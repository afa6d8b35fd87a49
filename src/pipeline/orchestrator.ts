import { CancelledError, EtlError, getErrorMessage } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import type { DataContract, RejectedRecord } from "../shared/record.js";
import type { RecordStore } from "../store/types.js";
import { extract, type SourceConfig } from "./extract.js";
import { describeLoadFailure, load, type LoadOptions, type LoadResult } from "./load.js";
import { explodeField, transform } from "./transform.js";

export type PipelineState = "idle" | "extracting" | "transforming" | "loading" | "done" | "failed";

export type PipelineStage = "extracting" | "transforming" | "loading";

export type PipelineJob = {
  name: string;
  source: SourceConfig;
  contract: DataContract;
  // Expand a list field into one record per element before cleaning
  explode?: { keyFields: readonly string[]; listField: string };
  load?: Pick<LoadOptions, "batchSize" | "failFast" | "concurrency">;
};

export type PipelineDeps = {
  // Called when loading starts; the store is closed when the run ends.
  openStore: () => Promise<RecordStore>;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  signal?: AbortSignal;
  logger?: Logger;
  onStateChange?: (state: PipelineState) => void;
  // Stop after transforming
  dryRun?: boolean;
};

export type RunSummary = {
  job: string;
  state: PipelineState;
  pages: number;
  extracted: number;
  cleaned: number;
  rejected: number;
  rejections: RejectedRecord[];
  deduplicated: number;
  load: LoadResult | null;
  startedAt: string;
  finishedAt: string | null;
};

export class PipelineError extends EtlError {
  readonly stage: PipelineStage;
  readonly summary: RunSummary;

  constructor(stage: PipelineStage, cause: unknown, summary: RunSummary) {
    super(`${summary.job} failed while ${stage}: ${getErrorMessage(cause)}`, { stage }, { cause });
    this.stage = stage;
    this.summary = summary;
  }
}

const withStore = async <T>(openStore: () => Promise<RecordStore>, fn: (store: RecordStore) => Promise<T>) => {
  const store = await openStore();
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
};

/**
 * Runs extract, transform and load in order. Each stage starts only after the
 * previous one finished; any failure ends the run in `failed` and is rethrown
 * as a PipelineError naming the stage.
 */
export const runPipeline = async (job: PipelineJob, deps: PipelineDeps): Promise<RunSummary> => {
  const logger = deps.logger ?? console;
  const summary: RunSummary = {
    job: job.name,
    state: "idle",
    pages: 0,
    extracted: 0,
    cleaned: 0,
    rejected: 0,
    rejections: [],
    deduplicated: 0,
    load: null,
    startedAt: new Date().toISOString(),
    finishedAt: null
  };

  const enter = (state: PipelineState) => {
    summary.state = state;
    deps.onStateChange?.(state);
  };

  let stage: PipelineStage = "extracting";
  const begin = (next: PipelineStage) => {
    stage = next;
    if (deps.signal?.aborted) {
      throw new CancelledError(next);
    }
    enter(next);
  };

  try {
    begin("extracting");
    const extracted = await extract(job.source, {
      fetch: deps.fetch,
      sleep: deps.sleep,
      signal: deps.signal,
      logger
    });
    summary.pages = extracted.pages;
    summary.extracted = extracted.records.length;

    begin("transforming");
    const raw = job.explode
      ? explodeField(extracted.records, job.explode.keyFields, job.explode.listField)
      : extracted.records;
    const transformed = transform(raw, job.contract);
    summary.cleaned = transformed.clean.length;
    summary.rejected = transformed.rejected.length;
    summary.rejections = transformed.rejected;
    summary.deduplicated = transformed.deduplicated;
    logger.log(
      `[transform] ${job.name}: ${transformed.clean.length} clean, ${transformed.rejected.length} rejected, ` +
        `${transformed.deduplicated} duplicate(s) collapsed`
    );

    if (!deps.dryRun) {
      begin("loading");
      summary.load = await withStore(deps.openStore, (store) =>
        load(transformed.clean, { store, contract: job.contract }, { ...job.load, signal: deps.signal, logger })
      );
    }
  } catch (error) {
    summary.finishedAt = new Date().toISOString();
    enter("failed");
    logger.error(`[pipeline] ${job.name} failed while ${stage}: ${getErrorMessage(error)}`);
    throw new PipelineError(stage, error, summary);
  }

  summary.finishedAt = new Date().toISOString();
  enter("done");
  return summary;
};

export const formatSummary = (summary: RunSummary): string => {
  const lines = [
    `${summary.job}: ${summary.state}`,
    `  extracted ${summary.extracted} record(s) from ${summary.pages} page(s)`,
    `  cleaned ${summary.cleaned}, rejected ${summary.rejected}, duplicates collapsed ${summary.deduplicated}`
  ];
  for (const rejection of summary.rejections) {
    lines.push(`    rejected #${rejection.index}: ${rejection.reason.message}`);
  }
  if (summary.load) {
    const { inserted, updated, unchanged, failedBatches } = summary.load;
    lines.push(`  inserted ${inserted}, updated ${updated}, unchanged ${unchanged}, failed batches ${failedBatches.length}`);
    for (const failure of failedBatches) {
      lines.push(`    failed ${describeLoadFailure(failure)}`);
    }
  }
  return lines.join("\n");
};
