export * from "./shared/errors.js";
export * from "./shared/record.js";
export * from "./shared/contracts.js";
export type { Logger } from "./shared/logger.js";
export { createPool, withTransaction, type DbConfig } from "./shared/db.js";
export { extract, fetchPage, type ExtractResult, type PaginationConfig, type RetryPolicy, type SourceConfig } from "./pipeline/extract.js";
export { explodeField, transform, type TransformResult } from "./pipeline/transform.js";
export { ensureTable, load, type LoadOptions, type LoadResult, type LoadTarget } from "./pipeline/load.js";
export {
  PipelineError,
  formatSummary,
  runPipeline,
  type PipelineDeps,
  type PipelineJob,
  type PipelineState,
  type RunSummary
} from "./pipeline/orchestrator.js";
export { createPgStore } from "./store/pgStore.js";
export type { RecordStore, UpsertCounts } from "./store/types.js";
