import { BatchWriteError, CancelledError, SchemaMismatchError, getErrorMessage } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import { INGESTED_AT_COLUMN, contractColumns, type CleanRecord, type DataContract } from "../shared/record.js";
import type { RecordStore } from "../store/types.js";
import { assertPositiveInteger, chunk, mapWithConcurrency } from "./concurrency.js";

export const DEFAULT_BATCH_SIZE = 500;

export type LoadTarget = {
  store: RecordStore;
  contract: DataContract;
};

export type LoadOptions = {
  batchSize?: number;
  // Abort the run on the first failed batch instead of carrying on
  failFast?: boolean;
  // Batches applied at once; keys are unique per run so batches never overlap
  concurrency?: number;
  signal?: AbortSignal;
  logger?: Logger;
};

export type LoadResult = {
  inserted: number;
  updated: number;
  unchanged: number;
  failedBatches: BatchWriteError[];
};

export type TableState = "created" | "exists";

const sameColumns = (a: readonly string[], b: readonly string[]) => {
  const wanted = new Set(b.map((column) => column.toLowerCase()));
  return a.length === wanted.size && a.every((column) => wanted.has(column.toLowerCase()));
};

/**
 * Creates the contract's table when it is absent. An existing table is never
 * altered: a missing contract column, or no unique constraint covering
 * exactly the natural key, is a SchemaMismatchError.
 */
export const ensureTable = async (store: RecordStore, contract: DataContract): Promise<TableState> => {
  const shape = await store.describeTable(contract.table);
  if (shape === null) {
    await store.createTable(contract);
    return "created";
  }
  const present = new Set(shape.columns.map((column) => column.toLowerCase()));
  const missing = [...contractColumns(contract), INGESTED_AT_COLUMN].filter((column) => !present.has(column));
  const keyed = shape.uniqueKeys.some((key) => sameColumns(key, contract.naturalKey));
  if (missing.length > 0 || !keyed) {
    throw new SchemaMismatchError(contract.table, missing, keyed ? [] : contract.naturalKey);
  }
  return "exists";
};

export const load = async (
  records: readonly CleanRecord[],
  target: LoadTarget,
  options: LoadOptions = {}
): Promise<LoadResult> => {
  const logger = options.logger ?? console;
  const { store, contract } = target;
  const batches = chunk(records, options.batchSize ?? DEFAULT_BATCH_SIZE);
  const concurrency = options.concurrency ?? 1;
  assertPositiveInteger("Load concurrency", concurrency);

  const tableState = await ensureTable(store, contract);
  if (tableState === "created") {
    logger.log(`[load] Created table ${contract.table}`);
  }

  const result: LoadResult = { inserted: 0, updated: 0, unchanged: 0, failedBatches: [] };

  await mapWithConcurrency(batches, concurrency, async (batch, batchIndex) => {
    if (options.signal?.aborted) {
      throw new CancelledError(`batch ${batchIndex}`);
    }
    try {
      const counts = await store.upsertBatch(contract, batch);
      result.inserted += counts.inserted;
      result.updated += counts.updated;
      result.unchanged += counts.unchanged;
    } catch (error) {
      const failure = new BatchWriteError(batchIndex, batch, error);
      logger.error(`[load] ${contract.table}: ${failure.message}`);
      if (options.failFast) throw failure;
      result.failedBatches.push(failure);
    }
  });

  result.failedBatches.sort((a, b) => a.batchIndex - b.batchIndex);
  logger.log(
    `[load] ${contract.table}: ${result.inserted} inserted, ${result.updated} updated, ` +
      `${result.unchanged} unchanged, ${result.failedBatches.length} failed batch(es)`
  );
  return result;
};

export const describeLoadFailure = (failure: BatchWriteError) =>
  `batch ${failure.batchIndex} (${failure.records.length} records): ${getErrorMessage(failure.cause)}`;
