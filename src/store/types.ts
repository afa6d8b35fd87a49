import type { CleanRecord, DataContract } from "../shared/record.js";

export type UpsertCounts = {
  inserted: number;
  updated: number;
  unchanged: number;
};

export type TableShape = {
  columns: string[];
  // Column sets of the table's unique constraints and unique indexes
  uniqueKeys: string[][];
};

/**
 * Persistence seam used by the loader. `upsertBatch` must apply the whole
 * batch or none of it.
 */
export interface RecordStore {
  // Null when the table does not exist.
  describeTable(table: string): Promise<TableShape | null>;
  createTable(contract: DataContract): Promise<void>;
  upsertBatch(contract: DataContract, records: readonly CleanRecord[]): Promise<UpsertCounts>;
  close(): Promise<void>;
}
