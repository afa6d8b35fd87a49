import type { CleanRecord, FieldType } from "./record.js";

export class EtlError extends Error {
  readonly details?: unknown;

  constructor(message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
  }
}

export type TransportErrorDetails = {
  url: string;
  status?: number;
  code?: string;
  bodyExcerpt?: string;
  retryable: boolean;
};

export class TransportError extends EtlError {
  readonly url: string;
  readonly status?: number;
  readonly code?: string;
  readonly bodyExcerpt?: string;
  readonly retryable: boolean;

  constructor(message: string, details: TransportErrorDetails, cause?: unknown) {
    super(message, details, { cause });
    this.url = details.url;
    this.status = details.status;
    this.code = details.code;
    this.bodyExcerpt = details.bodyExcerpt;
    this.retryable = details.retryable;
  }
}

export class ParseError extends EtlError {
  readonly expected: string;
  readonly found: string;

  constructor(expected: string, found: string, url?: string) {
    super(`Expected ${expected} but found ${found}${url ? ` (${url})` : ""}`, { expected, found, url });
    this.expected = expected;
    this.found = found;
  }
}

export class TypeCoercionError extends EtlError {
  readonly field: string;
  readonly rawValue: unknown;
  readonly targetType: FieldType;

  constructor(field: string, rawValue: unknown, targetType: FieldType) {
    super(`Cannot coerce ${field}=${JSON.stringify(rawValue) ?? String(rawValue)} to ${targetType}`);
    this.field = field;
    this.rawValue = rawValue;
    this.targetType = targetType;
  }
}

export class ValidationError extends EtlError {
  readonly field: string;
  readonly rule: string;
  readonly value: unknown;

  constructor(field: string, rule: string, value: unknown) {
    super(`${field} violates ${rule} (value: ${JSON.stringify(value) ?? String(value)})`);
    this.field = field;
    this.rule = rule;
    this.value = value;
  }
}

export class SchemaMismatchError extends EtlError {
  readonly table: string;
  readonly missingColumns: string[];
  // Natural key lacking a unique constraint; empty when one exists
  readonly missingKey: string[];

  constructor(table: string, missingColumns: string[], missingKey: readonly string[] = []) {
    const problems: string[] = [];
    if (missingColumns.length > 0) problems.push(`is missing columns: ${missingColumns.join(", ")}`);
    if (missingKey.length > 0) problems.push(`has no unique constraint on (${missingKey.join(", ")})`);
    super(`Table ${table} ${problems.join(" and ")}`, { table, missingColumns, missingKey });
    this.table = table;
    this.missingColumns = missingColumns;
    this.missingKey = [...missingKey];
  }
}

export class BatchWriteError extends EtlError {
  readonly batchIndex: number;
  readonly records: readonly CleanRecord[];

  constructor(batchIndex: number, records: readonly CleanRecord[], cause: unknown) {
    super(`Batch ${batchIndex} (${records.length} records) failed: ${getErrorMessage(cause)}`, undefined, { cause });
    this.batchIndex = batchIndex;
    this.records = records;
  }
}

export class CancelledError extends EtlError {
  constructor(where: string) {
    super(`Run cancelled before ${where}`);
  }
}

export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "Unknown error";
};

export const getErrorCode = (error: unknown): string | undefined => {
  const cause = error instanceof Error && error.cause !== undefined ? error.cause : error;
  if (typeof cause === "object" && cause !== null && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return undefined;
};
