import type { TypeCoercionError, ValidationError } from "./errors.js";

export type FieldType = "string" | "integer" | "decimal" | "date" | "timestamp" | "boolean";

export type FieldValue = string | number | boolean | null;

export type FieldRules = {
  min?: number;
  max?: number;
  oneOf?: readonly string[];
  maxLength?: number;
  pattern?: RegExp;
};

export type FieldSpec = {
  name: string;
  // API field name, or alternatives tried in order
  source: string | readonly string[];
  type: FieldType;
  required: boolean;
  case?: "upper" | "lower";
  rules?: FieldRules;
};

export type DataContract = {
  name: string;
  table: string;
  fields: readonly FieldSpec[];
  naturalKey: readonly string[];
  // Values substituted for null before coercion
  imputations?: Readonly<Record<string, FieldValue>>;
};

export type RawRecord = Record<string, unknown>;

export const isRawRecord = (value: unknown): value is RawRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export type CleanRecord = Readonly<Record<string, FieldValue>>;

export type RejectedRecord = {
  index: number;
  raw: unknown;
  reason: TypeCoercionError | ValidationError;
};

// Maintained by the store, not part of change detection.
export const INGESTED_AT_COLUMN = "ingested_at";

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

export const defineContract = (contract: DataContract): DataContract => {
  if (!IDENTIFIER.test(contract.table)) {
    throw new Error(`Invalid table name "${contract.table}" in contract ${contract.name}`);
  }
  const names = new Set<string>();
  for (const field of contract.fields) {
    if (!IDENTIFIER.test(field.name) || field.name === INGESTED_AT_COLUMN) {
      throw new Error(`Invalid field name "${field.name}" in contract ${contract.name}`);
    }
    if (names.has(field.name)) {
      throw new Error(`Duplicate field "${field.name}" in contract ${contract.name}`);
    }
    names.add(field.name);
  }
  if (contract.naturalKey.length === 0) {
    throw new Error(`Contract ${contract.name} has no natural key`);
  }
  for (const key of contract.naturalKey) {
    const field = contract.fields.find((candidate) => candidate.name === key);
    if (!field) {
      throw new Error(`Natural key "${key}" is not a field of contract ${contract.name}`);
    }
    if (!field.required) {
      throw new Error(`Natural key "${key}" of contract ${contract.name} must be required`);
    }
  }
  for (const key of Object.keys(contract.imputations ?? {})) {
    if (!names.has(key)) {
      throw new Error(`Imputation for unknown field "${key}" in contract ${contract.name}`);
    }
  }
  return contract;
};

export const contractColumns = (contract: DataContract): string[] => contract.fields.map((field) => field.name);

export const valueColumns = (contract: DataContract): string[] =>
  contractColumns(contract).filter((name) => !contract.naturalKey.includes(name));

export const naturalKeyOf = (contract: DataContract, record: CleanRecord): string =>
  JSON.stringify(contract.naturalKey.map((name) => record[name] ?? null));
