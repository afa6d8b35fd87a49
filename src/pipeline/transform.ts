import { TypeCoercionError, ValidationError } from "../shared/errors.js";
import {
  isRawRecord,
  naturalKeyOf,
  type CleanRecord,
  type DataContract,
  type FieldSpec,
  type FieldValue,
  type RawRecord,
  type RejectedRecord
} from "../shared/record.js";
import { coerceValue } from "./coerce.js";

export type TransformResult = {
  clean: CleanRecord[];
  rejected: RejectedRecord[];
  // Earlier records displaced by a later one with the same natural key
  deduplicated: number;
};

const hasOwn = (record: RawRecord, key: string) => Object.prototype.hasOwnProperty.call(record, key);

/**
 * Reads a field by its source name. Exact names win; otherwise the first
 * case-insensitive match is used.
 */
export const readSource = (raw: RawRecord, source: FieldSpec["source"]): unknown => {
  const names = typeof source === "string" ? [source] : source;
  for (const name of names) {
    if (hasOwn(raw, name)) return raw[name];
  }
  const byLowerName = new Map<string, string>();
  for (const key of Object.keys(raw)) {
    if (!byLowerName.has(key.toLowerCase())) byLowerName.set(key.toLowerCase(), key);
  }
  for (const name of names) {
    const key = byLowerName.get(name.toLowerCase());
    if (key !== undefined) return raw[key];
  }
  return undefined;
};

export const normalizeValue = (value: unknown, field: FieldSpec): unknown => {
  if (value === undefined || value === null) return null;
  if (typeof value !== "string") return value;
  const trimmed = value.normalize("NFC").trim();
  if (trimmed === "") return null;
  if (field.type !== "string") return trimmed;
  if (field.case === "upper") return trimmed.toUpperCase();
  if (field.case === "lower") return trimmed.toLowerCase();
  return trimmed;
};

// Returns the name of the first rule the value breaks.
export const brokenRule = (value: FieldValue, field: FieldSpec): string | null => {
  if (value === null) return field.required ? "required" : null;
  const rules = field.rules;
  if (!rules) return null;
  if (typeof value === "number") {
    if (rules.min !== undefined && value < rules.min) return "min";
    if (rules.max !== undefined && value > rules.max) return "max";
  }
  if (typeof value === "string") {
    if (rules.oneOf && !rules.oneOf.includes(value)) return "oneOf";
    if (rules.maxLength !== undefined && value.length > rules.maxLength) return "maxLength";
    if (rules.pattern && !rules.pattern.test(value)) return "pattern";
  }
  return null;
};

type RecordOutcome = { ok: true; record: CleanRecord } | { ok: false; reason: TypeCoercionError | ValidationError };

export const cleanRecord = (raw: unknown, contract: DataContract): RecordOutcome => {
  if (!isRawRecord(raw)) {
    return { ok: false, reason: new ValidationError("*", "mapping", raw) };
  }

  const normalized = contract.fields.map((field) => {
    const value = normalizeValue(readSource(raw, field.source), field);
    const imputed = contract.imputations?.[field.name];
    return value === null && imputed !== undefined ? imputed : value;
  });

  const values: Record<string, FieldValue> = {};
  for (const [position, field] of contract.fields.entries()) {
    const coerced = coerceValue(normalized[position], field.type);
    if (!coerced.ok) {
      return { ok: false, reason: new TypeCoercionError(field.name, normalized[position], field.type) };
    }
    values[field.name] = coerced.value;
  }

  for (const field of contract.fields) {
    const value = values[field.name] ?? null;
    const rule = brokenRule(value, field);
    if (rule) {
      return { ok: false, reason: new ValidationError(field.name, rule, value) };
    }
  }

  return { ok: true, record: Object.freeze(values) };
};

/**
 * Cleans every raw record against the contract. Rejects keep their input
 * index. Duplicates by natural key collapse last-seen-wins: the later valid
 * record replaces the earlier one but keeps the position where the key first
 * appeared, so the output order depends only on input order.
 */
export const transform = (raw: readonly unknown[], contract: DataContract): TransformResult => {
  const survivors = new Map<string, CleanRecord>();
  const rejected: RejectedRecord[] = [];
  let deduplicated = 0;

  raw.forEach((item, index) => {
    const outcome = cleanRecord(item, contract);
    if (!outcome.ok) {
      rejected.push({ index, raw: item, reason: outcome.reason });
      return;
    }
    const key = naturalKeyOf(contract, outcome.record);
    if (survivors.has(key)) deduplicated += 1;
    survivors.set(key, outcome.record);
  });

  return { clean: Array.from(survivors.values()), rejected, deduplicated };
};

const parseListText = (text: string): string[] => {
  const inner = /^\[(.*)\]$/s.exec(text.trim());
  const body = inner ? inner[1] : text;
  return body
    .split(",")
    .map((item) => item.trim().replace(/^(['"])(.*)\1$/, "$2"))
    .filter((item) => item !== "");
};

/**
 * Expands a multi-valued field into one raw record per element, keeping only
 * the key fields. Lists may arrive as arrays or as list text ("['10A', '10B']"
 * or "10A,10B"). Records without values produce nothing; non-mappings pass
 * through so the transformer can reject them.
 */
export const explodeField = (
  records: readonly unknown[],
  keyFields: readonly string[],
  listField: string
): unknown[] => {
  const exploded: unknown[] = [];
  for (const record of records) {
    if (!isRawRecord(record)) {
      exploded.push(record);
      continue;
    }
    const base: RawRecord = {};
    for (const key of keyFields) base[key] = readSource(record, key);

    const value = readSource(record, listField);
    const items = Array.isArray(value) ? value : typeof value === "string" ? parseListText(value) : value == null ? [] : [value];
    for (const item of items) {
      exploded.push({ ...base, [listField]: item });
    }
  }
  return exploded;
};
