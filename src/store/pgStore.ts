import type pg from "pg";
import { withTransaction } from "../shared/db.js";
import {
  INGESTED_AT_COLUMN,
  contractColumns,
  valueColumns,
  type CleanRecord,
  type DataContract,
  type FieldType,
  type FieldValue
} from "../shared/record.js";
import type { RecordStore, UpsertCounts } from "./types.js";

export const SQL_TYPES: Record<FieldType, string> = {
  string: "text",
  integer: "bigint",
  decimal: "numeric",
  date: "date",
  timestamp: "timestamptz",
  boolean: "boolean"
};

export const quoteIdent = (name: string) => `"${name.replace(/"/g, '""')}"`;

export const buildCreateTableSql = (contract: DataContract): string => {
  const columns = contract.fields.map(
    (field) => `  ${quoteIdent(field.name)} ${SQL_TYPES[field.type]}${field.required ? " NOT NULL" : ""}`
  );
  columns.push(`  ${quoteIdent(INGESTED_AT_COLUMN)} timestamptz NOT NULL DEFAULT now()`);
  const key = contract.naturalKey.map(quoteIdent).join(", ");
  columns.push(`  CONSTRAINT ${quoteIdent(`${contract.table}_natural_key`)} UNIQUE (${key})`);
  return `CREATE TABLE IF NOT EXISTS ${quoteIdent(contract.table)} (\n${columns.join(",\n")}\n)`;
};

export type UpsertStatement = {
  text: string;
  values: FieldValue[];
};

/**
 * Multi-row upsert. Conflicting rows are only rewritten when a value column
 * differs, so RETURNING yields inserted and changed rows and nothing for
 * unchanged ones. `xmax = 0` marks a fresh insert.
 */
export const buildUpsertSql = (contract: DataContract, records: readonly CleanRecord[]): UpsertStatement => {
  const columns = contractColumns(contract);
  const updatable = valueColumns(contract);
  const table = quoteIdent(contract.table);
  const values: FieldValue[] = [];

  const rows = records.map((record) => {
    const placeholders = columns.map((column) => {
      values.push(record[column] ?? null);
      return `$${values.length}`;
    });
    return `(${placeholders.join(", ")}, now())`;
  });

  const insertColumns = [...columns, INGESTED_AT_COLUMN].map(quoteIdent).join(", ");
  const conflict = contract.naturalKey.map(quoteIdent).join(", ");

  let onConflict: string;
  if (updatable.length === 0) {
    onConflict = `ON CONFLICT (${conflict}) DO NOTHING`;
  } else {
    const assignments = [...updatable, INGESTED_AT_COLUMN]
      .map((column) => `${quoteIdent(column)} = EXCLUDED.${quoteIdent(column)}`)
      .join(", ");
    const current = updatable.map((column) => `${table}.${quoteIdent(column)}`).join(", ");
    const incoming = updatable.map((column) => `EXCLUDED.${quoteIdent(column)}`).join(", ");
    onConflict =
      `ON CONFLICT (${conflict}) DO UPDATE SET ${assignments}\n` +
      `WHERE ROW(${current}) IS DISTINCT FROM ROW(${incoming})`;
  }

  return {
    text: `INSERT INTO ${table} (${insertColumns})\nVALUES ${rows.join(",\n       ")}\n${onConflict}\nRETURNING (xmax = 0) AS inserted`,
    values
  };
};

// Bind parameters PostgreSQL accepts in one statement
export const MAX_BIND_PARAMETERS = 65_535;

export const rowsPerStatement = (contract: DataContract) =>
  Math.floor(MAX_BIND_PARAMETERS / contractColumns(contract).length);

/** Splits a batch into upserts that each stay under the bind parameter limit. */
export const buildUpsertStatements = (contract: DataContract, records: readonly CleanRecord[]): UpsertStatement[] => {
  const size = rowsPerStatement(contract);
  const statements: UpsertStatement[] = [];
  for (let start = 0; start < records.length; start += size) {
    statements.push(buildUpsertSql(contract, records.slice(start, start + size)));
  }
  return statements;
};

export const countUpsert = (total: number, returned: ReadonlyArray<{ inserted: boolean }>): UpsertCounts => {
  const inserted = returned.filter((row) => row.inserted).length;
  return {
    inserted,
    updated: returned.length - inserted,
    unchanged: total - returned.length
  };
};

// Non-partial unique indexes, which include primary keys and UNIQUE constraints
const UNIQUE_KEYS_SQL = `SELECT array_agg(a.attname::text ORDER BY k.ord) AS columns
FROM pg_index i
CROSS JOIN LATERAL unnest(i.indkey) WITH ORDINALITY AS k(attnum, ord)
JOIN pg_attribute a ON a.attrelid = i.indrelid AND a.attnum = k.attnum
WHERE i.indrelid = to_regclass(format('%I.%I', current_schema(), $1::text))
  AND i.indisunique
  AND i.indpred IS NULL
GROUP BY i.indexrelid`;

export const createPgStore = (pool: pg.Pool): RecordStore => ({
  describeTable: async (table) => {
    const columns = await pool.query<{ column_name: string }>(
      `SELECT column_name
       FROM information_schema.columns
       WHERE table_schema = current_schema() AND table_name = $1
       ORDER BY ordinal_position`,
      [table]
    );
    if (columns.rows.length === 0) return null;
    const keys = await pool.query<{ columns: string[] }>(UNIQUE_KEYS_SQL, [table]);
    return {
      columns: columns.rows.map((row) => row.column_name),
      uniqueKeys: keys.rows.map((row) => row.columns)
    };
  },

  createTable: async (contract) => {
    await pool.query(buildCreateTableSql(contract));
  },

  upsertBatch: async (contract, records) => {
    if (records.length === 0) return { inserted: 0, updated: 0, unchanged: 0 };
    const statements = buildUpsertStatements(contract, records);
    return withTransaction<pg.PoolClient, UpsertCounts>(pool, async (client) => {
      const returned: Array<{ inserted: boolean }> = [];
      for (const statement of statements) {
        const result = await client.query<{ inserted: boolean }>(statement.text, statement.values);
        returned.push(...result.rows);
      }
      return countUpsert(records.length, returned);
    });
  },

  close: async () => {
    await pool.end();
  }
});
