import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import type { DbConfig } from "./db.js";

const isProdEnv = process.env.INGEST_ENV === "prod" || process.env.NODE_ENV === "production";
const envFile = isProdEnv ? ".env.prod" : ".env.dev";
const envPath = path.resolve(process.cwd(), envFile);
const envFileExists = fs.existsSync(envPath);

if (envFileExists) {
  dotenv.config({ path: envPath });
}

export const envInfo = {
  envFile,
  envPath,
  envFileExists
};

export const numberFromEnv = (key: string, fallback: number, env: NodeJS.ProcessEnv = process.env): number => {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Env var ${key} must be a positive number (got "${raw}")`);
  }
  return value;
};

const dbConfig: DbConfig = {
  connectionString: process.env.DATABASE_URL || undefined,
  host: process.env.PGHOST,
  port: numberFromEnv("PGPORT", 5432),
  user: process.env.PGUSER,
  password: process.env.PGPASSWORD,
  database: process.env.PGDATABASE,
  sslMode: process.env.DATABASE_SSLMODE ?? process.env.PGSSLMODE
};

export const config = {
  apiBaseUrl: process.env.API_BASE_URL ?? "https://api.wmata.com/Bus.svc/json",
  apiKey: process.env.API_KEY ?? "",
  apiKeyHeader: process.env.API_KEY_HEADER ?? "api_key",
  extract: {
    timeoutMs: numberFromEnv("EXTRACT_TIMEOUT_MS", 15_000),
    maxAttempts: numberFromEnv("EXTRACT_MAX_ATTEMPTS", 4)
  },
  load: {
    batchSize: numberFromEnv("LOAD_BATCH_SIZE", 500),
    failFast: process.env.LOAD_FAIL_FAST === "true"
  },
  db: dbConfig
};
