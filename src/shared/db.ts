import pg from "pg";

const { Pool } = pg;

export type DbConfig = {
  connectionString?: string;
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
  sslMode?: string;
};

export const getSslConfig = (dbConfig: DbConfig): pg.PoolConfig["ssl"] | undefined => {
  let sslMode = dbConfig.sslMode ?? "";

  if (!sslMode && dbConfig.connectionString) {
    try {
      const url = new URL(dbConfig.connectionString);
      sslMode = url.searchParams.get("sslmode") ?? "";
    } catch {
      // Not a URL (e.g. a key/value DSN); pg parses it and no sslmode applies.
      sslMode = "";
    }
  }

  if (!sslMode) return undefined;
  if (sslMode === "disable") return false;
  if (sslMode === "verify-full" || sslMode === "verify-ca") return { rejectUnauthorized: true };
  return { rejectUnauthorized: false };
};

export const createPool = (dbConfig: DbConfig): pg.Pool => {
  if (!dbConfig.connectionString && !dbConfig.database) {
    throw new Error("DATABASE_URL or PGDATABASE is required");
  }
  return new Pool({
    connectionString: dbConfig.connectionString,
    host: dbConfig.host,
    port: dbConfig.port,
    user: dbConfig.user,
    password: dbConfig.password,
    database: dbConfig.database,
    ssl: getSslConfig(dbConfig)
  });
};

export interface TransactionClient {
  query(text: string): Promise<unknown>;
  // An error destroys the connection instead of returning it to the pool
  release(error?: Error): void;
}

export interface TransactionSource<C extends TransactionClient> {
  connect(): Promise<C>;
}

export async function withTransaction<C extends TransactionClient, T>(
  pool: TransactionSource<C>,
  fn: (client: C) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  let broken: Error | undefined;
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackError) {
      broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
    }
    throw error;
  } finally {
    client.release(broken);
  }
}
