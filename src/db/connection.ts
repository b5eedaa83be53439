import { Pool, PoolConfig } from "pg";
import dns from "node:dns";
import { URL } from "url";
import { readFileSync } from "fs";
import { join } from "path";

// Prefer IPv4 for managed Postgres hosts
dns.setDefaultResultOrder("ipv4first");

export function buildPoolConfig(
  databaseUrl: string,
  nodeEnv: string
): PoolConfig {
  const dbUrl = new URL(databaseUrl);

  return {
    host: dbUrl.hostname,
    port: parseInt(dbUrl.port || "5432", 10),
    database: dbUrl.pathname.slice(1),
    user: decodeURIComponent(dbUrl.username),
    password: decodeURIComponent(dbUrl.password),
    ssl: nodeEnv === "production" ? { rejectUnauthorized: false } : false,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    statement_timeout: 30000,
    query_timeout: 30000,
  };
}

export function createPool(databaseUrl: string, nodeEnv: string): Pool {
  const poolConfig = buildPoolConfig(databaseUrl, nodeEnv);

  // Safe config log (no secrets)
  console.log("Pool configuration:", {
    ...poolConfig,
    password: poolConfig.password ? "[HIDDEN]" : undefined,
  });

  const pool = new Pool(poolConfig);

  pool.on("error", (err: Error & { code?: string }) => {
    const isTimeoutError =
      err.code === "ETIMEDOUT" ||
      err.code === "ECONNREFUSED" ||
      err.message.includes("timeout");

    if (isTimeoutError) {
      console.warn(
        "⚠️ Database connection timeout on idle client; will retry on next use:",
        err.message
      );
    } else {
      console.error("❌ Unexpected error on idle client", err);
    }
  });

  return pool;
}

export const SCHEMA_PATH = join(__dirname, "schema.sql");

/** Split a SQL file into statements, dropping comment-only lines. */
export function splitSqlStatements(sql: string): string[] {
  return sql
    .split("\n")
    .filter((line) => !line.trim().startsWith("--"))
    .join("\n")
    .split(";")
    .map((stmt) => stmt.trim())
    .filter((stmt) => stmt.length > 0);
}

export async function applySchema(
  db: Pick<Pool, "query">,
  schemaPath: string = SCHEMA_PATH
): Promise<number> {
  const statements = splitSqlStatements(readFileSync(schemaPath, "utf8"));
  console.log(`Executing ${statements.length} SQL statements...`);

  for (const statement of statements) {
    console.log(`Executing: ${statement.substring(0, 50)}...`);
    await db.query(statement);
  }
  return statements.length;
}
