// api/src/db.ts
import pg from "pg";
import { parse as parsePg } from "pg-connection-string";
import { getConfig } from "./config.js";
import { AppError } from "./middleware/errorHandler.js";

const { Pool } = pg;

export type SqlQuery = <T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[]
) => Promise<T[]>;

let pool: pg.Pool | null = null;

export function getPool(): pg.Pool {
  if (pool) return pool;

  const config = getConfig();
  if (!config.databaseUrl) {
    throw new AppError("DATABASE_URL must be set to use the pg event store", 500, { code: "config_error" });
  }

  // Жёстко парсим DATABASE_URL, чтобы PG* env не переопределяли
  const cn = parsePg(config.databaseUrl);
  const resolvedHost = cn.host || "127.0.0.1";
  const isLocalHost = resolvedHost === "127.0.0.1" || resolvedHost === "localhost" || resolvedHost === "::1";

  pool = new Pool({
    host: resolvedHost,
    port: cn.port ? Number(cn.port) : 5432,
    user: cn.user ?? undefined,
    password: cn.password ?? undefined,
    database: cn.database ?? undefined,
    // Managed Postgres providers require SSL; local dev Postgres often doesn't.
    ssl: isLocalHost ? false : { rejectUnauthorized: false },
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  pool.on("connect", () => {
    if (config.nodeEnv !== "production") console.log("DB: connected");
  });
  pool.on("error", (err) => {
    console.error("DB: unexpected error", err);
  });

  return pool;
}

/** Универсальный helper для SQL-запросов */
export const q: SqlQuery = async <T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params: unknown[] = []
) => {
  const t0 = Date.now();
  try {
    const res = await getPool().query<T>(text, params);
    if (getConfig().nodeEnv === "development") {
      console.log(`SQL ok (${Date.now() - t0}ms, rows=${res.rowCount}) ::`, text, params);
    }
    return res.rows;
  } catch (err) {
    if (err instanceof AppError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    console.error("DB ERROR:", message, { text, params });
    throw new AppError("Database operation failed", 500, { code: "db_error", details: { cause: message } });
  }
};

export async function closePool() {
  if (!pool) return;
  await pool.end();
  pool = null;
  if (getConfig().nodeEnv !== "production") console.log("DB: pool closed");
}
