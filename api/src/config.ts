// api/src/config.ts
import dotenv from "dotenv";
import { DEFAULT_SHARD_COUNT } from "./shardRouting.js";

export type EventStoreKind = "pg" | "memory";

export interface Config {
  port: number;
  databaseUrl: string | null;
  eventStore: EventStoreKind;
  shardCount: number;
  refreshIntervalMs: number;
  passivationTimeoutMs: number;
  refreshBatchSize: number;
  nodeEnv: "development" | "production" | "test";
}

type Env = Record<string, string | undefined>;

function positiveInt(env: Env, key: string, fallback: number, problems: string[]): number {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    problems.push(`${key} must be a positive integer (got "${raw}")`);
    return fallback;
  }
  return n;
}

export function loadConfig(env: Env): Config {
  const problems: string[] = [];

  const eventStore = (env.STATS_EVENT_STORE || "pg").toLowerCase();
  if (eventStore !== "pg" && eventStore !== "memory") {
    problems.push(`STATS_EVENT_STORE must be "pg" or "memory" (got "${env.STATS_EVENT_STORE}")`);
  }

  const databaseUrl = env.DATABASE_URL || null;
  if (eventStore === "pg" && !databaseUrl) {
    problems.push("DATABASE_URL must be set when STATS_EVENT_STORE=pg");
  }

  const nodeEnv = env.NODE_ENV || "development";
  if (nodeEnv !== "development" && nodeEnv !== "production" && nodeEnv !== "test") {
    problems.push(`NODE_ENV must be development, production or test (got "${nodeEnv}")`);
  }

  const config: Config = {
    port: positiveInt(env, "PORT", 8080, problems),
    databaseUrl,
    eventStore: eventStore === "memory" ? "memory" : "pg",
    shardCount: positiveInt(env, "STATS_SHARD_COUNT", DEFAULT_SHARD_COUNT, problems),
    refreshIntervalMs: positiveInt(env, "STATS_REFRESH_INTERVAL_MS", 1_000, problems),
    passivationTimeoutMs: positiveInt(env, "STATS_PASSIVATION_TIMEOUT_MS", 360_000, problems),
    refreshBatchSize: positiveInt(env, "STATS_REFRESH_BATCH_SIZE", 500, problems),
    nodeEnv: nodeEnv === "production" || nodeEnv === "test" ? nodeEnv : "development",
  };

  if (problems.length > 0) {
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }
  return config;
}

let cached: Config | null = null;

/** Reads `.env` once and validates the process environment. */
export function getConfig(): Config {
  if (!cached) {
    dotenv.config();
    cached = loadConfig(process.env);
  }
  return cached;
}
