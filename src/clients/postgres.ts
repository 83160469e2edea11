import { Pool, type PoolClient } from "pg";
import { config } from "../config/index.js";
import { withRetries } from "./request-policy.js";

type HealthStatus = "ok" | "error";

export interface PostgresSingleton {
  pool: Pool;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

const STARTUP_RETRIES = 3;
const STARTUP_RETRY_DELAY_MS = 250;
const CONNECT_TIMEOUT_MS = 5000;

let singleton: PostgresSingleton | null = null;
let initPromise: Promise<PostgresSingleton> | null = null;

async function initialize(): Promise<PostgresSingleton> {
  if (!config.POSTGRES_URL) {
    throw new Error("POSTGRES_URL is not configured.");
  }

  const pool = new Pool({
    connectionString: config.POSTGRES_URL,
    max: 5,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: CONNECT_TIMEOUT_MS
  });

  await withRetries(
    async () => {
      await pool.query("SELECT 1");
    },
    { retries: STARTUP_RETRIES, retryDelayMs: STARTUP_RETRY_DELAY_MS }
  );

  console.info("[clients/postgres] initialized singleton");

  return {
    pool,
    async healthCheck() {
      try {
        await pool.query("SELECT 1");
        return { status: "ok" };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getPostgresClient(): Promise<PostgresSingleton> {
  if (singleton) {
    return singleton;
  }

  if (!initPromise) {
    initPromise = initialize();
  }

  try {
    singleton = await initPromise;
  } catch (error) {
    initPromise = null;
    throw error;
  }
  return singleton;
}

export async function shutdownPostgresClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  await singleton.pool.end();
  singleton = null;
  initPromise = null;
  console.info("[clients/postgres] shutdown complete");
}

export async function withTransaction<T>(operation: (client: PoolClient) => Promise<T>): Promise<T> {
  const { pool } = await getPostgresClient();
  const client = await pool.connect();

  try {
    await client.query("BEGIN");
    const result = await operation(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}

export function resetPostgresClientForTests(): void {
  singleton = null;
  initPromise = null;
}
