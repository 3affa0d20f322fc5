import { Pool, QueryResultRow } from "pg";
import { DbConfig } from "./config";
import { logger } from "./logger";

// ─── Pool seam ────────────────────────────────────────────
// The repository sees only these two; asDbPool() adapts a pg.Pool.
export interface DbClient {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<{ rows: R[] }>;
  // Passing an error (or true) makes pg destroy the connection
  // instead of handing it back to the pool.
  release(err?: Error | boolean): void;
}

export interface DbPool {
  connect(): Promise<DbClient>;
}

// ─── DB Pool ──────────────────────────────────────────────
// One pool per process, created at startup and closed at shutdown.
export function createPool(config: DbConfig): Pool {
  const pool = new Pool({
    connectionString: config.url,
    max: config.poolMax,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: config.connectTimeoutMs,
    statement_timeout: config.statementTimeoutMs > 0 ? config.statementTimeoutMs : undefined,
  });

  pool.on("error", (err) => logger.error({ err }, "Idle pool client error"));
  return pool;
}

// Fails fast when the database is unreachable at startup.
export async function verifyConnection(pool: Pool): Promise<void> {
  await pool.query("SELECT 1");
}

export function asDbPool(pool: Pool): DbPool {
  return {
    async connect() {
      const client = await pool.connect();
      return {
        query<R extends QueryResultRow>(text: string, values?: unknown[]) {
          return client.query<R, unknown[]>(text, values);
        },
        release(err?: Error | boolean) {
          client.release(err);
        },
      };
    },
  };
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error("operation aborted");
}

/**
 * Runs `fn` on a pooled client and always gives the client back.
 *
 * If `signal` aborts while `fn` is still running, the returned promise
 * rejects with the abort reason right away and the client is released
 * with that error, so pg closes the connection rather than recycling
 * one that is still busy with the abandoned query.
 */
export async function withClient<T>(
  pool: DbPool,
  signal: AbortSignal | undefined,
  fn: (client: DbClient) => Promise<T>,
): Promise<T> {
  if (signal?.aborted) throw abortReason(signal);

  const client = await pool.connect();
  if (signal?.aborted) {
    client.release();
    throw abortReason(signal);
  }

  return new Promise<T>((resolve, reject) => {
    let released = false;

    const release = (err?: Error) => {
      if (released) return;
      released = true;
      signal?.removeEventListener("abort", onAbort);
      client.release(err);
    };

    const onAbort = () => {
      const err = signal ? abortReason(signal) : new Error("operation aborted");
      release(err);
      reject(err);
    };

    signal?.addEventListener("abort", onAbort, { once: true });

    fn(client).then(
      (value) => {
        release();
        resolve(value);
      },
      (err: unknown) => {
        release();
        reject(err);
      },
    );
  });
}
