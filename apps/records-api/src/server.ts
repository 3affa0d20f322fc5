/**
 * Entry point: config → pool → repository → handler → router → listener.
 *
 * An unreachable database at startup is fatal. SIGTERM/SIGINT stop
 * accepting connections, close the pool and exit.
 */

import { createApp } from "./app";
import { loadConfig } from "./config";
import { asDbPool, createPool, verifyConnection } from "./db";
import { logger } from "./logger";
import { applySchema } from "./migrate";
import { PgRecordRepository } from "./repository";

async function main() {
  const config = loadConfig();

  const pool = createPool(config.db);
  try {
    await verifyConnection(pool);
  } catch (err) {
    logger.fatal({ err }, "Cannot connect to database");
    process.exit(1);
  }

  const db = asDbPool(pool);
  if (config.db.migrate) await applySchema(db);

  const app = createApp({
    repository: new PgRecordRepository(db),
    requestTimeoutMs: config.requestTimeoutMs,
    bodyLimit: config.bodyLimit,
  });

  const { host, port } = config.listen;
  const onListening = () => logger.info(`Listening on ${config.addr}`);
  const server = host ? app.listen(port, host, onListening) : app.listen(port, onListening);
  server.on("error", (err) => {
    logger.fatal({ err }, "Server startup failed");
    process.exit(1);
  });

  // ─── Graceful Shutdown ────────────────────────────────────
  const shutdown = (signal: string) => {
    logger.info(`${signal} — shutting down`);
    server.close(() => {
      pool
        .end()
        .then(() => process.exit(0))
        .catch((err) => {
          logger.error({ err }, "Error closing pool");
          process.exit(1);
        });
    });
    setTimeout(() => process.exit(1), config.shutdownTimeoutMs).unref();
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal error during startup");
  process.exit(1);
});
