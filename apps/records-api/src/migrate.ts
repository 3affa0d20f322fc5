import { readFile } from "fs/promises";
import path from "path";
import { DbPool, withClient } from "./db";
import { logger } from "./logger";

export const SCHEMA_PATH = path.resolve(__dirname, "../db/schema.sql");

// Applies db/schema.sql. Every statement in it is idempotent.
export async function applySchema(pool: DbPool, schemaPath = SCHEMA_PATH): Promise<void> {
  const sql = await readFile(schemaPath, "utf8");
  await withClient(pool, undefined, (client) => client.query(sql));
  logger.info({ schemaPath }, "Schema applied");
}
