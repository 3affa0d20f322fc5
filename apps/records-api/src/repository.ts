import type { DailyRecord, NewDailyRecord } from "@daystore/types";
import { DbPool, withClient } from "./db";
import { StorageError, toStorageError } from "./errors";
import { jsonObjectSchema } from "./schemas";

export interface RecordRepository {
  create(record: NewDailyRecord, signal?: AbortSignal): Promise<DailyRecord>;
  getByDate(date: string, signal?: AbortSignal): Promise<DailyRecord[]>;
}

// Shape of a row as selected below: date already formatted by Postgres,
// data read back as text so decoding stays under our control, and
// BIGSERIAL ids arriving as strings (only ids up to 2^53 - 1 are served).
export type RecordRow = {
  id: string;
  date: string;
  data: string;
  created_at: Date;
};

const COLUMNS = `id, to_char(date, 'YYYY-MM-DD') AS date, data::text AS data, created_at`;

export const INSERT_RECORD_SQL = `INSERT INTO records (date, data)
       VALUES ($1, $2::jsonb)
       RETURNING ${COLUMNS}`;

export const SELECT_BY_DATE_SQL = `SELECT ${COLUMNS}
       FROM records
       WHERE date = $1
       ORDER BY id ASC`;

export function toRecord(row: RecordRow): DailyRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(row.data);
  } catch (err) {
    throw new StorageError(`record ${row.id}: malformed stored data`, { cause: err });
  }

  const data = jsonObjectSchema.safeParse(parsed);
  if (!data.success) throw new StorageError(`record ${row.id}: stored data is not a JSON object`);

  const id = Number(row.id);
  if (!Number.isSafeInteger(id)) throw new StorageError(`record ${row.id}: id is beyond the safe integer range`);

  return {
    id,
    date: `${row.date}T00:00:00Z`,
    data: data.data,
    created_at: row.created_at.toISOString(),
  };
}

export class PgRecordRepository implements RecordRepository {
  constructor(private readonly pool: DbPool) {}

  async create(record: NewDailyRecord, signal?: AbortSignal): Promise<DailyRecord> {
    try {
      const { rows } = await withClient(this.pool, signal, (client) =>
        client.query<RecordRow>(INSERT_RECORD_SQL, [record.date, JSON.stringify(record.data)]),
      );
      if (!rows.length) throw new StorageError("insert returned no row");
      return toRecord(rows[0]);
    } catch (err) {
      throw toStorageError(err);
    }
  }

  async getByDate(date: string, signal?: AbortSignal): Promise<DailyRecord[]> {
    try {
      const { rows } = await withClient(this.pool, signal, (client) =>
        client.query<RecordRow>(SELECT_BY_DATE_SQL, [date]),
      );
      return rows.map(toRecord);
    } catch (err) {
      throw toStorageError(err);
    }
  }
}
