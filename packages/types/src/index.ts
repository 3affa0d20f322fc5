export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export interface JsonObject {
  [key: string]: JsonValue;
}

// What a client submits: the server assigns id and created_at.
export interface NewDailyRecord {
  date: string; // YYYY-MM-DD
  data: JsonObject;
}

export interface DailyRecord {
  id: number;
  date: string; // RFC 3339, UTC midnight
  data: JsonObject;
  created_at: string;
}
