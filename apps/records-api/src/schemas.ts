import { z } from "zod";
import type { JsonObject } from "@daystore/types";

// ---------- JSON ----------
export const MAX_JSON_DEPTH = 256;

// jsonb refuses both of these, so they are caught here rather than as a 500.
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

function stringProblem(value: string): string | undefined {
  if (value.includes("\u0000")) return "strings cannot contain \\u0000";
  if (LONE_SURROGATE.test(value)) return "strings cannot contain unpaired surrogates";
  return undefined;
}

/**
 * Walks a parsed JSON value without recursion and reports the first thing
 * that cannot be stored: nesting past MAX_JSON_DEPTH, a NUL or unpaired
 * surrogate in a key or string, or a value JSON has no spelling for.
 */
export function findJsonProblem(root: unknown): string | undefined {
  const stack: Array<{ value: unknown; depth: number }> = [{ value: root, depth: 0 }];

  for (let item = stack.pop(); item; item = stack.pop()) {
    const { value, depth } = item;

    if (typeof value === "string") {
      const problem = stringProblem(value);
      if (problem) return problem;
      continue;
    }
    if (typeof value === "number") {
      if (!Number.isFinite(value)) return "numbers must be finite";
      continue;
    }
    if (value === null || typeof value === "boolean") continue;
    if (typeof value !== "object") return `unsupported value of type ${typeof value}`;

    if (depth >= MAX_JSON_DEPTH) return `nested deeper than ${MAX_JSON_DEPTH} levels`;

    if (Array.isArray(value)) {
      for (const child of value) stack.push({ value: child, depth: depth + 1 });
      continue;
    }
    for (const [key, child] of Object.entries(value)) {
      const problem = stringProblem(key);
      if (problem) return problem;
      stack.push({ value: child, depth: depth + 1 });
    }
  }

  return undefined;
}

function isStorableObject(value: Record<string, unknown>, ctx: z.RefinementCtx): value is JsonObject {
  const problem = findJsonProblem(value);
  if (problem) ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
  return problem === undefined;
}

// Arrays and null are rejected: a payload is always a JSON object.
export const jsonObjectSchema = z.record(z.unknown()).superRefine(isStorableObject);

// ---------- Dates ----------
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

// Strict YYYY-MM-DD that names a real day (no 2023-02-29, no 2024-13-01).
export function isCalendarDate(value: string): boolean {
  const match = DATE_RE.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1) return false;

  const d = new Date(0);
  d.setUTCFullYear(year, month - 1, day);
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

export const calendarDateSchema = z
  .string()
  .refine(isCalendarDate, { message: "must be a calendar date in YYYY-MM-DD format" });

// ---------- Requests ----------
export const createRecordSchema = z.object({
  date: calendarDateSchema,
  data: jsonObjectSchema,
});

export type CreateRecordBody = z.infer<typeof createRecordSchema>;

// "date: must be a calendar date in YYYY-MM-DD format; data: Required"
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
