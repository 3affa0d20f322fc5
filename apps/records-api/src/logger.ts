import pino from "pino";

// ─── Logger ───────────────────────────────────────────────
// Structured JSON in production, pino-pretty while developing,
// silent under the test runner unless LOG_LEVEL says otherwise.
const env = process.env.NODE_ENV;

export const logger = pino({
  level     : process.env.LOG_LEVEL || (env === "test" ? "silent" : "info"),
  transport : env !== "production" && env !== "test"
                ? { target: "pino-pretty" }
                : undefined,
});
