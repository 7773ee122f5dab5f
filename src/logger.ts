import pino from "pino";

// ── Structured Logger: pino ─────────────────────────────
// JSON output in production. Pretty output in dev or with LOG_PRETTY=true.
// Tests run silent unless LOG_LEVEL says otherwise.

const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test";
const isPretty =
  process.env.LOG_PRETTY === "true" || (!isProduction && !isTest);

export const log = pino({
  level: process.env.LOG_LEVEL || (isTest ? "silent" : "info"),
  ...(isPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss",
            ignore: "pid,hostname",
          },
        },
      }
    : {}),
});
