import pino from "pino";

/** Redact sensitive values from logs. */
const REDACTED_KEYS = [
  "DISCORD_TOKEN",
  "ENHANCER_API_KEY",
  "token",
  "apiKey",
  "authorization",
  "headers.authorization",
  "headers[\"x-api-key\"]",
  "password",
  "secret",
];

const isTest = process.env.NODE_ENV === "test";

// The level is read straight from the environment so that modules can log
// before (or without) the settings object being built.
export const logger = pino(
  {
    level: process.env.LOG_LEVEL ?? (isTest ? "silent" : "info"),
    redact: {
      paths: REDACTED_KEYS,
      censor: "[REDACTED]",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  isTest
    ? undefined
    : pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
        },
      }),
);

/** Apply the configured level once settings are loaded. */
export function setLogLevel(level: string): void {
  logger.level = level;
}
