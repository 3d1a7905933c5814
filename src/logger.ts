/**
 * logger.ts — Shared pino logger for all modules
 *
 * A single pino instance is created on first import and exported here.
 * Every module should import `logger` and call `.child({ module: "<name>" })`
 * to create a scoped logger that includes the module name in every entry.
 *
 * Log level:
 *   • INPUT_ACTIONS_LOG_LEVEL env var — overrides everything (e.g. "debug", "silent")
 *   • NODE_ENV === "production" → "info"   (NDJSON, no pretty-print)
 *   • otherwise               → "debug"   (pino-pretty when attached to a terminal)
 */

import pino from "pino";

const isProd = process.env.NODE_ENV === "production";
const level  = process.env.INPUT_ACTIONS_LOG_LEVEL ?? (isProd ? "info" : "debug");
const pretty = !isProd && process.stdout.isTTY === true;

export const logger = pino(
  pretty
    ? {
        level,
        transport: {
          target:  "pino-pretty",
          options: { colorize: true },
        },
      }
    : { level }
);
