/**
 * Logger
 *
 * Structured logging on pino. Each component takes a child logger with
 * `Logger.for("Component")` and logs with pino's `(fields, message)` form:
 *
 * ```typescript
 * const log = Logger.for("Connection");
 * log.debug({ url }, "connecting");
 * ```
 *
 * The level comes from `LMLINK_LOG_LEVEL` (default `info`).
 *
 * @module @lmlink/kernel/logger
 */

import { pino, type Logger as PinoLogger, type LevelWithSilent } from "pino";

export const LOG_LEVEL_ENV = "LMLINK_LOG_LEVEL";

export type Log = PinoLogger;

const LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

export function resolveLogLevel(value: string | undefined): LevelWithSilent {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLevel(normalized) ? normalized : "info";
}

const root: PinoLogger = pino({
  name: "lmlink",
  level: resolveLogLevel(process.env[LOG_LEVEL_ENV]),
});

const children = new Map<string, Log>();

export const Logger = {
  /** Child logger tagged with a `component` field, one per component. */
  for(component: string): Log {
    let child = children.get(component);
    if (!child) {
      child = root.child({ component });
      children.set(component, child);
    }
    return child;
  },

  get level(): LevelWithSilent {
    return resolveLogLevel(root.level);
  },

  // pino children copy their level at creation, so update them explicitly
  setLevel(level: LevelWithSilent): void {
    root.level = level;
    for (const child of children.values()) {
      child.level = level;
    }
  },
};
