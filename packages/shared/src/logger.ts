/**
 * Logger - Structured logging with configurable levels
 *
 * Thin layer over pino. Each module asks for a named child once at import
 * time (`const log = Logger.for("Finder")`) and logs `(fields, message)`.
 *
 * Output goes to stderr: stdout belongs to the finder selection.
 */

import pino from "pino";
import type { Logger as PinoLogger, LevelWithSilent } from "pino";

export type LogLevel = LevelWithSilent;

export type ComponentLogger = PinoLogger;

const LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.FINDERKIT_LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : "warn";
}

const root = pino(
  { name: "finderkit", level: initialLevel() },
  pino.destination({ fd: 2, sync: true }),
);

// pino children copy the parent level when created, keep them in step
const children = new Map<string, ComponentLogger>();

export const Logger = {
  /**
   * Get (or create) the logger for a component.
   */
  for(component: string): ComponentLogger {
    let child = children.get(component);
    if (!child) {
      child = root.child({ component });
      children.set(component, child);
    }
    return child;
  },

  get level(): LogLevel {
    const current = root.level;
    return isLogLevel(current) ? current : "warn";
  },

  setLevel(level: LogLevel): void {
    root.level = level;
    for (const child of children.values()) {
      child.level = level;
    }
  },

  isLogLevel,
};
