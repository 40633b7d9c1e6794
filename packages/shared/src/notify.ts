/**
 * User-facing one-line messages (info / warn / error).
 *
 * Distinct from the logger: these are meant to be read by the person at the
 * terminal, not collected.
 */

import chalk from "chalk";

export type NotifyLevel = "info" | "warn" | "error";

export type NotifySink = (level: NotifyLevel, message: string) => void;

const PREFIX = "[finderkit]";

const paint: Record<NotifyLevel, (text: string) => string> = {
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

const stderrSink: NotifySink = (level, message) => {
  process.stderr.write(`${paint[level](PREFIX)} ${message}\n`);
};

let sink: NotifySink = stderrSink;

/**
 * Replace the message sink, returns the previous one.
 */
export function setNotifySink(next: NotifySink | undefined): NotifySink {
  const previous = sink;
  sink = next ?? stderrSink;
  return previous;
}

export const notify = {
  info(message: string): void {
    sink("info", message);
  },
  warn(message: string): void {
    sink("warn", message);
  },
  error(message: string): void {
    sink("error", message);
  },
};
