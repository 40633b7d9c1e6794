/**
 * Command dispatch
 *
 * `finderkit <command> [key=value ...]` runs one picker. Values are read as
 * JSON where they parse (`hidden=true`, `rgGlob=1`, `searchPaths=["src"]`)
 * and as plain text otherwise. Dotted keys set nested options
 * (`winopts.preview.hidden=true`, `fzfOpts.--nth=3..`).
 */

import { ConfigurationError, Logger, isFinderkitError, notify } from "@finderkit/shared";
import {
  grep,
  grepProject,
  liveGrep,
  liveGrepNative,
  type Finder,
  type FinderOptions,
  type GrepPickerDeps,
  type SessionResult,
} from "@finderkit/core";
import { commandOptionsSchema, unknownKeys } from "./schema.js";

const log = Logger.for("Cli");

export type CommandFn = (
  finder: Finder,
  opts: FinderOptions,
  deps: GrepPickerDeps,
) => Promise<SessionResult | undefined>;

export const COMMANDS: Record<string, CommandFn> = {
  grep: (finder, opts, deps) => grep(finder, opts, deps),
  live_grep: (finder, opts, deps) => liveGrep(finder, opts, deps),
  live_grep_native: (finder, opts, deps) => liveGrepNative(finder, opts, deps),
  grep_project: (finder, opts, deps) => grepProject(finder, opts, deps),
  resume: (finder, opts) => finder.resume({ query: opts.query, prompt: opts.prompt, header: opts.header }),
};

export function isCommand(name: string): boolean {
  return Object.hasOwn(COMMANDS, name);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function camelCase(segment: string): string {
  if (segment.startsWith("-")) return segment;
  return segment.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
}

/**
 * Value of one `key=value` argument. A bare key is `true`, an empty JSON
 * object or array stays text.
 */
export function parseValue(raw: string | undefined): unknown {
  if (raw === undefined) return true;
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return raw;
  }
  if (value === null) return undefined;
  if (Array.isArray(value) && value.length === 0) return raw;
  if (isRecord(value) && Object.keys(value).length === 0) return raw;
  return value;
}

/**
 * Fold `key=value` arguments into a nested options object.
 */
export function parseArgs(args: readonly string[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const arg of args) {
    const eq = arg.indexOf("=");
    const key = eq === -1 ? arg : arg.slice(0, eq);
    if (key.length === 0) {
      throw new ConfigurationError(`invalid argument '${arg}', expected key=value`);
    }
    const value = parseValue(eq === -1 ? undefined : arg.slice(eq + 1));
    if (value === undefined) continue;

    const path = key.split(".").map(camelCase);
    const last = path.pop() ?? key;
    let target = result;
    for (const segment of path) {
      const next = target[segment];
      if (isRecord(next)) {
        target = next;
      } else {
        const created: Record<string, unknown> = {};
        target[segment] = created;
        target = created;
      }
    }
    target[last] = value;
  }
  return result;
}

/**
 * Parse and validate command arguments. Unknown keys are dropped with a
 * warning, invalid values throw.
 */
export function parseCommandOptions(args: readonly string[]): FinderOptions {
  const raw = parseArgs(args);
  const unknown = unknownKeys(commandOptionsSchema, raw);
  if (unknown.length > 0) {
    log.warn({ unknown }, "unknown options ignored");
    notify.warn(`Ignoring unknown option${unknown.length > 1 ? "s" : ""}: ${unknown.join(", ")}`);
  }
  const parsed = commandOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw ConfigurationError.fromZod("Invalid command options", parsed.error);
  }
  return parsed.data;
}

export interface RunCommandContext {
  finder: Finder;
  deps?: GrepPickerDeps;
}

/**
 * Run `name` with its `key=value` arguments. Resolves to the process exit
 * code: 0 when something was selected, 1 otherwise.
 */
export async function runCommand(
  name: string,
  args: readonly string[],
  ctx: RunCommandContext,
): Promise<number> {
  const command = isCommand(name) ? COMMANDS[name] : undefined;
  if (!command) {
    notify.info(`invalid command '${name}'`);
    return 1;
  }

  let opts: FinderOptions;
  try {
    opts = parseCommandOptions(args);
  } catch (err) {
    if (isFinderkitError(err)) {
      notify.error(err.message);
      return 1;
    }
    throw err;
  }
  if (opts.debug) Logger.setLevel("debug");

  log.debug({ command: name, opts }, "running command");
  const result = await command(ctx.finder, opts, ctx.deps ?? {});
  return result?.selection && result.selection.items.length > 0 ? 0 : 1;
}
