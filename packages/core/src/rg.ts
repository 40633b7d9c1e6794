/**
 * Search-command rewriting: glob parsing, argument insertion and flag toggles
 * for `rg` / `grep` command strings.
 */

import { escapeRegExp, shellEscape } from "@finderkit/shared";
import { QUERY_PLACEHOLDER } from "./query.js";

export const DEFAULT_GLOB_FLAG = "--iglob";
/** `foo -- *.ts !*.spec.ts` searches `foo` in matching files */
export const DEFAULT_GLOB_SEPARATOR = "\\s--";

export interface GlobOptions {
  globFlag?: string;
  globSeparator?: string;
  windows?: boolean;
}

export interface ParsedGlob {
  query: string;
  /** Glob flags to insert, absent when the query holds no separator */
  globArgs?: string;
}

/**
 * Split `<regex><separator><globs>` into the regex and `--iglob` arguments.
 * The last separator wins.
 */
export function globParse(query: string, opts: GlobOptions = {}): ParsedGlob {
  const separator = opts.globSeparator ?? DEFAULT_GLOB_SEPARATOR;
  const match = new RegExp(`^(.*)${separator}(.*)$`, "s").exec(query);
  if (!match) return { query };
  const flag = opts.globFlag ?? DEFAULT_GLOB_FLAG;
  const globArgs = match[2]
    .split(/\s+/)
    .filter((glob) => glob.length > 0)
    .map((glob) => `${flag} ${shellEscape(glob, opts.windows)}`)
    .join(" ");
  return { query: match[1], globArgs };
}

/** Positions args go in front of, in priority order */
const INSERT_MARKERS = [/\s-e(?=\s|$)/, /\s--(?=\s|$)/, new RegExp(`\\s${escapeRegExp(QUERY_PLACEHOLDER)}`)];

/**
 * Insert arguments before the pattern part of a search command (`-e`, `--`
 * or the query placeholder), or append them.
 */
export function rgInsertArgs(cmd: string, args: string): string {
  const extra = args.trim();
  if (extra.length === 0) return cmd;
  for (const marker of INSERT_MARKERS) {
    const match = marker.exec(cmd);
    if (match) {
      return `${cmd.slice(0, match.index)} ${extra}${cmd.slice(match.index)}`;
    }
  }
  return `${cmd} ${extra}`;
}

function flagPattern(flag: string): RegExp {
  return new RegExp(`(^|\\s)${escapeRegExp(flag)}(?=\\s|$)`);
}

export function hasFlag(cmd: string | undefined, flag: string): boolean {
  return cmd !== undefined && flagPattern(flag).test(cmd);
}

/**
 * Add or remove a flag right after the binary. `enabled` undefined toggles.
 */
export function toggleCmdFlag(cmd: string, flag: string, enabled?: boolean): string {
  const present = hasFlag(cmd, flag);
  const want = enabled ?? !present;
  if (want && !present) {
    return cmd.replace(/^(\S+)/, `$1 ${flag}`);
  }
  if (!want && present) {
    return cmd.replace(flagPattern(flag), "").replace(/\s{2,}/g, " ").trim();
  }
  return cmd;
}
