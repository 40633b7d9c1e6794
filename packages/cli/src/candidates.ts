/**
 * Shell completion candidates for `finderkit complete "<line>"`.
 */

import { DEFAULT_GLOBALS, DEFAULT_PREVIEW_WINOPTS, GREP_DEFAULTS, type FinderOptions } from "@finderkit/core";
import { COMMANDS } from "./cli.js";

const PICKER_DEFAULTS: Record<string, FinderOptions> = {
  grep: GREP_DEFAULTS,
  live_grep: GREP_DEFAULTS,
  live_grep_native: GREP_DEFAULTS,
  grep_project: GREP_DEFAULTS,
  resume: {},
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && Object.getPrototypeOf(value) === Object.prototype;
}

/** Dotted paths of every leaf under `value` */
export function flattenKeys(value: Record<string, unknown>, prefix = ""): string[] {
  const keys: string[] = [];
  for (const [key, child] of Object.entries(value)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (isPlainObject(child) && Object.keys(child).length > 0) {
      keys.push(...flattenKeys(child, path));
    } else {
      keys.push(path);
    }
  }
  return keys;
}

function optionKeys(command: string): string[] {
  const keys = new Set<string>(["query"]);
  // actions are callbacks, not settable from the command line
  const { actions: _actions, ...defaults } = PICKER_DEFAULTS[command] ?? {};
  for (const key of flattenKeys({ ...defaults })) keys.add(key);
  for (const key of flattenKeys({ preview: { ...DEFAULT_PREVIEW_WINOPTS } }, "winopts")) keys.add(key);
  for (const key of flattenKeys({ ...DEFAULT_GLOBALS.keymap }, "keymap")) keys.add(key);
  for (const key of flattenKeys({ ...DEFAULT_GLOBALS.fzfOpts }, "fzfOpts")) keys.add(key);
  return [...keys].sort();
}

/**
 * Candidates for the last word of `line`: command names for the first
 * argument, option keys of the command after it.
 */
export function candidates(line: string): string[] {
  const words = line.trimStart().split(/\s+/);
  const current = words.length > 1 ? (words.at(-1) ?? "") : "";
  // words[0] is the program name
  if (words.length <= 2) {
    return Object.keys(COMMANDS)
      .filter((name) => name.startsWith(current))
      .sort();
  }
  const command = words[1] ?? "";
  return optionKeys(command).filter((key) => key.startsWith(current));
}
