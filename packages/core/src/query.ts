/**
 * Query placeholder handling for live commands.
 */

import type { FinderCapability } from "./capability.js";

/** Placeholder for the typed query inside a live command */
export const QUERY_PLACEHOLDER = "<query>";

/**
 * Field index expression the finder expands to the current query.
 *
 * fzf quotes `{q}` itself; skim does not, so its placeholder is wrapped in
 * double quotes or queries with single quotes break.
 */
export function fieldIndex(opts: { fieldIndex?: string; finder: FinderCapability }): string {
  if (opts.fieldIndex) return opts.fieldIndex;
  return opts.finder.isSkim ? `"{}"` : "{q}";
}

/**
 * Replace every `<query>` with `index`, or append `index` when the command
 * has no placeholder.
 */
export function expandQuery(cmd: string, index: string): string {
  if (cmd.includes(QUERY_PLACEHOLDER)) {
    return cmd.split(QUERY_PLACEHOLDER).join(index);
  }
  return `${cmd} ${index}`;
}
