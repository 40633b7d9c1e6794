/**
 * Highlight groups → ANSI / hex colors.
 *
 * Groups are named entries in `opts.highlights` (`{ fg, bg }` hex colors).
 * Text sent to the finder is always colored with truecolor escapes (the
 * finder runs with `--ansi`), independent of what stdout supports.
 */

import { Chalk } from "chalk";
import type { HighlightColors, HighlightTable } from "./types.js";

const ansi = new Chalk({ level: 3 });

/**
 * Resolve the first group (of `groups`) that defines `attr`.
 */
export function hexFromHl(
  highlights: HighlightTable,
  groups: string | readonly string[],
  attr: keyof HighlightColors,
): string | undefined {
  const list = typeof groups === "string" ? [groups] : groups;
  for (const group of list) {
    const color = highlights[group]?.[attr];
    if (color) return color;
  }
  return undefined;
}

/**
 * Wrap `text` in the group's foreground color, plain when undefined.
 */
export function ansiFromHl(highlights: HighlightTable, group: string | undefined, text: string): string {
  if (!group) return text;
  const fg = highlights[group]?.fg;
  return fg ? ansi.hex(fg)(text) : text;
}
