/**
 * Command Stringifier
 *
 * Turns any contents value into the shell command the finder runs as its
 * input source. Static lists are materialized inline (or in a temp file when
 * large), producers go through the shell bridge.
 */

import fs from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Logger, shellEscape } from "@finderkit/shared";
import type { ShellBridge } from "./bridge/bridge.js";
import { combineContents, isSourceList } from "./contents.js";
import type { Contents, Entry, NormalizedOptions } from "./types.js";

const log = Logger.for("Stringify");

/** Lists up to this many bytes are passed on the command line */
export const INLINE_LIST_LIMIT = 32 * 1024;

let tempDir: string | undefined;
const tempFiles = new Set<string>();

function writeTempList(text: string): string {
  tempDir ??= fs.mkdtempSync(join(tmpdir(), "finderkit-"));
  const file = join(tempDir, `list-${tempFiles.size + 1}.txt`);
  fs.writeFileSync(file, text);
  tempFiles.add(file);
  return file;
}

/** Remove the temp files written for large lists. */
export function disposeTempLists(): void {
  if (tempDir) {
    fs.rmSync(tempDir, { recursive: true, force: true });
    log.debug({ files: tempFiles.size }, "removed temp lists");
  }
  tempDir = undefined;
  tempFiles.clear();
}

/**
 * Command that prints `entries`, one per line.
 */
export function stringifyList(entries: readonly Entry[], opts: Pick<NormalizedOptions, "windows" | "fnTransform">): string {
  const lines: string[] = [];
  for (const entry of entries) {
    const line = opts.fnTransform ? opts.fnTransform(String(entry)) : String(entry);
    if (line !== undefined) lines.push(line);
  }
  const text = lines.length > 0 ? lines.join("\n") + "\n" : "";

  if (!opts.windows && Buffer.byteLength(text) <= INLINE_LIST_LIMIT) {
    return `printf %s ${shellEscape(text, false)}`;
  }
  const file = writeTempList(text);
  return opts.windows ? `type ${shellEscape(file, true)}` : `cat ${shellEscape(file, false)}`;
}

/**
 * Stringify contents for the finder. A command string passes through, a
 * source list is combined first.
 */
export function stringify(contents: Contents, opts: NormalizedOptions, bridge: ShellBridge): string {
  if (typeof contents === "string") return contents;
  if (typeof contents === "function") return bridge.stringify(contents, opts);
  if (isSourceList(contents)) return stringify(combineContents(contents), opts, bridge);
  return stringifyList(contents, opts);
}
