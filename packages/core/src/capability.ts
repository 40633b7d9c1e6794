/**
 * Finder capability detection.
 *
 * Every dialect/version branch in the compilers asks one question:
 * `finder.has("fzf", [0, 36])`. The descriptor is built by probing
 * `<bin> --version`; the result is cached per binary.
 */

import { execFile } from "node:child_process";
import { basename } from "node:path";
import { promisify } from "node:util";
import {
  EnvironmentError,
  IS_WINDOWS,
  Logger,
  formatVersion,
  parseVersion,
  versionAtLeast,
  type Version,
} from "@finderkit/shared";

const execFileAsync = promisify(execFile);

const log = Logger.for("Capability");

export type FinderDialect = "fzf" | "sk";

export class FinderCapability {
  constructor(
    readonly dialect: FinderDialect,
    readonly version: Version,
    readonly bin: string = dialect,
  ) {}

  get isSkim(): boolean {
    return this.dialect === "sk";
  }

  /**
   * Whether the active finder is `dialect` and at least `min` (when given).
   */
  has(dialect: FinderDialect, min?: readonly number[]): boolean {
    if (this.dialect !== dialect) return false;
    return min ? versionAtLeast(this.version, min) : true;
  }

  toString(): string {
    return `${this.dialect} ${formatVersion(this.version)}`;
  }
}

/**
 * Gates used across the compilers, kept together so version bumps land in
 * one place.
 */
export const FZF_GATES = {
  previewAltLayout: [0, 31],
  separatorColor: [0, 35],
  startEvent: [0, 35],
  borderLabel: [0, 35],
  reloadBind: [0, 36],
  zeroEvent: [0, 40],
  scrollbarColor: [0, 41],
  transform: [0, 45],
  windowsEmptyQuery: [0, 51],
  printAction: [0, 53],
  tmuxPopup: [0, 53],
} as const satisfies Record<string, readonly number[]>;

const cache = new Map<string, FinderCapability>();

function dialectOf(bin: string, versionOutput: string): FinderDialect {
  const name = basename(bin).replace(/\.exe$/i, "");
  if (name === "sk" || name.startsWith("sk-") || /^sk\s/.test(versionOutput)) return "sk";
  return "fzf";
}

/**
 * Build a descriptor from the output of `<bin> --version`.
 */
export function parseFinderVersion(bin: string, output: string): FinderCapability {
  const version = parseVersion(output);
  if (!version) {
    throw new EnvironmentError(`Unable to parse version of '${bin}' from: ${output.trim()}`, { bin });
  }
  return new FinderCapability(dialectOf(bin, output), version, bin);
}

/**
 * Detect the finder behind `bin`. Cached: safe to call per session.
 */
export async function detectFinder(bin = "fzf"): Promise<FinderCapability> {
  const hit = cache.get(bin);
  if (hit) return hit;

  let stdout: string;
  try {
    ({ stdout } = await execFileAsync(bin, ["--version"], { windowsHide: true }));
  } catch (err) {
    throw new EnvironmentError(`'${bin}' is not executable, is it installed?`, {
      bin,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const capability = parseFinderVersion(bin, stdout);
  log.debug({ bin, finder: capability.toString() }, "detected finder");
  cache.set(bin, capability);
  return capability;
}

/** Reset the capability cache (for testing). */
export function resetFinderCache(): void {
  cache.clear();
  executables.clear();
}

const executables = new Map<string, boolean>();

/**
 * Check if a binary exists on PATH.
 */
export async function hasExecutable(name: string): Promise<boolean> {
  const hit = executables.get(name);
  if (hit !== undefined) return hit;
  let found: boolean;
  try {
    await execFileAsync(IS_WINDOWS ? "where" : "which", [name], { windowsHide: true });
    found = true;
  } catch {
    found = false;
  }
  executables.set(name, found);
  return found;
}
