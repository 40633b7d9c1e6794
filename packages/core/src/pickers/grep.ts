/**
 * Grep pickers: regex grep, live grep and their variants over `rg` (or
 * `grep` where ripgrep is missing).
 */

import path from "node:path";
import { createInterface } from "node:readline/promises";
import { Logger, escapeRegExp, notify, rgEscape, shellEscape } from "@finderkit/shared";
import { DEFAULT_TOGGLE_FLAGS } from "../actions.js";
import { hasExecutable } from "../capability.js";
import type { Finder, SessionResult } from "../finder.js";
import { setFieldIndex, setHeader, setTitleFlags } from "../header.js";
import { ansiFromHl } from "../highlight.js";
import { CommandPreviewer, defaultPreviewCommand } from "../previewer.js";
import { QUERY_PLACEHOLDER } from "../query.js";
import { DEFAULT_GLOB_SEPARATOR, globParse, rgInsertArgs, toggleCmdFlag } from "../rg.js";
import type { FinderOptions, LiveContentsFn, NormalizedOptions } from "../types.js";

const log = Logger.for("GrepPicker");

export const GREP_RESUME_KEY = "grep";

export const GREP_DEFAULTS: FinderOptions = {
  rgOpts: "--column --line-number --no-heading --color=always --smart-case --max-columns=4096 -e",
  grepOpts: "--binary-files=without-match --line-number --recursive --color=always --perl-regexp -e",
  rgGlob: true,
  multiprocess: true,
  inputPrompt: "Grep For❯ ",
  actions: {
    enter: "print",
    "ctrl-g": "grep-lgrep",
    "alt-i": "toggle-ignore",
    "alt-h": "toggle-hidden",
    "alt-f": "toggle-follow",
  },
};

export interface GrepEnv {
  /** `rg` found on PATH */
  hasRg: boolean;
  cwd: string;
  windows: boolean;
}

export interface GrepPickerDeps {
  /** Asks for the search string; `undefined` cancels */
  input?: (prompt: string) => Promise<string | undefined>;
  /** PATH lookup, `hasExecutable` by default */
  which?: (name: string) => Promise<boolean>;
}

const TOGGLES = [
  ["follow", "toggleFollowFlag", DEFAULT_TOGGLE_FLAGS.follow],
  ["hidden", "toggleHiddenFlag", DEFAULT_TOGGLE_FLAGS.hidden],
  ["noIgnore", "toggleIgnoreFlag", DEFAULT_TOGGLE_FLAGS.ignore],
] as const;

/** Flag groups added when a command lacks all of them */
const REQUIRED_FLAGS: Record<string, readonly (readonly string[])[]> = {
  grep: [["--line-number", "-n"], ["--recursive", "-r"]],
  rg: [["--line-number", "-n"], ["--column"]],
};

function hasAnyFlag(command: string, flags: readonly string[]): boolean {
  return flags.some((flag) => new RegExp(`(^|\\s)${escapeRegExp(flag)}`).test(command));
}

function relativeTo(p: string, cwd: string): string {
  const abs = path.resolve(cwd, p);
  const rel = path.relative(cwd, abs);
  if (rel === "") return ".";
  return rel.startsWith("..") || path.isAbsolute(rel) ? p : rel;
}

/**
 * Build the search command for `search`. `noEsc`: `true` keeps the query a
 * regex, `2` also skips shell quoting (the query is a placeholder).
 *
 * Returns `undefined` when no search tool is usable.
 */
export function getGrepCmd(
  opts: NormalizedOptions,
  search: string | undefined,
  noEsc: boolean | 2 | undefined,
  env: GrepEnv,
): string | undefined {
  if (opts.rawCmd) return opts.rawCmd;

  let command: string;
  let isRg = false;
  let isGrep = false;
  if (opts.cmd) {
    command = opts.cmd;
  } else if (env.hasRg) {
    isRg = true;
    command = `rg ${opts.rgOpts ?? ""}`;
  } else if (env.windows) {
    notify.warn("Grep requires installing 'rg' on Windows.");
    return undefined;
  } else {
    isGrep = true;
    command = `grep ${opts.grepOpts ?? ""}`;
  }

  for (const [key, flagOpt, fallback] of TOGGLES) {
    const enabled = opts[key];
    if (enabled === undefined) continue;
    command = toggleCmdFlag(command, opts[flagOpt] ?? fallback, enabled);
  }

  // toggle actions relaunch from here
  opts.baseCmd = command;

  if (opts.rgGlob && !/^rg/.test(command)) {
    // the numeric form is the picker default, stay quiet about it
    if (typeof opts.rgGlob !== "number" && !opts.silent) {
      notify.warn("'--glob|iglob' flags require 'rg', ignoring 'rgGlob' option.");
    }
    opts.rgGlob = false;
  }

  let query = search;
  if (opts.fnTransformCmd) {
    const transformed = opts.fnTransformCmd(search ?? "", opts.cmd, opts);
    if (transformed) {
      const [newCmd, newQuery] = transformed;
      opts.noEsc = true;
      opts.search = newQuery;
      return newCmd;
    }
  } else if (opts.rgGlob && query !== undefined) {
    const parsed = globParse(query, {
      globFlag: opts.globFlag,
      globSeparator: opts.globSeparator,
      windows: env.windows,
    });
    if (parsed.globArgs !== undefined) {
      let next = parsed.query;
      // the search mixes the regex and the globs, keep the regex escaped
      if (!(noEsc || opts.noEsc)) {
        next = rgEscape(next);
        opts.noEsc = true;
        const rest = new RegExp(`${opts.globSeparator ?? DEFAULT_GLOB_SEPARATOR}.*`, "s").exec(query)?.[0] ?? "";
        opts.search = `${next}${rest}`;
      }
      query = next;
      command = rgInsertArgs(command, parsed.globArgs);
    }
  }

  // filespec wins over filename, filename over searchPaths
  let searchPath = "";
  const filenameFlags = `--with-filename${isRg ? " --no-heading" : ""}`;
  if (opts.filespec) {
    searchPath = opts.filespec;
  } else if (opts.filename) {
    searchPath = shellEscape(opts.filename, env.windows);
    command = rgInsertArgs(command, filenameFlags);
  } else if (opts.searchPaths !== undefined) {
    const paths = typeof opts.searchPaths === "string" ? [opts.searchPaths] : opts.searchPaths;
    searchPath = paths.map((p) => shellEscape(relativeTo(path.normalize(p), env.cwd), env.windows)).join(" ");
    if (isGrep) command = rgInsertArgs(command, `${filenameFlags} -r`);
  }

  query ??= "";
  if (query.length > 0 && !(noEsc || opts.noEsc)) {
    // the header shows the escaped regex
    opts.noEsc = true;
    opts.search = rgEscape(query);
    query = opts.search;
  }

  const bin = path.basename(/^\S+/.exec(command)?.[0] ?? "");
  for (const flags of REQUIRED_FLAGS[bin] ?? []) {
    if (hasAnyFlag(command, flags)) continue;
    if (!opts.silent) {
      notify.info(`Added missing '${flags.join("|")}' flag to '${bin}'. Add 'silent=true' to hide this message.`);
    }
    command = rgInsertArgs(command, flags[0]);
  }

  // rg prints no column for an empty regex
  if (!opts.noColumnHide && query.length === 0) {
    command = command.replace(/\s--column/g, "");
  }

  if (!(noEsc === 2 || opts.noEsc === 2)) {
    query = shellEscape(query, env.windows);
  }

  command = `${command} ${query} ${searchPath}`;
  if (opts.filter) command = `${command} | ${opts.filter}`;
  return command;
}

async function promptInput(prompt: string): Promise<string | undefined> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    return await new Promise<string | undefined>((resolve) => {
      rl.once("close", () => resolve(undefined));
      rl.question(prompt).then(resolve, (err: unknown) => {
        log.debug({ err }, "input cancelled");
        resolve(undefined);
      });
    });
  } finally {
    rl.close();
  }
}

async function grepEnv(opts: NormalizedOptions, deps: GrepPickerDeps): Promise<GrepEnv> {
  const which = deps.which ?? hasExecutable;
  const hasRg = opts.rawCmd || opts.cmd ? false : await which("rg");
  return { hasRg, cwd: opts.cwd ?? process.cwd(), windows: opts.windows };
}

async function attachPreviewer(opts: NormalizedOptions, deps: GrepPickerDeps): Promise<void> {
  if (opts.previewer || opts.preview !== undefined) return;
  const which = deps.which ?? hasExecutable;
  opts.previewer = new CommandPreviewer({
    cmd: defaultPreviewCommand(await which("bat")),
    fileField: opts.fieldIndexExpr,
    lineField: opts.lineFieldIndex,
  });
}

function normalizeGrep(finder: Finder, opts: FinderOptions | NormalizedOptions): Promise<NormalizedOptions> {
  return finder.normalize(opts, { resumeKey: GREP_RESUME_KEY, defaults: GREP_DEFAULTS });
}

/**
 * Grep for a fixed search string (asked for when missing), then fuzzy match
 * the results.
 */
export async function grep(
  finder: Finder,
  opts: FinderOptions | NormalizedOptions = {},
  deps: GrepPickerDeps = {},
): Promise<SessionResult | undefined> {
  const o = await normalizeGrep(finder, opts);
  o.actTo = async (next) => {
    await liveGrep(finder, next, deps);
  };
  o.callFn = async (next) => {
    await grep(finder, next, deps);
  };

  if (o.search === undefined && !o.rawCmd) {
    if (o.resume) {
      o.search = "";
    } else {
      const search = await (deps.input ?? promptInput)(o.inputPrompt ?? "Grep For> ");
      if (search === undefined) return undefined;
      o.search = search;
      o.callOpts.search = search;
    }
  }

  if (o.finder.has("fzf") && !o.prompt && o.search) {
    o.prompt = `${ansiFromHl(o.highlights, o.hls.livePrompt, o.search)} > `;
  }

  const env = await grepEnv(o, deps);
  const cmd = getGrepCmd(o, o.search, o.noEsc, env);
  if (cmd === undefined) return undefined;
  o.cmd = cmd;
  // globs are already in the command
  o.rgGlob = false;

  setTitleFlags(o, ["cmd"]);
  setHeader(o, ["actions", "cwd", "search"]);
  setFieldIndex(o);
  await attachPreviewer(o, deps);
  return finder.exec(cmd, o);
}

async function runLiveGrep(
  finder: Finder,
  opts: FinderOptions | NormalizedOptions,
  callFn: (next: FinderOptions) => Promise<void>,
  deps: GrepPickerDeps,
): Promise<SessionResult | undefined> {
  const o = await normalizeGrep(finder, opts);
  o.actTo = async (next) => {
    await grep(finder, next, deps);
  };
  o.callFn = callFn;

  // coming from `grep` with an empty search: the typed query becomes the search
  if (o.search === undefined || (o.search.length === 0 && o.query)) {
    o.noEsc = undefined;
    o.search = o.query;
    o.callOpts = { ...o.callOpts, query: undefined, noEsc: undefined, search: o.query };
  }

  // the prompt holds the regex
  o.query = o.search ?? "";
  if (o.search && !o.noEsc) o.query = rgEscape(o.search);

  // glob parsing needs the helper process
  if (o.rgGlob && o.multiprocess) o.multiprocess = 1;

  const env = await grepEnv(o, deps);
  const cmd = getGrepCmd(o, QUERY_PLACEHOLDER, 2, env);
  if (cmd === undefined) return undefined;
  o.cmd = o.multiprocess ? cmd : undefined;

  setTitleFlags(o, ["cmd", "live"]);
  setHeader(o, ["actions", "cwd"]);
  setFieldIndex(o);
  await attachPreviewer(o, deps);

  const perQuery: LiveContentsFn = (args) => {
    o.noEsc = undefined;
    return getGrepCmd(o, args[0] ?? "", true, env);
  };
  return finder.live(o.cmd ?? perQuery, o);
}

/**
 * Search as you type: every query change reruns the search.
 */
export function liveGrep(
  finder: Finder,
  opts: FinderOptions | NormalizedOptions = {},
  deps: GrepPickerDeps = {},
): Promise<SessionResult | undefined> {
  return runLiveGrep(
    finder,
    opts,
    async (next) => {
      await liveGrep(finder, next, deps);
    },
    deps,
  );
}

/**
 * Live grep with the search command run by the finder itself: no glob
 * parsing and no line processing.
 */
export function liveGrepNative(
  finder: Finder,
  opts: FinderOptions = {},
  deps: GrepPickerDeps = {},
): Promise<SessionResult | undefined> {
  const native: FinderOptions = {
    ...opts,
    rgGlob: false,
    stripCwdPrefix: false,
    fileIgnorePatterns: [],
    fnTransform: undefined,
    multiprocess: 1,
  };
  return runLiveGrep(
    finder,
    native,
    async (next) => {
      await liveGrepNative(finder, next, deps);
    },
    deps,
  );
}

/**
 * Grep every line of the project, matching on the text only.
 */
export function grepProject(
  finder: Finder,
  opts: FinderOptions = {},
  deps: GrepPickerDeps = {},
): Promise<SessionResult | undefined> {
  const fzfOpts = { ...opts.fzfOpts };
  if (fzfOpts["--delimiter"] === undefined) fzfOpts["--delimiter"] = ":";
  if (fzfOpts["--nth"] === undefined) fzfOpts["--nth"] = "3..";
  return grep(finder, { ...opts, search: opts.search ?? "", fzfOpts }, deps);
}
