/**
 * Header and title composition.
 */

import { homedir } from "node:os";
import path from "node:path";
import { ConfigurationError } from "@finderkit/shared";
import { actionsHeader, DEFAULT_TOGGLE_FLAGS } from "./actions.js";
import { ansiFromHl } from "./highlight.js";
import { hasFlag } from "./rg.js";
import type { HeaderSection, NormalizedOptions, TitleSegment } from "./types.js";

export interface PathEnv {
  cwd: string;
  home: string;
}

const processEnv = (): PathEnv => ({ cwd: process.cwd(), home: homedir() });

function samePath(a: string, b: string): boolean {
  return path.resolve(a) === path.resolve(b);
}

/**
 * Display form of `cwd`: relative to the process cwd when inside it, `~`
 * for the home directory.
 */
export function normalizeCwd(cwd: string, env: PathEnv = processEnv()): string {
  let out = cwd;
  if (path.isAbsolute(out) && !samePath(out, env.cwd)) {
    const base = env.cwd.endsWith(path.sep) ? env.cwd : env.cwd + path.sep;
    if (out.startsWith(base)) out = out.slice(base.length);
  }
  if (out === env.home) return "~";
  if (out.startsWith(env.home + path.sep)) return `~${out.slice(env.home.length)}`;
  return out;
}

/**
 * Shorten every path component but the last to `len` characters.
 */
export function shortenPath(p: string, len = 1): string {
  const parts = p.split(path.sep);
  return parts
    .map((part, i) => {
      if (i === parts.length - 1 || part.length === 0) return part;
      // keep dot-directories readable
      const width = part.startsWith(".") ? len + 1 : len;
      return part.slice(0, width);
    })
    .join(path.sep);
}

function addTrailing(p: string): string {
  return p.endsWith(path.sep) ? p : p + path.sep;
}

interface SectionDef {
  textOpt: keyof Pick<
    NormalizedOptions,
    "cwdHeaderTxt" | "grepHeaderTxt" | "lspQueryHeaderTxt" | "regexHeaderTxt" | "interactiveHeaderTxt"
  >;
  text: string;
  /** Highlight applied to the value */
  colored: boolean;
  value(opts: NormalizedOptions, env: PathEnv): string | undefined;
}

const SECTIONS: Record<HeaderSection, SectionDef> = {
  cwd: {
    textOpt: "cwdHeaderTxt",
    text: "cwd: ",
    colored: true,
    value(opts, env) {
      // inside the process cwd only when asked for
      if (
        opts.cwdHeader === false ||
        (opts.cwdPrompt && opts.cwdHeader === undefined) ||
        (opts.cwdHeader === undefined && (!opts.cwd || samePath(opts.cwd, env.cwd)))
      ) {
        return undefined;
      }
      return normalizeCwd(opts.cwd ?? env.cwd, env);
    },
  },
  search: {
    textOpt: "grepHeaderTxt",
    text: "Grep string: ",
    colored: true,
    value: (opts) => (opts.search ? opts.search : undefined),
  },
  lsp_query: {
    textOpt: "lspQueryHeaderTxt",
    text: "Query: ",
    colored: true,
    value: (opts) => (opts.lspQuery ? opts.lspQuery : undefined),
  },
  regex_filter: {
    textOpt: "regexHeaderTxt",
    text: "Regex filter: ",
    colored: true,
    value(opts) {
      const filter = opts.regexFilter;
      if (typeof filter === "string") return filter;
      if (typeof filter === "function") return "<function>";
      if (filter) return `${filter.exclude ? "not " : ""}${filter.pattern}`;
      return undefined;
    },
  },
  actions: {
    textOpt: "interactiveHeaderTxt",
    text: "",
    colored: false,
    value: (opts) => (opts.noHeaderI ? undefined : actionsHeader(opts)),
  },
};

/**
 * Compose `--header` from the requested sections (default `["cwd"]`).
 */
export function setHeader(
  opts: NormalizedOptions,
  sections?: readonly HeaderSection[],
  env: PathEnv = processEnv(),
): NormalizedOptions {
  if (opts.cwdPrompt) {
    let prompt = normalizeCwd(opts.cwd ?? env.cwd, env);
    const shortenLen = opts.cwdPromptShortenLen;
    if (typeof shortenLen === "number" && prompt.length >= shortenLen) {
      prompt = shortenPath(prompt, opts.cwdPromptShortenVal ?? 1);
    }
    opts.prompt = addTrailing(prompt);
  }
  if (opts.noHeader || opts.headers === false) return opts;

  const headers = opts.headers ?? sections ?? ["cwd"];
  opts.headers = headers;

  const clauses: string[] = [];
  for (const name of headers) {
    const def = SECTIONS[name];
    if (!def) throw new ConfigurationError(`Unknown header section '${String(name)}'`);
    const value = def.value(opts, env);
    if (!value) continue;
    const label = opts[def.textOpt] ?? def.text;
    clauses.push(`${label}${def.colored ? ansiFromHl(opts.highlights, opts.hls.headerText, value) : value}`);
  }
  if (clauses.length > 0) opts.fzfOpts["--header"] = clauses.join(", ");
  return opts;
}

/**
 * Append ` h `, ` i `, ` f ` badges to the title for the hidden, no-ignore
 * and follow flags found in the command.
 */
export function setTitleFlags(opts: NormalizedOptions, titles: readonly string[]): NormalizedOptions {
  if (!titles.includes("cmd") || opts.winopts.titleFlags === false) return opts;
  const cmd = opts.cmd ?? opts.baseCmd;
  if (!cmd) return opts;

  const badges: string[] = [];
  const checks: [flag: string, badge: string][] = [
    [opts.toggleHiddenFlag ?? DEFAULT_TOGGLE_FLAGS.hidden, "h"],
    [opts.toggleIgnoreFlag ?? DEFAULT_TOGGLE_FLAGS.ignore, "i"],
    [opts.toggleFollowFlag ?? DEFAULT_TOGGLE_FLAGS.follow, "f"],
  ];
  for (const [flag, badge] of checks) {
    if (hasFlag(cmd, flag)) badges.push(` ${badge} `);
  }
  if (badges.length === 0) return opts;

  const current = opts.winopts.title;
  if (current === undefined) return opts;
  const title: TitleSegment[] = typeof current === "string" ? [[current, opts.hls.title]] : [...current];
  for (const badge of badges) title.push([badge, opts.hls.titleFlags]);
  opts.winopts.title = title;
  return opts;
}

/**
 * Field index expressions for `file:line:col:text` entries.
 */
export function setFieldIndex(opts: NormalizedOptions, idx?: string, expr?: string): NormalizedOptions {
  opts.lineFieldIndex ??= idx ?? "{2}";
  opts.fieldIndexExpr ??= expr ?? "{1}";
  return opts;
}
