/**
 * Core types: the options bag, contents, actions and collaborator contracts.
 */

import type { FinderCapability } from "./capability.js";
import type { Previewer } from "./previewer.js";

// ============================================================================
// Contents
// ============================================================================

export type Entry = string | number;

/**
 * Receives one entry per call; `undefined` signals end-of-stream. The optional
 * callback fires once the entry has been flushed downstream.
 */
export type EmitFn = (entry?: Entry, flushed?: () => void) => void;

/** Push-based producer: invoked once, calls `emit` until it emits `undefined`. */
export type ContentsProducer = (emit: EmitFn) => void | Promise<void>;

export interface ContentsSource {
  contents: readonly Entry[] | ContentsProducer;
  prefix?: string;
}

export type Contents = readonly Entry[] | ContentsProducer | string | readonly ContentsSource[];

/**
 * Live contents callback: receives the finder's expanded placeholders
 * (`{q}` → `[query]`) and returns what to feed for that query.
 */
export type LiveContentsFn = (
  args: string[],
) =>
  | string
  | readonly Entry[]
  | ContentsProducer
  | undefined
  | Promise<string | readonly Entry[] | ContentsProducer | undefined>;

export type LiveContents = string | LiveContentsFn;

// ============================================================================
// Actions
// ============================================================================

export interface ActionContext {
  /** Key that triggered the action (`enter`, `ctrl-v`, ...) */
  key: string;
  /** Relaunch the most recent session */
  resume(): Promise<void>;
}

export type ActionFn = (
  selected: string[],
  opts: NormalizedOptions,
  ctx: ActionContext,
) => void | Promise<void>;

export type HeaderLabel = string | ((opts: NormalizedOptions) => string);

export interface ActionDescriptor {
  fn: ActionFn;
  /** Run as `execute-silent(...)+reload(...)` without leaving the finder */
  reload?: boolean;
  /** Run as `execute-silent(...)`, the finder stays open */
  execSilent?: boolean;
  noclose?: boolean;
  reuse?: boolean;
  /** Finder actions to run before the action, e.g. `select-all` */
  prefix?: string;
  /** Finder actions to run after the action */
  postfix?: string;
  /** Placeholder passed to the callback (default `{+}`) */
  fieldIndex?: string;
  /** Header label override, `false` hides it */
  header?: HeaderLabel | false;
  desc?: string;
  /** Set by the bind compiler: the bind carries the behaviour, skip for expect/header */
  ignore?: boolean;
}

/** Positional chain, run in order (legacy "reload" uses `[fn, resume]`). */
export type ActionChain = readonly ActionFn[];

export type BuiltinActionName =
  | "print"
  | "abort"
  | "resume"
  | "toggle-ignore"
  | "toggle-hidden"
  | "toggle-follow"
  | "grep-lgrep";

export type Action = ActionFn | ActionDescriptor | ActionChain | BuiltinActionName;

/** Actions after normalization: names resolved to their functions */
export type ResolvedAction = ActionFn | ActionDescriptor | ActionChain;

export type ActionTable = Record<string, Action | false | undefined>;

export type ResolvedActionTable = Record<string, ResolvedAction>;

// ============================================================================
// Keymap / flags / colors
// ============================================================================

export type BindFn = (args: string[]) => void | Promise<void>;

export type KeymapBind = string | { bind: string; desc?: string } | BindFn | false;

export interface Keymap {
  fzf: Record<string, KeymapBind>;
}

export type FlagValue = string | number | boolean | null | undefined;

export type FzfOpts = Record<string, FlagValue | readonly (string | number)[]>;

/** `[attribute, group | groups, ...raw]`, e.g. `["fg", ["Comment", "Normal"], "bold"]` */
export type ColorSpec = readonly [attr: "fg" | "bg", groups: string | readonly string[], ...raw: string[]];

export type ColorTable = Record<string, ColorSpec | string | false>;

export interface HighlightColors {
  fg?: string;
  bg?: string;
}

export type HighlightTable = Record<string, HighlightColors>;

export interface HighlightNames {
  headerBind: string;
  headerText: string;
  livePrompt: string;
  title: string;
  titleFlags: string;
}

// ============================================================================
// Preview
// ============================================================================

export type PreviewFn = (args: string[]) => string | readonly string[] | Promise<string | readonly string[]>;

export interface PreviewSpec {
  fn: PreviewFn;
  /** `cmd`: fn returns a command to execute; `data`: fn returns the text */
  type?: "cmd" | "data";
  fieldIndex?: string;
}

export type PreviewSource = string | PreviewFn | PreviewSpec;

export type BorderStyle =
  | "none"
  | "single"
  | "double"
  | "rounded"
  | "solid"
  | "empty"
  | "shadow"
  | "bold"
  | "block"
  | "solidblock"
  | "thicc"
  | "thiccc"
  | "thicccc";

export type BorderOption =
  | BorderStyle
  | boolean
  | string
  | ((meta: { type: "fzf"; name: "prev"; layout: string }) => string | undefined);

export interface PreviewWinOpts {
  hidden: boolean;
  wrap: boolean;
  border?: BorderOption;
  layout: "flex" | "horizontal" | "vertical";
  horizontal: string;
  vertical: string;
  flipColumns: number;
}

export type TitleSegment = readonly [text: string, hl?: string];

export interface WinOpts {
  title?: string | TitleSegment[];
  titleFlags?: boolean;
  fullscreen?: boolean;
  preview: PreviewWinOpts;
}

// ============================================================================
// Options bag
// ============================================================================

export type HeaderSection = "cwd" | "search" | "lsp_query" | "regex_filter" | "actions";

export type RegexFilter = string | { pattern: string; exclude?: boolean } | ((entry: string) => boolean);

export type EntryTransform = (entry: string) => string | undefined;

export interface SessionContext {
  /** Process cwd when the session began */
  cwd: string;
  startedAt: number;
}

/**
 * Caller-facing options. Everything is optional; `normalizeOptions` fills the
 * defaults and produces a `NormalizedOptions`.
 */
export interface FinderOptions {
  cwd?: string;
  prompt?: string;
  header?: string;
  query?: string;
  preview?: PreviewSource;
  previewer?: Previewer;
  previewOffset?: string;

  /** Finder binary (`fzf`, `sk`, a path) */
  fzfBin?: string;
  /** Active finder; detected from `fzfBin` when omitted */
  finder?: FinderCapability;
  /** 1: wrap with fzf-tmux, 2: fzf `--tmux` popup */
  tmuxMode?: 0 | 1 | 2;
  fzfTmuxOpts?: Record<string, string>;

  fzfOpts?: FzfOpts;
  fzfColors?: ColorTable;
  highlights?: HighlightTable;
  hls?: Partial<HighlightNames>;
  fzfArgs?: string | readonly string[];
  fzfRawArgs?: string | readonly string[];
  fzfCliArgs?: string | readonly string[];

  actions?: ActionTable;
  keymap?: Partial<Keymap>;
  winopts?: Partial<Omit<WinOpts, "preview">> & { preview?: Partial<PreviewWinOpts> };

  multiprocess?: boolean | 1;
  /** In live mode the multiprocess helper receives the query as its last argv */
  argvExpr?: boolean;
  execEmptyQuery?: boolean;
  queryDelay?: number;
  stderrToStdout?: boolean;
  silentFail?: boolean;
  fieldIndex?: string;
  fieldIndexExpr?: string;
  lineFieldIndex?: string;

  // entry processing
  fnTransform?: EntryTransform;
  fnPreprocess?: (opts: NormalizedOptions) => void;
  fnPostprocess?: (opts: NormalizedOptions) => void;
  fnSelected?: (selection: Selection, opts: NormalizedOptions) => void | Promise<void>;
  stripCwdPrefix?: boolean;
  fileIgnorePatterns?: readonly string[];

  // headers
  headers?: readonly HeaderSection[] | false;
  noHeader?: boolean;
  noHeaderI?: boolean;
  headerPrefix?: string;
  headerSeparator?: string;
  cwdHeader?: boolean;
  cwdPrompt?: boolean;
  cwdPromptShortenLen?: number;
  cwdPromptShortenVal?: number;
  cwdHeaderTxt?: string;
  grepHeaderTxt?: string;
  lspQueryHeaderTxt?: string;
  regexHeaderTxt?: string;
  interactiveHeaderTxt?: string;
  search?: string;
  lspQuery?: string;
  regexFilter?: RegexFilter;

  // grep
  cmd?: string;
  rawCmd?: string;
  rgOpts?: string;
  grepOpts?: string;
  rgGlob?: boolean | number;
  globFlag?: string;
  globSeparator?: string;
  noEsc?: boolean | 2;
  filespec?: string;
  filename?: string;
  searchPaths?: string | readonly string[];
  filter?: string;
  noColumnHide?: boolean;
  silent?: boolean;
  toggleHiddenFlag?: string;
  toggleIgnoreFlag?: string;
  toggleFollowFlag?: string;
  hidden?: boolean;
  noIgnore?: boolean;
  follow?: boolean;
  fnTransformCmd?: (query: string, cmd: string | undefined, opts: NormalizedOptions) => [string, string] | undefined;
  ripgrepConfigPath?: string;
  inputPrompt?: string;

  // resume
  resume?: boolean;
  noResume?: boolean;
  resumeKey?: string;

  /** Quote for cmd.exe instead of sh (defaults to the host platform) */
  windows?: boolean;

  /** `false`: compile only, do not launch (used to merge pickers) */
  start?: boolean;
  autoclose?: boolean;
  debug?: boolean | "verbose";
}

export interface NormalizedOptions
  extends Omit<FinderOptions, "fzfOpts" | "actions" | "keymap" | "winopts" | "hls" | "finder"> {
  readonly normalized: true;
  finder: FinderCapability;
  fzfOpts: FzfOpts;
  actions: ResolvedActionTable;
  keymap: Keymap;
  winopts: WinOpts;
  hls: HighlightNames;
  highlights: HighlightTable;
  resumeKey: string;
  windows: boolean;

  /** Extra `--bind=...` and flag strings produced by the compilers */
  extraArgs: string[];
  /** Stringified contents, kept for unhide */
  contents?: string;
  /** Base command before query/glob rewriting (toggle actions use it) */
  baseCmd?: string;
  /** Live contents, set by `live` */
  fnReload?: LiveContents;
  /** Prompt saved by the skim live setup */
  savedPrompt?: string;
  /** The options as the caller passed them, for relaunching */
  callOpts: FinderOptions;
  /** Relaunch the picker that produced this bag */
  callFn?: (opts: FinderOptions) => Promise<void>;
  /** Counterpart picker for `grep-lgrep` */
  actTo?: (opts: FinderOptions) => Promise<void>;
  lastQuery?: string;
  context?: SessionContext;
  /** Bridge mark taken when the session was normalized */
  bridgeMark?: number;
}

// ============================================================================
// Session results
// ============================================================================

export interface Selection {
  /** Key that accepted the selection */
  key: string;
  items: string[];
}
