/**
 * Finder sessions.
 *
 * `Finder` ties the compilers to its collaborators: it normalizes the
 * options bag, stringifies contents, compiles the argv, runs the finder
 * process and dispatches the selected action.
 *
 * ```typescript
 * const finder = new Finder();
 * await finder.exec(["one", "two"], { prompt: "Pick> " });
 * await finder.live("rg --line-number <query>", { multiprocess: true });
 * ```
 */

import { Logger, isEditorConflict, notify, shellEscape, shellNop } from "@finderkit/shared";
import { abort, act, isChain, isDescriptor, normalizeSelected } from "./actions.js";
import { convertExecSilentActions, convertReloadActions, type BindDeps } from "./binds.js";
import { SocketShellBridge, type ShellBridge } from "./bridge/bridge.js";
import { mtSpecSchema, needsProcessing, resolveMtCommand } from "./bridge/mt.js";
import { FZF_GATES, detectFinder, type FinderCapability } from "./capability.js";
import { buildFinderArgs } from "./cli-args.js";
import { setHeader } from "./header.js";
import { canTransform, setupLiveFlags } from "./live.js";
import { DEFAULT_GLOBALS, isNormalized, mergeOptions, normalizeOptions } from "./options.js";
import { ChildFinderProcess, type FinderProcess, type FinderRunResult } from "./process.js";
import { QUERY_PLACEHOLDER, expandQuery, fieldIndex } from "./query.js";
import { ResumeRegistry } from "./registry.js";
import { collectEntries, isEntryList } from "./contents.js";
import { disposeTempLists, stringify, stringifyList } from "./stringify.js";
import type {
  ActionContext,
  Contents,
  FinderOptions,
  LiveContents,
  LiveContentsFn,
  NormalizedOptions,
  Selection,
} from "./types.js";
import { TerminalWindow, type FinderWindow } from "./window.js";

const log = Logger.for("Finder");

/** Keys that report a key line instead of exiting without one */
const ABORT_KEYS = ["ctrl-c", "ctrl-q", "esc"] as const;

export interface FinderDeps {
  registry?: ResumeRegistry;
  bridge?: ShellBridge;
  process?: FinderProcess;
  createWindow?: (opts: NormalizedOptions) => FinderWindow;
  /** Defaults below every picker's own */
  globals?: FinderOptions;
  /** Per-picker globals, keyed by resume key */
  pickerGlobals?: Record<string, FinderOptions>;
  detect?: (bin: string) => Promise<FinderCapability>;
}

export interface NormalizeRequest {
  resumeKey?: string;
  /** The picker's defaults, lowest precedence */
  defaults?: FinderOptions;
}

export interface SessionResult {
  /** Contents command the finder ran on */
  cmd: string;
  opts: NormalizedOptions;
  selection?: Selection;
}

export type ResumeOverrides = Pick<FinderOptions, "query" | "prompt" | "header">;

export class Finder {
  readonly registry: ResumeRegistry;
  readonly bridge: ShellBridge;
  private readonly process: FinderProcess;
  private readonly createWindow: (opts: NormalizedOptions) => FinderWindow;
  private readonly globals: FinderOptions;
  private readonly pickerGlobals: Record<string, FinderOptions>;
  private readonly detect: (bin: string) => Promise<FinderCapability>;

  constructor(deps: FinderDeps = {}) {
    this.registry = deps.registry ?? new ResumeRegistry();
    this.bridge = deps.bridge ?? new SocketShellBridge();
    this.process = deps.process ?? new ChildFinderProcess();
    this.createWindow = deps.createWindow ?? ((opts) => new TerminalWindow(opts));
    this.globals = deps.globals ?? DEFAULT_GLOBALS;
    this.pickerGlobals = deps.pickerGlobals ?? {};
    this.detect = deps.detect ?? detectFinder;
  }

  /**
   * Normalize caller options for a session. Picks up the resume values of
   * the resume key when `resume` is set.
   */
  async normalize(opts: FinderOptions | NormalizedOptions, request: NormalizeRequest = {}): Promise<NormalizedOptions> {
    if (isNormalized(opts)) return opts;

    const resumeKey = opts.resumeKey ?? request.resumeKey;
    const layers = [request.defaults, this.globals, resumeKey ? this.pickerGlobals[resumeKey] : undefined];
    const merged = mergeOptions(...layers, opts);
    const finder = merged.finder ?? (await this.detect(merged.fzfBin ?? "fzf"));
    const o = normalizeOptions(opts, { finder, layers, resumeKey });
    o.bridgeMark = this.bridge.mark();

    if (o.resume) {
      const values = this.registry.get(o.resumeKey);
      if (values) {
        if (o.query === undefined) o.query = values.query;
        if (o.search === undefined) o.search = values.search;
        if (o.noEsc === undefined) o.noEsc = values.noEsc;
      }
    }
    return o;
  }

  /**
   * Run a session over static, produced or command contents.
   */
  async exec(contents: Contents, opts: FinderOptions | NormalizedOptions = {}): Promise<SessionResult> {
    const o = await this.normalize(opts);
    o.fnPreprocess?.(o);
    const cmd = typeof contents === "string" ? this.commandContents(contents, o) : stringify(contents, o, this.bridge);
    return this.wrap(cmd, o, true);
  }

  /**
   * Run a session whose contents are recomputed on every query change.
   */
  async live(contents: LiveContents, opts: FinderOptions | NormalizedOptions = {}): Promise<SessionResult> {
    const o = await this.normalize(opts);
    o.fnReload = contents;
    o.fnPreprocess?.(o);
    const idx = fieldIndex(o);

    let reloadCmd: string;
    let command: string | undefined;
    if (typeof contents === "string") {
      const cmd = contents.includes(QUERY_PLACEHOLDER) ? contents : `${contents} ${QUERY_PLACEHOLDER}`;
      // the query arrives as the helper's last argument; cleared again when
      // the command runs without a helper
      o.argvExpr = true;
      reloadCmd = expandQuery(this.bridge.stringifyMt(cmd, o.multiprocess ? o : { ...o, inProcess: true }), idx);
      if (canTransform(o)) command = this.transformCommand(cmd, o, idx);
    } else {
      reloadCmd = this.bridge.stringifyLive(contents, o, idx);
      if (canTransform(o)) {
        command = this.bridge.stringifyData(async (args) => `reload:${await this.reloadTarget(contents, args, o)}`, o, idx);
      }
    }

    setupLiveFlags(command ?? reloadCmd, idx, o);

    // without a start event the first load comes from the default command
    const initial =
      o.finder.isSkim || o.finder.has("fzf", FZF_GATES.startEvent)
        ? shellNop(o.windows)
        : reloadCmd.split(idx).join(shellEscape(o.query ?? "", o.windows));
    return this.wrap(initial, o, true, reloadCmd);
  }

  /**
   * Compile and run. With `convert`, reload and execSilent actions are
   * turned into binds first; with `start: false` nothing is launched.
   */
  async wrap(cmd: string, opts: NormalizedOptions, convert = false, reloadCmd: string = cmd): Promise<SessionResult> {
    if (convert) {
      const deps = this.bindDeps();
      convertReloadActions(reloadCmd, opts, deps);
      convertExecSilentActions(opts, deps);
    }
    if (opts.start === false) return { cmd, opts };

    const selection = await this.run(cmd, opts);
    if (selection) {
      try {
        if (opts.fnSelected) await opts.fnSelected(selection, opts);
        else await act(selection, opts, this.contextFor(selection.key));
      } catch (err) {
        if (isEditorConflict(err)) {
          log.debug({ err }, "action interrupted by an editor conflict");
        } else {
          log.error({ err, key: selection.key }, "action failed");
          notify.error(`action '${selection.key}' failed: ${err instanceof Error ? err.message : String(err)}`);
        }
      }
    }
    return { cmd, opts, selection };
  }

  /**
   * Bring back the hidden session, or relaunch the last one.
   */
  async resume(overrides: ResumeOverrides = {}): Promise<SessionResult | undefined> {
    const foreground = this.registry.foregroundWindow();
    if (foreground?.unhide()) return undefined;

    const last = this.registry.getLast();
    if (!last) {
      notify.info("No resume data available.");
      return undefined;
    }
    const o = last.opts;
    if (overrides.query !== undefined) o.query = overrides.query;
    if (overrides.prompt !== undefined) o.prompt = overrides.prompt;
    if (overrides.header !== undefined) o.header = overrides.header;
    setHeader(o);

    const cmd = typeof last.contents === "string" ? last.contents : stringify(last.contents, o, this.bridge);
    return this.wrap(cmd, o);
  }

  contextFor(key: string): ActionContext {
    return {
      key,
      resume: async () => {
        await this.resume();
      },
    };
  }

  async close(): Promise<void> {
    await this.bridge.close();
    disposeTempLists();
  }

  // ==========================================================================
  // Session
  // ==========================================================================

  private async run(contents: string, o: NormalizedOptions): Promise<Selection | undefined> {
    const window = this.createWindow(o);
    const reason = window.canOpen();
    if (reason) {
      notify.info(`Unable to open the finder: ${reason}`);
      return undefined;
    }

    o.fzfOpts["--print-query"] = true;
    this.addAbortActions(o);

    if (!o.noResume) this.registry.setLast(o, contents);
    this.releaseCallbacks(o);
    o.context = { cwd: process.cwd(), startedAt: Date.now() };
    this.registry.setContext(o.context);
    this.registry.activate(window);

    window.attachPreviewer(o.previewer);
    this.applyPreviewer(o);
    await window.create();
    await this.bridge.ready();

    const argv = buildFinderArgs(o, window, this.bridge);
    let result: FinderRunResult;
    try {
      result = await this.process.run(contents, argv, o, { cwd: o.cwd });
    } finally {
      this.bridge.killHelpers();
    }
    o.fnPostprocess?.(o);

    if (window.wasHidden()) {
      log.debug({ resumeKey: o.resumeKey }, "window was hidden, result discarded");
      return undefined;
    }

    const lines = [...result.lines];
    const query = lines.shift();
    // skim prints its fuzzy query in interactive mode, not the command query
    if (query !== undefined && !(o.finder.isSkim && o.fnReload !== undefined)) {
      if (o.noResume) o.lastQuery = query;
      else this.registry.recordQuery(o, query);
    }

    if (!window.checkExitStatus(result.exitCode)) {
      this.closeWindow(window);
      return undefined;
    }

    const selection = normalizeSelected(lines, o.actions);
    const action = selection ? o.actions[selection.key] : undefined;
    const keepOpen =
      isChain(action) || (isDescriptor(action) && Boolean(action.reload || action.noclose || action.reuse));
    if (keepOpen || !window.autoclose()) {
      log.debug({ key: selection?.key }, "window kept open");
    } else {
      this.closeWindow(window);
    }
    return selection;
  }

  /**
   * Shell command contents run as is unless their lines need processing;
   * `multiprocess` moves that processing into a helper.
   */
  private commandContents(cmd: string, o: NormalizedOptions): string {
    if (o.multiprocess) return this.bridge.stringifyMt(cmd, o);
    if (o.fnTransform || needsProcessing(o)) return this.bridge.stringifyMt(cmd, { ...o, inProcess: true });
    o.argvExpr = false;
    return cmd;
  }

  /**
   * Only this session and the resumable one can still call back; drop
   * callbacks registered before both.
   */
  private releaseCallbacks(o: NormalizedOptions): void {
    const last = this.registry.getLast();
    const lastMark = last ? last.opts.bridgeMark : o.bridgeMark;
    if (o.bridgeMark === undefined || lastMark === undefined) return;
    this.bridge.release(Math.min(o.bridgeMark, lastMark));
  }

  private closeWindow(window: FinderWindow): void {
    window.close();
    // a nested session may already own the foreground
    if (this.registry.release(window)) this.registry.clearContext();
  }

  private addAbortActions(o: NormalizedOptions): void {
    for (const key of ABORT_KEYS) {
      const bind = o.keymap.fzf[key];
      if (o.actions[key] === undefined && (bind === undefined || bind === "abort")) {
        o.actions[key] = abort;
      }
    }
    if (o.actions.enter === undefined && o.actions.default === undefined) {
      o.actions.enter = abort;
    }
  }

  private applyPreviewer(o: NormalizedOptions): void {
    const previewer = o.previewer;
    if (!previewer) {
      if (o.preview === undefined && o.fzfOpts["--preview"] === undefined) {
        o.fzfOpts["--preview-window"] = "hidden:right:0";
      }
      return;
    }

    const cmdline = previewer.capability("cmdline");
    if (cmdline && o.preview === undefined) o.preview = cmdline();
    const previewWindow = previewer.capability("previewWindow");
    if (previewWindow && o.fzfOpts["--preview-window"] === undefined) o.fzfOpts["--preview-window"] = previewWindow();
    const delimiter = previewer.capability("delimiter");
    if (delimiter && o.fzfOpts["--delimiter"] === undefined) o.fzfOpts["--delimiter"] = delimiter();
    const offset = previewer.capability("previewOffset");
    if (offset && o.previewOffset === undefined) o.previewOffset = offset();

    const zero = previewer.capability("zero");
    if (zero && o.finder.has("fzf", FZF_GATES.zeroEvent)) {
      const bind = zero();
      const existing = o.keymap.fzf.zero;
      if (typeof existing !== "string") o.keymap.fzf.zero = bind;
      else if (!existing.includes(bind)) o.keymap.fzf.zero = `${existing}+${bind}`;
    }
  }

  /**
   * Live command answered with a `reload:` action: glob parsing happens
   * here instead of in a helper per keystroke.
   */
  private transformCommand(cmd: string, o: NormalizedOptions, idx: string): string {
    const spec = mtSpecSchema.parse({
      cmd,
      argvExpr: true,
      cwd: o.cwd,
      execEmptyQuery: o.execEmptyQuery ?? false,
      rgGlob: true,
      globFlag: o.globFlag,
      globSeparator: o.globSeparator,
      windows: o.windows,
    });
    return this.bridge.stringifyData((args) => `reload:${resolveMtCommand(spec, args) ?? shellNop(o.windows)}`, o, idx);
  }

  /** Command a `reload:` transform runs for a live callback's result */
  private async reloadTarget(fn: LiveContentsFn, args: string[], o: NormalizedOptions): Promise<string> {
    if (!o.execEmptyQuery && (args[0] ?? "").length === 0) return shellNop(o.windows);
    const result = await fn(args);
    if (result === undefined) return shellNop(o.windows);
    if (typeof result === "string") return result;
    return stringifyList(isEntryList(result) ? result : await collectEntries(result), o);
  }

  private bindDeps(): BindDeps {
    return { bridge: this.bridge, contextFor: (key) => this.contextFor(key) };
  }
}
