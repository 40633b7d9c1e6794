/**
 * Actions: built-ins, style validation, header labels, `--expect`
 * compilation and selection dispatch.
 */

import { z } from "zod";
import { ConfigurationError, Logger } from "@finderkit/shared";
import { FZF_GATES } from "./capability.js";
import { ansiFromHl } from "./highlight.js";
import { hasFlag, toggleCmdFlag } from "./rg.js";
import type {
  Action,
  ActionChain,
  ActionContext,
  ActionDescriptor,
  ActionFn,
  BuiltinActionName,
  HeaderLabel,
  NormalizedOptions,
  ResolvedAction,
  ResolvedActionTable,
  Selection,
} from "./types.js";

const log = Logger.for("Actions");

export const DEFAULT_TOGGLE_FLAGS = {
  ignore: "--no-ignore",
  hidden: "--hidden",
  follow: "-L",
} as const;

// ============================================================================
// Built-ins
// ============================================================================

export const print: ActionFn = (selected) => {
  for (const item of selected) {
    process.stdout.write(`${item}\n`);
  }
};

/** Placeholder bound to the abort keys so they report a key line */
export const abort: ActionFn = () => {};

export const resume: ActionFn = (_selected, _opts, ctx) => ctx.resume();

/**
 * Relaunch the picker with `flag` toggled in its base command, keeping the
 * last query.
 */
async function relaunchWithFlag(opts: NormalizedOptions, flag: string): Promise<void> {
  const base = opts.baseCmd ?? opts.cmd;
  if (!base || !opts.callFn) {
    log.debug({ flag }, "nothing to toggle: picker has no command");
    return;
  }
  const live = opts.fnReload !== undefined;
  await opts.callFn({
    ...opts.callOpts,
    resume: true,
    cmd: toggleCmdFlag(base, flag),
    search: live ? (opts.lastQuery ?? opts.search) : opts.search,
    noEsc: live ? true : opts.noEsc,
    query: live ? undefined : opts.lastQuery,
  });
}

export const toggleIgnore: ActionFn = (_selected, opts) =>
  relaunchWithFlag(opts, opts.toggleIgnoreFlag ?? DEFAULT_TOGGLE_FLAGS.ignore);

export const toggleHidden: ActionFn = (_selected, opts) =>
  relaunchWithFlag(opts, opts.toggleHiddenFlag ?? DEFAULT_TOGGLE_FLAGS.hidden);

export const toggleFollow: ActionFn = (_selected, opts) =>
  relaunchWithFlag(opts, opts.toggleFollowFlag ?? DEFAULT_TOGGLE_FLAGS.follow);

/** Switch between regex grep and live grep, carrying the search over */
export const grepLgrep: ActionFn = async (_selected, opts) => {
  if (!opts.actTo) return;
  const search = opts.fnReload !== undefined ? (opts.lastQuery ?? opts.search) : opts.search;
  await opts.actTo({
    ...opts.callOpts,
    resume: undefined,
    search: search ?? "",
    noEsc: true,
    query: undefined,
  });
};

export const BUILTIN_ACTIONS: Record<BuiltinActionName, ActionFn> = {
  print,
  abort,
  resume,
  "toggle-ignore": toggleIgnore,
  "toggle-hidden": toggleHidden,
  "toggle-follow": toggleFollow,
  "grep-lgrep": grepLgrep,
};

function isBuiltinName(name: string): name is BuiltinActionName {
  return Object.hasOwn(BUILTIN_ACTIONS, name);
}

// ============================================================================
// Header labels
// ============================================================================

export interface ActionLabel {
  label: HeaderLabel;
  /** 1-based pinned position in the header */
  pos?: number;
}

function toggleLabel(flagOf: (o: NormalizedOptions) => string, on: string, off: string): HeaderLabel {
  return (o) => (hasFlag(o.cmd ?? o.baseCmd, flagOf(o)) ? on : off);
}

const labels = new Map<ActionFn, ActionLabel>([
  [
    toggleIgnore,
    {
      label: toggleLabel(
        (o) => o.toggleIgnoreFlag ?? DEFAULT_TOGGLE_FLAGS.ignore,
        "Respect .gitignore",
        "Disable .gitignore",
      ),
    },
  ],
  [
    toggleHidden,
    {
      label: toggleLabel(
        (o) => o.toggleHiddenFlag ?? DEFAULT_TOGGLE_FLAGS.hidden,
        "Exclude hidden files",
        "Include hidden files",
      ),
    },
  ],
  [
    toggleFollow,
    {
      label: toggleLabel(
        (o) => o.toggleFollowFlag ?? DEFAULT_TOGGLE_FLAGS.follow,
        "Disable symlink follow",
        "Enable symlink follow",
      ),
    },
  ],
  [grepLgrep, { label: (o) => (o.fnReload !== undefined ? "Fuzzy Search" : "Regex Search") }],
]);

/**
 * Register a header label for an action function.
 */
export function defineActionLabel(fn: ActionFn, label: ActionLabel): void {
  labels.set(fn, label);
}

export function actionLabel(fn: ActionFn): ActionLabel | undefined {
  return labels.get(fn);
}

// ============================================================================
// Styles
// ============================================================================

export function isChain(action: ResolvedAction | undefined): action is ActionChain {
  return Array.isArray(action);
}

export function isDescriptor(action: ResolvedAction | undefined): action is ActionDescriptor {
  return typeof action === "object" && !Array.isArray(action);
}

/** First function of an action, whatever its style */
export function actionFn(action: ResolvedAction): ActionFn | undefined {
  if (typeof action === "function") return action;
  if (isChain(action)) return action[0];
  return action.fn;
}

const descriptorSchema = z
  .object({
    fn: z.function(),
    reload: z.boolean().optional(),
    execSilent: z.boolean().optional(),
    noclose: z.boolean().optional(),
    reuse: z.boolean().optional(),
    prefix: z.string().optional(),
    postfix: z.string().optional(),
    fieldIndex: z.string().optional(),
    header: z.union([z.string(), z.function(), z.literal(false)]).optional(),
    desc: z.string().optional(),
    ignore: z.boolean().optional(),
  })
  .strict();

function mixedStyles(key: string): ConfigurationError {
  return new ConfigurationError(`Action '${key}' mixes positional and named definitions`, { key });
}

/**
 * Resolve built-in names and validate the action's definition style.
 */
export function resolveAction(key: string, action: Action): ResolvedAction {
  if (typeof action === "string") {
    if (!isBuiltinName(action)) {
      throw new ConfigurationError(`Unknown action '${action}' for key '${key}'`, { key, action });
    }
    return BUILTIN_ACTIONS[action];
  }
  if (typeof action === "function") return action;

  if (Array.isArray(action)) {
    if (Object.keys(action).some((k) => !/^\d+$/.test(k))) throw mixedStyles(key);
    if (action.length === 0 || !action.every((fn) => typeof fn === "function")) {
      throw new ConfigurationError(`Action '${key}' chain must hold functions only`, { key });
    }
    return action;
  }

  if (Object.keys(action).some((k) => /^\d+$/.test(k))) throw mixedStyles(key);
  const parsed = descriptorSchema.safeParse(action);
  if (!parsed.success) throw ConfigurationError.fromZod(`Invalid action '${key}'`, parsed.error);
  // compilers flag and rewrite the session's copy
  return { ...action };
}

// ============================================================================
// Expect
// ============================================================================

export interface ExpectResult {
  /** Keys for `--expect` (fzf < 0.53 and sk) */
  keys: string[];
  /** `--bind` entries */
  binds: string[];
}

function withTrailingPlus(prefix: string | undefined): string {
  if (!prefix) return "";
  return prefix.endsWith("+") ? prefix : `${prefix}+`;
}

/**
 * Compile the action table into expect keys / print binds.
 */
export function compileExpect(actions: ResolvedActionTable, opts: Pick<NormalizedOptions, "finder">): ExpectResult {
  const keys: string[] = [];
  const binds: string[] = [];
  const printAction = opts.finder.has("fzf", FZF_GATES.printAction);

  for (const name of Object.keys(actions).sort()) {
    const action = actions[name];
    const descriptor = isDescriptor(action) ? action : undefined;
    if (descriptor?.ignore) continue;

    const key = name === "default" ? "enter" : name;
    const prefix = descriptor?.prefix;

    if (printAction) {
      binds.push(`${key}:${withTrailingPlus(prefix)}print(${key})+accept`);
      continue;
    }
    if (key !== "enter") keys.push(key);
    if (prefix) binds.push(`${key}:${prefix.replace(/\+$/, "")}`);
  }
  return { keys, binds };
}

// ============================================================================
// Selection
// ============================================================================

/**
 * Split the key line from the selected items. Callers remove the query line
 * first.
 */
export function normalizeSelected(lines: readonly string[], actions: ResolvedActionTable): Selection | undefined {
  if (lines.length === 0) return undefined;

  // a single `enter` action prints no key line
  const hasKeyLine = Object.keys(actions).length > 1 || actions.enter === undefined;
  if (!hasKeyLine) return { key: "enter", items: [...lines] };

  const [first, ...items] = lines;
  let key = first.length > 0 ? first : "enter";
  if (key === "enter" && actions.enter === undefined && actions.default !== undefined) {
    key = "default";
  }
  return { key, items };
}

/**
 * Run the action bound to the selection's key.
 */
export async function act(selection: Selection, opts: NormalizedOptions, ctx: ActionContext): Promise<void> {
  const action = opts.actions[selection.key];
  if (!action) {
    log.debug({ key: selection.key }, "no action for key");
    return;
  }
  if (typeof action === "function") {
    await action(selection.items, opts, ctx);
    return;
  }
  if (isChain(action)) {
    for (const fn of action) {
      await fn(selection.items, opts, ctx);
    }
    return;
  }
  await action.fn(selection.items, opts, ctx);
}

/**
 * `<key> to <label>` entries for every labelled action, pinned positions
 * first, joined with the header separator.
 */
export function actionsHeader(opts: NormalizedOptions): string | undefined {
  const entries: string[] = [];
  const pinned: { pos: number; text: string }[] = [];

  for (const key of Object.keys(opts.actions).sort()) {
    const action = opts.actions[key];
    const descriptor = isDescriptor(action) ? action : undefined;
    if (descriptor?.header === false) continue;

    const fn = actionFn(action);
    const def = fn ? labels.get(fn) : undefined;
    const label = descriptor?.header || def?.label;
    if (!label) continue;

    const text = typeof label === "function" ? label(opts) : label;
    const rendered = `<${ansiFromHl(opts.highlights, opts.hls.headerBind, key)}> to ${ansiFromHl(
      opts.highlights,
      opts.hls.headerText,
      text,
    )}`;
    if (def?.pos !== undefined && !descriptor?.header) pinned.push({ pos: def.pos, text: rendered });
    else entries.push(rendered);
  }

  for (const { pos, text } of pinned.sort((a, b) => a.pos - b.pos)) {
    entries.splice(Math.min(pos - 1, entries.length), 0, text);
  }
  if (entries.length === 0) return undefined;

  entries[0] = `${opts.headerPrefix ?? ":: "}${entries[0]}`;
  return entries.join(opts.headerSeparator ?? "|");
}
