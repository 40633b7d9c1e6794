/**
 * Options normalization.
 *
 * Layers (defaults → globals → picker globals → call) are merged into one
 * mutable bag, actions are resolved and validated, flags adapted to the
 * active finder. A normalized bag carries a marker and passes through
 * `normalizeOptions` unchanged.
 */

import { CapabilityError, ConfigurationError, IS_WINDOWS, Logger } from "@finderkit/shared";
import { resolveAction } from "./actions.js";
import { FZF_GATES, type FinderCapability } from "./capability.js";
import type {
  ActionTable,
  FinderOptions,
  FzfOpts,
  HighlightNames,
  Keymap,
  NormalizedOptions,
  PreviewWinOpts,
  ResolvedActionTable,
  WinOpts,
} from "./types.js";

const log = Logger.for("Options");

export const DEFAULT_HLS: HighlightNames = {
  headerBind: "FinderHeaderBind",
  headerText: "FinderHeaderText",
  livePrompt: "FinderLivePrompt",
  title: "FinderTitle",
  titleFlags: "FinderTitleFlags",
};

export const DEFAULT_PREVIEW_WINOPTS: PreviewWinOpts = {
  hidden: false,
  wrap: false,
  border: "rounded",
  layout: "flex",
  horizontal: "right:60%",
  vertical: "down:45%",
  flipColumns: 100,
};

/**
 * Defaults a `Finder` applies below caller globals. Not applied by
 * `normalizeOptions` itself.
 */
export const DEFAULT_GLOBALS: FinderOptions = {
  fzfOpts: {
    "--ansi": true,
    "--info": "inline-right",
    "--height": "100%",
    "--layout": "reverse",
    "--border": "none",
    "--highlight-line": true,
  },
  keymap: {
    fzf: {
      "ctrl-z": "abort",
      "ctrl-u": "unix-line-discard",
      "ctrl-f": "half-page-down",
      "ctrl-b": "half-page-up",
      "ctrl-a": "beginning-of-line",
      "ctrl-e": "end-of-line",
      "alt-a": "toggle-all",
      "alt-g": "first",
      "alt-G": "last",
      f3: "toggle-preview-wrap",
      f4: "toggle-preview",
      "shift-down": "preview-page-down",
      "shift-up": "preview-page-up",
    },
  },
};

export function isNormalized(opts: FinderOptions | NormalizedOptions): opts is NormalizedOptions {
  return "normalized" in opts && opts.normalized === true;
}

/**
 * Merge option layers, later wins. Flag, color, highlight, action and keymap
 * tables merge per key; `winopts.preview` merges per field.
 */
export function mergeOptions(...layers: readonly (FinderOptions | undefined)[]): FinderOptions {
  let merged: FinderOptions = {};
  for (const layer of layers) {
    if (!layer) continue;
    merged = {
      ...merged,
      ...layer,
      fzfOpts: { ...merged.fzfOpts, ...layer.fzfOpts },
      fzfColors: { ...merged.fzfColors, ...layer.fzfColors },
      highlights: { ...merged.highlights, ...layer.highlights },
      hls: { ...merged.hls, ...layer.hls },
      actions: { ...merged.actions, ...layer.actions },
      keymap: { fzf: { ...merged.keymap?.fzf, ...layer.keymap?.fzf } },
      winopts: {
        ...merged.winopts,
        ...layer.winopts,
        preview: { ...merged.winopts?.preview, ...layer.winopts?.preview },
      },
    };
  }
  return merged;
}

export function normalizeActions(actions: ActionTable | undefined): ResolvedActionTable {
  const resolved: ResolvedActionTable = {};
  for (const [key, action] of Object.entries(actions ?? {})) {
    if (action === false || action === undefined) continue;
    resolved[key] = resolveAction(key, action);
  }
  return resolved;
}

/**
 * Drop or downgrade default flags the active finder does not understand.
 */
export function adaptFlags(fzfOpts: FzfOpts, finder: FinderCapability): FzfOpts {
  const out = { ...fzfOpts };
  if (finder.isSkim) {
    if (out["--info"] !== undefined) {
      delete out["--info"];
      out["--inline-info"] = true;
    }
    delete out["--highlight-line"];
    if (out["--border"] === "none") delete out["--border"];
    return out;
  }
  if (out["--info"] === "inline-right" && !finder.has("fzf", [0, 42])) {
    out["--info"] = "inline";
  }
  if (out["--highlight-line"] !== undefined && !finder.has("fzf", FZF_GATES.printAction)) {
    delete out["--highlight-line"];
  }
  if (out["--border"] === "none" && !finder.has("fzf", [0, 35])) {
    delete out["--border"];
  }
  return out;
}

function normalizeWinopts(winopts: FinderOptions["winopts"]): WinOpts {
  return {
    ...winopts,
    preview: { ...DEFAULT_PREVIEW_WINOPTS, ...winopts?.preview },
  };
}

function normalizeKeymap(keymap: Partial<Keymap> | undefined): Keymap {
  return { fzf: { ...keymap?.fzf } };
}

export interface NormalizeContext {
  finder: FinderCapability;
  /** Lower-precedence layers, applied in order below `opts` */
  layers?: readonly (FinderOptions | undefined)[];
  resumeKey?: string;
}

/**
 * Normalize the options bag once per session.
 */
export function normalizeOptions(
  opts: FinderOptions | NormalizedOptions,
  context: NormalizeContext,
): NormalizedOptions {
  if (isNormalized(opts)) return opts;

  const merged = mergeOptions(...(context.layers ?? []), opts);
  const finder = merged.finder ?? context.finder;

  if (merged.tmuxMode !== undefined && ![0, 1, 2].includes(merged.tmuxMode)) {
    throw new ConfigurationError(`Invalid tmuxMode '${String(merged.tmuxMode)}'`);
  }
  if (merged.tmuxMode === 2 && !finder.has("fzf", FZF_GATES.tmuxPopup)) {
    throw new CapabilityError(`tmux popup mode requires fzf >= 0.53, found ${finder.toString()}`, "tmux");
  }

  const normalized: NormalizedOptions = {
    ...merged,
    normalized: true,
    finder,
    fzfOpts: adaptFlags(merged.fzfOpts ?? {}, finder),
    actions: normalizeActions(merged.actions),
    keymap: normalizeKeymap(merged.keymap),
    winopts: normalizeWinopts(merged.winopts),
    hls: { ...DEFAULT_HLS, ...merged.hls },
    highlights: { ...merged.highlights },
    resumeKey: merged.resumeKey ?? context.resumeKey ?? "default",
    windows: merged.windows ?? IS_WINDOWS,
    extraArgs: [],
    callOpts: { ...opts },
  };

  log.debug({ finder: finder.toString(), resumeKey: normalized.resumeKey }, "normalized options");
  return normalized;
}
