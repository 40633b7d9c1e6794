/**
 * CLI argument compiler: normalized options → finder argv.
 *
 * Values are shell-escaped here: the finder command line is run through the
 * shell by the process collaborator.
 */

import { Logger, isEscaped, notify, shellEscape } from "@finderkit/shared";
import { compileExpect } from "./actions.js";
import { createBinds } from "./binds.js";
import type { ShellBridge } from "./bridge/bridge.js";
import { FZF_GATES } from "./capability.js";
import { ansiFromHl, hexFromHl } from "./highlight.js";
import type { BorderOption, BorderStyle, ColorTable, FlagValue, FzfOpts, NormalizedOptions, PreviewWinOpts } from "./types.js";
import type { FinderWindow } from "./window.js";

const log = Logger.for("FinderArgs");

const BORDER_TO_FZF: Record<BorderStyle, string> = {
  none: "noborder",
  single: "border-sharp",
  double: "border-double",
  rounded: "border-rounded",
  solid: "noborder",
  empty: "border-block",
  shadow: "border-thinblock",
  bold: "border-bold",
  block: "border-block",
  solidblock: "border-block",
  thicc: "border-bold",
  thiccc: "border-block",
  thicccc: "border-block",
};

function isBorderStyle(value: string): value is BorderStyle {
  return Object.hasOwn(BORDER_TO_FZF, value);
}

/**
 * Map a window border option onto fzf's preview-window border names.
 */
export function translateBorder(border: BorderOption | undefined, layout: string): string | undefined {
  let value: BorderOption | undefined = border ?? "none";
  if (value === true) value = "border";
  if (typeof value === "function") value = value({ type: "fzf", name: "prev", layout });
  if (typeof value !== "string") return undefined;
  return isBorderStyle(value) ? BORDER_TO_FZF[value] : value;
}

/**
 * `--preview-window` value for the current window geometry.
 */
export function previewWindow(
  opts: Pick<NormalizedOptions, "finder"> & { winopts: { preview: PreviewWinOpts } },
  window: Pick<FinderWindow, "columns" | "previewLayout">,
): string {
  const preview = opts.winopts.preview;
  const layoutStr = window.previewLayout();
  const position = /^[^:]+/.exec(layoutStr)?.[0] ?? "right";
  const border = translateBorder(preview.border, position);
  const prefix = `${preview.hidden ? "hidden" : "nohidden"}:${preview.wrap ? "wrap" : "nowrap"}${
    border ? `:${border}` : ""
  }`;

  if (opts.finder.has("fzf", FZF_GATES.previewAltLayout) && preview.layout === "flex" && preview.flipColumns > 0) {
    // fzf compares the "<N" threshold with the width left after the split
    const columns = window.columns(true);
    const percent = Number(/:(\d+)%/.exec(preview.horizontal)?.[1] ?? 50);
    const mainWidth = Math.ceil((columns * (100 - percent)) / 100);
    const minWidth = preview.flipColumns - mainWidth + 1;
    if (minWidth > 0) {
      return `${prefix}:${preview.horizontal},<${minWidth}(${prefix}:${preview.vertical})`;
    }
  }
  return `${prefix}:${layoutStr}`;
}

/**
 * Fold the color table into one `--color` value.
 */
export function createColors(opts: NormalizedOptions): string | undefined {
  const colors: ColorTable = { ...opts.fzfColors };
  if (opts.fnReload !== undefined) {
    colors.query = ["fg", opts.hls.livePrompt];
  }
  if (!opts.finder.has("fzf", FZF_GATES.separatorColor)) delete colors.separator;
  if (!opts.finder.has("fzf", FZF_GATES.scrollbarColor)) delete colors.scrollbar;

  const parts: string[] = [];
  const existing = opts.fzfOpts["--color"];
  if (typeof existing === "string" && existing.length > 0) parts.push(existing);

  for (const [flag, spec] of Object.entries(colors)) {
    if (typeof spec === "string") {
      parts.push(`${flag}:${spec}`);
      continue;
    }
    if (!spec) continue;
    const [attr, groups, ...raw] = spec;
    const values: string[] = [];
    const hex = hexFromHl(opts.highlights, groups, attr);
    if (hex) values.push(hex);
    values.push(...raw);
    if (values.length > 0) parts.push([flag, ...values].join(":"));
  }
  return parts.length > 0 ? parts.join(",") : undefined;
}

function resolvePreview(opts: NormalizedOptions, bridge: ShellBridge): string | undefined {
  const spec = opts.preview;
  if (typeof spec === "string" || spec === undefined) return spec;
  if (typeof spec === "function") return bridge.stringifyData(spec, opts, "{}");

  const fieldIndex = spec.fieldIndex ?? "{}";
  const fn = spec.fn;
  if (spec.type === "cmd") {
    return bridge.stringifyCmd(
      async (args) => {
        const out = await fn(args);
        return typeof out === "string" ? out : out.join("\n");
      },
      opts,
      fieldIndex,
    );
  }
  return bridge.stringifyData(fn, opts, fieldIndex);
}

function renderTitle(opts: NormalizedOptions): string | undefined {
  const title = opts.winopts.title;
  if (title === undefined) return undefined;
  if (typeof title === "string") return ansiFromHl(opts.highlights, opts.hls.title, title);
  return title.map(([text, hl]) => ansiFromHl(opts.highlights, hl, text)).join("");
}

function escapeValue(flag: string, value: string, opts: NormalizedOptions): string {
  if (flag === "--query") return shellEscape(value, opts.windows);
  let v = value;
  if (opts.windows && /^'.*'$/s.test(v)) {
    v = `"${v.slice(1, -1)}"`;
  }
  if (isEscaped(v, opts.windows)) {
    log.warn({ flag, value: v }, "flag value already quoted");
    notify.warn(`'fzfOpts' are automatically shell-escaped. Please remove surrounding quotes from ${flag}=${v}`);
    return v;
  }
  return shellEscape(v, opts.windows);
}

function toArgs(flag: string, value: FlagValue, opts: NormalizedOptions): string[] {
  if (value === false || value === null || value === undefined) return [];
  const escaped = value === true ? undefined : escapeValue(flag, String(value), opts);
  if (opts.finder.isSkim) return [escaped === undefined ? flag : `${flag}=${escaped}`];
  return escaped === undefined ? [flag] : [flag, escaped];
}

function asList(value: string | readonly string[] | undefined): readonly string[] {
  if (value === undefined) return [];
  return typeof value === "string" ? [value] : value;
}

/**
 * Compile the options bag into the finder's argv.
 */
export function buildFinderArgs(opts: NormalizedOptions, window: FinderWindow, bridge: ShellBridge): string[] {
  // compiled on a copy: the bag is compiled again on resume
  const fzfOpts: FzfOpts = { ...opts.fzfOpts };
  if (opts.query !== undefined) fzfOpts["--query"] = opts.query;
  if (opts.prompt !== undefined) fzfOpts["--prompt"] = opts.prompt;
  if (opts.header !== undefined) fzfOpts["--header"] = opts.header;
  const preview = resolvePreview(opts, bridge);
  if (preview !== undefined) fzfOpts["--preview"] = preview;

  const binds = createBinds(opts, bridge);
  const color = createColors(opts);
  if (color !== undefined) fzfOpts["--color"] = color;
  else delete fzfOpts["--color"];

  const { keys, binds: expectBinds } = compileExpect(opts.actions, opts);
  if (keys.length > 0) fzfOpts["--expect"] = keys.join(",");
  if (expectBinds.length > 0) binds.push(expectBinds.join(","));
  fzfOpts["--bind"] = binds;

  if (fzfOpts["--preview-window"] === undefined) {
    fzfOpts["--preview-window"] = previewWindow(opts, window);
  }
  const previewWin = fzfOpts["--preview-window"];
  if (typeof previewWin === "string" && opts.previewOffset) {
    fzfOpts["--preview-window"] = `${previewWin}:${opts.previewOffset}`;
  }

  const title = renderTitle(opts);
  if (title && opts.finder.has("fzf", FZF_GATES.borderLabel) && fzfOpts["--border-label"] === undefined) {
    fzfOpts["--border-label"] = ` ${title} `;
  }

  const args: string[] = [];
  if (opts.tmuxMode === 1) {
    for (const [flag, value] of Object.entries(opts.fzfTmuxOpts ?? {})) {
      args.push(flag);
      if (value.length > 0) args.push(value);
    }
  } else if (opts.tmuxMode === 2 && opts.finder.has("fzf")) {
    // a later --height would move the popup job to the background
    delete fzfOpts["--height"];
  }

  for (const [flag, value] of Object.entries(fzfOpts)) {
    if (Array.isArray(value)) {
      for (const item of value) args.push(...toArgs(flag, item, opts));
    } else if (typeof value !== "object") {
      args.push(...toArgs(flag, value, opts));
    }
  }

  for (const extra of [opts.fzfArgs, opts.fzfRawArgs, opts.fzfCliArgs, opts.extraArgs]) {
    args.push(...asList(extra));
  }
  return args;
}
