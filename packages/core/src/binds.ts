/**
 * Keybind compiler: keymap → `--bind` arguments, and the action conversions
 * that move `reload` / `execSilent` actions into native binds.
 */

import { Logger, shellEscape } from "@finderkit/shared";
import { isChain, isDescriptor, resume } from "./actions.js";
import type { ShellBridge } from "./bridge/bridge.js";
import { FZF_GATES } from "./capability.js";
import type { ActionContext, ActionDescriptor, NormalizedOptions } from "./types.js";

const log = Logger.for("Binds");

export interface BindDeps {
  bridge: ShellBridge;
  /** Context handed to actions run from inside the finder */
  contextFor(key: string): ActionContext;
}

/** Events and actions that need a `--bind` of their own */
const SEPARATE_EVENTS = new Set(["zero", "load", "start", "resize"]);

function needsOwnBind(key: string, action: string): boolean {
  return /transform|execute|reload/.test(action) || SEPARATE_EVENTS.has(key);
}

/**
 * Compile `opts.keymap.fzf` into `--bind` values: simple binds comma-joined
 * into the first entry, the rest one per entry.
 */
export function createBinds(opts: NormalizedOptions, bridge: ShellBridge): string[] {
  const combine: string[] = [];
  const separate: string[] = [];

  for (const [key, value] of Object.entries(opts.keymap.fzf)) {
    let action: string | undefined;
    if (typeof value === "string") {
      action = value;
    } else if (typeof value === "function") {
      // callbacks need fzf's execute-silent, skim's is unusable with quotes
      action = opts.finder.has("fzf") ? `execute-silent:${bridge.stringifyData(value, opts)}` : undefined;
    } else if (value) {
      action = value.bind;
    }
    if (!action) continue;

    if (
      opts.finder.has("fzf", FZF_GATES.printAction) &&
      /accept\s*$/.test(action) &&
      !/print\(.*?\)\+accept/.test(action)
    ) {
      action = action.replace(/accept\s*$/, "print(enter)+accept");
    }

    const bind = `${key}:${action}`;
    if (needsOwnBind(key, action)) separate.push(bind);
    else combine.push(bind);
  }

  if (combine.length > 0) separate.unshift(combine.join(","));
  return separate;
}

function normalizeAffixes(descriptor: ActionDescriptor): void {
  if (descriptor.prefix && !descriptor.prefix.endsWith("+")) descriptor.prefix += "+";
  if (descriptor.postfix && !descriptor.postfix.startsWith("+")) descriptor.postfix = `+${descriptor.postfix}`;
}

function silentCommand(key: string, descriptor: ActionDescriptor, opts: NormalizedOptions, deps: BindDeps): string {
  const fn = descriptor.fn;
  return deps.bridge.stringifyData2(
    (items) => fn(items, opts, deps.contextFor(key)),
    opts,
    descriptor.fieldIndex ?? "{+}",
  );
}

/**
 * Turn `reload: true` actions into `execute-silent(...)+reload(...)` binds.
 *
 * Needs fzf ≥ 0.36 and a reload command; otherwise each becomes the chain
 * `[fn, resume]`, which relaunches the interface instead of reloading it.
 */
export function convertReloadActions(reloadCmd: string | undefined, opts: NormalizedOptions, deps: BindDeps): void {
  const fallback = !opts.finder.has("fzf", FZF_GATES.reloadBind) || !reloadCmd;

  for (const [key, action] of Object.entries(opts.actions)) {
    if (isDescriptor(action) && action.reload) {
      if (fallback) opts.actions[key] = [action.fn, resume];
    } else if (!fallback && isChain(action) && action.length === 2 && action[1] === resume) {
      opts.actions[key] = { fn: action[0], reload: true };
    }
  }

  if (fallback || !reloadCmd) {
    log.debug({ finder: opts.finder.toString() }, "reload actions use the relaunch fallback");
    return;
  }

  const reloadKeys = Object.keys(opts.actions).filter((key) => {
    const action = opts.actions[key];
    return isDescriptor(action) && action.reload;
  });
  if (reloadKeys.length === 0) return;

  const unbind = reloadKeys.map((key) => `unbind(${key})`).join("+");
  const rebind = reloadKeys.map((key) => `rebind(${key})`).join("+");

  for (const key of reloadKeys) {
    const descriptor = opts.actions[key];
    if (!isDescriptor(descriptor)) continue;
    descriptor.ignore = true;
    normalizeAffixes(descriptor);
    const cmd = silentCommand(key, descriptor, opts, deps);
    opts.keymap.fzf[key] = {
      bind: `${descriptor.prefix ?? ""}${unbind}+execute-silent(${cmd})+reload(${reloadCmd})${descriptor.postfix ?? ""}`,
      desc: descriptor.desc ?? descriptor.fn.name,
    };
  }

  opts.extraArgs.push(`--bind=${shellEscape(`load:+${rebind}`, opts.windows)}`);
}

/**
 * Turn `execSilent: true` actions into `execute-silent` binds. Skipped for
 * skim, whose execute-silent cannot take quoted commands.
 */
export function convertExecSilentActions(opts: NormalizedOptions, deps: BindDeps): void {
  if (opts.finder.isSkim) return;
  const parens = opts.finder.has("fzf", FZF_GATES.reloadBind);

  for (const [key, descriptor] of Object.entries(opts.actions)) {
    if (!isDescriptor(descriptor) || !descriptor.execSilent) continue;
    descriptor.ignore = true;
    normalizeAffixes(descriptor);
    const cmd = silentCommand(key, descriptor, opts, deps);
    // `execute-silent:...` must end the bind, so a postfix needs the bracket form
    const bind =
      parens && descriptor.postfix
        ? `${descriptor.prefix ?? ""}execute-silent(${cmd})${descriptor.postfix}`
        : `${descriptor.prefix ?? ""}execute-silent:${cmd}`;
    opts.keymap.fzf[key] = { bind, desc: descriptor.desc ?? descriptor.fn.name };
  }
}
