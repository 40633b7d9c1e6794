/**
 * Live-reload controller: turns a per-query command into the finder's
 * reload (fzf) or interactive (skim) wiring.
 */

import { shellEscape, shellNop, skEscape } from "@finderkit/shared";
import { FZF_GATES } from "./capability.js";
import type { NormalizedOptions } from "./types.js";

/**
 * Whether live callbacks can answer with `transform` actions instead of
 * being reloaded: fzf ≥ 0.45 and glob parsing done in this process.
 */
export function canTransform(opts: NormalizedOptions): boolean {
  return (
    opts.finder.has("fzf", FZF_GATES.transform) &&
    Boolean(opts.rgGlob) &&
    !opts.multiprocess &&
    !opts.fnTransform &&
    !opts.stripCwdPrefix &&
    (opts.fileIgnorePatterns?.length ?? 0) === 0 &&
    !opts.fnPreprocess &&
    !opts.fnPostprocess
  );
}

/**
 * Skip the command on an empty query. Windows relies on the caret escaping
 * of fzf's quoted `{q}`.
 */
function emptyQueryGuard(fieldIndex: string, opts: NormalizedOptions): string {
  if (opts.execEmptyQuery || opts.argvExpr) return "";
  if (!opts.windows) return `[ -z ${fieldIndex} ] || `;
  return opts.finder.has("fzf", FZF_GATES.windowsEmptyQuery)
    ? `IF ${fieldIndex} NEQ ^"^" `
    : `IF ^${fieldIndex} NEQ ^^"^" `;
}

function bindArg(bind: string, opts: NormalizedOptions): string {
  return `--bind=${shellEscape(bind, opts.windows)}`;
}

/**
 * Wire `command` to run on every query change.
 */
export function setupLiveFlags(command: string, fieldIndex: string, opts: NormalizedOptions): void {
  opts.query ??= "";

  let initial = command;
  if (opts.stderrToStdout !== false && !initial.includes("2>")) {
    initial = `${command} 2>&1`;
  }

  let reload = initial;
  if (typeof opts.queryDelay === "number") {
    reload = `sleep ${(opts.queryDelay / 1000).toFixed(2)}; ${reload}`;
  }

  const guard = emptyQueryGuard(fieldIndex, opts);

  if (opts.finder.isSkim) {
    const prompt = opts.savedPrompt ?? opts.prompt ?? stringFlag(opts.fzfOpts["--prompt"]);
    if (prompt !== undefined) {
      opts.fzfOpts["--prompt"] = /[^*]+/.exec(prompt)?.[0] ?? "";
      opts.fzfOpts["--cmd-prompt"] = prompt;
      // resume restores the asterisk prompt from here
      opts.savedPrompt = prompt;
      opts.prompt = undefined;
    }
    // the skim placeholder is double-quoted, so is the initial query
    opts.fzfOpts["--cmd-query"] = skEscape(opts.query);
    // with both set skim would fuzzy match the query on top of the results
    delete opts.fzfOpts["--query"];
    opts.query = undefined;
    opts.extraArgs.push(`--interactive --cmd ${shellEscape(guard + reload, opts.windows)}`);
    return;
  }

  opts.fzfOpts["--disabled"] = true;
  opts.fzfOpts["--query"] = opts.query;
  if (opts.silentFail !== false) {
    reload = `${reload} || ${shellNop(opts.windows)}`;
  }

  const startEvent = opts.finder.has("fzf", FZF_GATES.startEvent);
  if (canTransform(opts)) {
    opts.extraArgs.push(bindArg(`change:+transform:${reload}`, opts));
    if (startEvent) opts.extraArgs.push(bindArg(`start:+transform:${reload}`, opts));
    return;
  }
  opts.extraArgs.push(bindArg(`change:+reload:${guard}${reload}`, opts));
  if (startEvent) opts.extraArgs.push(bindArg(`start:+reload:${guard}${reload}`, opts));
}

function stringFlag(value: NormalizedOptions["fzfOpts"][string]): string | undefined {
  return typeof value === "string" ? value : undefined;
}
