/**
 * Finder process invocation.
 */

import { once } from "node:events";
import { LineBuffer, Logger, shellEscape } from "@finderkit/shared";
import { spawnShell } from "./bridge/spawn.js";
import type { NormalizedOptions } from "./types.js";

const log = Logger.for("FinderProcess");

export interface FinderRunResult {
  /** stdout lines: query, key line (when expected), selected items */
  lines: string[];
  exitCode: number;
}

export interface FinderRunOptions {
  cwd?: string;
  env?: Record<string, string>;
}

export interface FinderProcess {
  /**
   * Run the finder on the `contents` command with the compiled `argv`.
   * `argv` values are already shell-escaped.
   */
  run(
    contents: string | undefined,
    argv: readonly string[],
    opts: NormalizedOptions,
    options?: FinderRunOptions,
  ): Promise<FinderRunResult>;
}

/** Environment variable the dialect reads its input command from */
export function defaultCommandVar(opts: Pick<NormalizedOptions, "finder">): string {
  return opts.finder.isSkim ? "SKIM_DEFAULT_COMMAND" : "FZF_DEFAULT_COMMAND";
}

function finderBin(opts: NormalizedOptions): string {
  if (opts.tmuxMode === 1) return opts.finder.isSkim ? "sk-tmux" : "fzf-tmux";
  return opts.fzfBin ?? opts.finder.bin;
}

/**
 * Spawns the finder as a child of this process. The finder draws on the
 * terminal (stdin and stderr are inherited) and prints the selection to the
 * piped stdout.
 */
export class ChildFinderProcess implements FinderProcess {
  async run(
    contents: string | undefined,
    argv: readonly string[],
    opts: NormalizedOptions,
    options: FinderRunOptions = {},
  ): Promise<FinderRunResult> {
    const env: NodeJS.ProcessEnv = { ...process.env, ...options.env };
    if (contents !== undefined) env[defaultCommandVar(opts)] = contents;
    if (opts.ripgrepConfigPath) env.RIPGREP_CONFIG_PATH = opts.ripgrepConfigPath;

    const command = [shellEscape(finderBin(opts), opts.windows), ...argv].join(" ");
    log.debug({ command, contents }, "spawning finder");

    const child = spawnShell(command, {
      cwd: options.cwd ?? opts.cwd,
      env,
      windows: opts.windows,
      stdio: ["inherit", "pipe", "inherit"],
    });

    const buffer = new LineBuffer({ keepEmpty: true });
    const lines: string[] = [];
    child.stdout?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => {
      lines.push(...buffer.feed(chunk));
    });

    const closed = await once(child, "close");
    const code: number | null = closed[0];
    const signal: NodeJS.Signals | null = closed[1];
    lines.push(...buffer.flush());
    const exitCode = code ?? (signal === "SIGINT" ? 130 : 2);
    log.debug({ exitCode, signal, lines: lines.length }, "finder exited");
    return { lines, exitCode };
  }
}
