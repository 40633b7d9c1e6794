/**
 * Run a command line through the platform shell.
 */

import { spawn } from "node:child_process";
import type { ChildProcess, StdioOptions } from "node:child_process";
import { IS_WINDOWS } from "@finderkit/shared";

export interface ShellSpawnOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  windows?: boolean;
  stdio?: StdioOptions;
}

export function shellArgv(command: string, windows: boolean = IS_WINDOWS): [file: string, args: string[]] {
  if (windows) return [process.env.ComSpec ?? "cmd.exe", ["/d", "/s", "/c", `"${command}"`]];
  return ["sh", ["-c", command]];
}

export function spawnShell(command: string, options: ShellSpawnOptions = {}): ChildProcess {
  const windows = options.windows ?? IS_WINDOWS;
  const [file, args] = shellArgv(command, windows);
  return spawn(file, args, {
    cwd: options.cwd,
    env: options.env ?? process.env,
    stdio: options.stdio ?? ["ignore", "pipe", "pipe"],
    windowsHide: true,
    windowsVerbatimArguments: windows,
  });
}
