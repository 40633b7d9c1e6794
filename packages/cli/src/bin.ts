#!/usr/bin/env node
/**
 * finderkit CLI - Entry point
 */

import { program } from "commander";
import { DEFAULT_GLOBALS, Finder, GREP_RESUME_KEY, mergeOptions } from "@finderkit/core";
import { Logger, notify } from "@finderkit/shared";
import { candidates } from "./candidates.js";
import { runCommand } from "./cli.js";
import { loadConfig } from "./config.js";

const log = Logger.for("Cli");

interface ProgramOptions {
  config?: string;
  fzfBin?: string;
  debug?: boolean;
}

program
  .name("finderkit")
  .description("Fuzzy finder pickers for the terminal")
  .version("0.1.0");

// Completion (used by shell completion scripts)
program
  .command("complete <line>")
  .description("Print completion candidates for a partial command line")
  .action((line: string) => {
    for (const candidate of candidates(line)) {
      process.stdout.write(`${candidate}\n`);
    }
  });

// Pickers
program
  .argument("[command]", "picker to run: grep, live_grep, live_grep_native, grep_project, resume")
  .argument("[args...]", "picker options as key=value")
  .option("-c, --config <path>", "Config file (default: ~/.config/finderkit/config.json)")
  .option("--fzf-bin <bin>", "Finder binary (fzf, sk or a path)")
  .option("--debug", "Enable debug logging")
  .action(async (command: string | undefined, args: string[], options: ProgramOptions) => {
    if (!command) {
      program.help();
    }

    const config = loadConfig(options);
    if (config.debug) Logger.setLevel("debug");

    const finder = new Finder({
      globals: mergeOptions(DEFAULT_GLOBALS, config.globals),
      pickerGlobals: { [GREP_RESUME_KEY]: config.grep },
    });
    try {
      process.exitCode = await runCommand(command, args, { finder });
    } finally {
      await finder.close();
    }
  });

program.parseAsync().catch((err: unknown) => {
  log.error({ err }, "command failed");
  notify.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
