/**
 * Configuration loading
 *
 * Priority: CLI > Environment > Config file > defaults.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import { ConfigurationError, Logger, notify } from "@finderkit/shared";
import type { FinderOptions } from "@finderkit/core";
import { grepOptionsSchema, sessionOptionsSchema } from "./schema.js";

const log = Logger.for("Config");

const configFileSchema = sessionOptionsSchema.extend({
  grep: grepOptionsSchema.merge(sessionOptionsSchema).optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface CliConfig {
  /** Applied to every picker */
  globals: FinderOptions;
  /** Applied to the grep pickers, above `globals` */
  grep: FinderOptions;
  debug: boolean;
}

export interface LoadConfigOptions {
  /** `--config` */
  config?: string;
  /** `--debug` */
  debug?: boolean;
  /** `--fzf-bin` */
  fzfBin?: string;
  env?: NodeJS.ProcessEnv;
  home?: string;
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env, home: string = os.homedir()): string {
  return env.FINDERKIT_CONFIG ?? path.join(home, ".config", "finderkit", "config.json");
}

/**
 * Read and validate the config file. A missing file is an empty config, an
 * unreadable or invalid one is reported and ignored.
 */
export function loadConfigFile(configPath: string): ConfigFile {
  if (!fs.existsSync(configPath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    log.warn({ configPath, err }, "config file is not valid JSON");
    notify.warn(`Ignoring config file '${configPath}': ${reason}`);
    return {};
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const error = ConfigurationError.fromZod(`Invalid config file '${configPath}'`, parsed.error);
    log.warn({ configPath, issues: parsed.error.issues }, "config file failed validation");
    notify.warn(`${error.message}, ignoring it`);
    return {};
  }
  return parsed.data;
}

function envFlag(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Load configuration from environment, config file and CLI options
 */
export function loadConfig(cliOptions: LoadConfigOptions = {}): CliConfig {
  const env = cliOptions.env ?? process.env;
  const configPath = cliOptions.config ?? getConfigPath(env, cliOptions.home);
  const { grep = {}, ...globals } = loadConfigFile(configPath);

  const fzfBin = cliOptions.fzfBin ?? env.FINDERKIT_FZF_BIN ?? globals.fzfBin;
  if (fzfBin !== undefined) globals.fzfBin = fzfBin;

  const debug = cliOptions.debug || envFlag(env.FINDERKIT_DEBUG) || (globals.debug !== undefined && globals.debug !== false);

  log.debug({ configPath, fzfBin, debug }, "config loaded");
  return { globals, grep, debug };
}
