/**
 * @finderkit/cli - command line front end
 */

export {
  COMMANDS,
  isCommand,
  parseArgs,
  parseCommandOptions,
  parseValue,
  runCommand,
  type CommandFn,
  type RunCommandContext,
} from "./cli.js";
export { candidates, flattenKeys } from "./candidates.js";
export { getConfigPath, loadConfig, loadConfigFile, type CliConfig, type ConfigFile, type LoadConfigOptions } from "./config.js";
export { commandOptionsSchema, grepOptionsSchema, sessionOptionsSchema, type CommandOptions } from "./schema.js";
