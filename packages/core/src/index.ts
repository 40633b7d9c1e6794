/**
 * @finderkit/core - fzf / skim session orchestration
 *
 * Main entry point with all essential exports
 */

// ============================================================================
// Sessions
// ============================================================================
export { Finder, type FinderDeps, type NormalizeRequest, type SessionResult, type ResumeOverrides } from "./finder.js";
export { ResumeRegistry, type LastSession, type ResumeValues } from "./registry.js";
export * from "./types.js";

// ============================================================================
// Capability
// ============================================================================
export {
  FinderCapability,
  FZF_GATES,
  detectFinder,
  hasExecutable,
  parseFinderVersion,
  resetFinderCache,
  type FinderDialect,
} from "./capability.js";

// ============================================================================
// Options
// ============================================================================
export {
  DEFAULT_GLOBALS,
  DEFAULT_HLS,
  DEFAULT_PREVIEW_WINOPTS,
  adaptFlags,
  isNormalized,
  mergeOptions,
  normalizeActions,
  normalizeOptions,
  type NormalizeContext,
} from "./options.js";

// ============================================================================
// Compilers
// ============================================================================
export { INLINE_LIST_LIMIT, disposeTempLists, stringify, stringifyList } from "./stringify.js";
export { combineContents, collectEntries, isEntryList, isSourceList } from "./contents.js";
export { QUERY_PLACEHOLDER, expandQuery, fieldIndex } from "./query.js";
export { buildFinderArgs, createColors, previewWindow, translateBorder } from "./cli-args.js";
export { convertExecSilentActions, convertReloadActions, createBinds, type BindDeps } from "./binds.js";
export { canTransform, setupLiveFlags } from "./live.js";
export { normalizeCwd, setFieldIndex, setHeader, setTitleFlags, shortenPath, type PathEnv } from "./header.js";
export { DEFAULT_GLOB_FLAG, DEFAULT_GLOB_SEPARATOR, globParse, hasFlag, rgInsertArgs, toggleCmdFlag } from "./rg.js";
export { ansiFromHl, hexFromHl } from "./highlight.js";

// ============================================================================
// Actions
// ============================================================================
export {
  BUILTIN_ACTIONS,
  DEFAULT_TOGGLE_FLAGS,
  act,
  actionLabel,
  actionsHeader,
  defineActionLabel,
  compileExpect,
  normalizeSelected,
  resolveAction,
  type ActionLabel,
  type ExpectResult,
} from "./actions.js";

// ============================================================================
// Collaborators
// ============================================================================
export { TerminalWindow, OK_EXIT_CODES, type FinderWindow, type TerminalStreams } from "./window.js";
export {
  ChildFinderProcess,
  defaultCommandVar,
  type FinderProcess,
  type FinderRunOptions,
  type FinderRunResult,
} from "./process.js";
export {
  CommandPreviewer,
  defaultPreviewCommand,
  definePreviewer,
  type CommandPreviewerOptions,
  type Previewer,
  type PreviewerCapabilities,
  type PreviewerCapability,
} from "./previewer.js";
export {
  SocketShellBridge,
  type BridgeCallOptions,
  type CmdFn,
  type DataFn,
  type MtOptions,
  type ShellBridge,
  type SilentFn,
  type SocketShellBridgeConfig,
} from "./bridge/bridge.js";
export { runHelper, type HelperIO } from "./bridge/helper.js";

// ============================================================================
// Pickers
// ============================================================================
export {
  GREP_DEFAULTS,
  GREP_RESUME_KEY,
  getGrepCmd,
  grep,
  grepProject,
  liveGrep,
  liveGrepNative,
  type GrepEnv,
  type GrepPickerDeps,
} from "./pickers/grep.js";
