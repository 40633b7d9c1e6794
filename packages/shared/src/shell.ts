/**
 * Shell quoting for the two command shells the finder may run commands in:
 * POSIX `sh` and Windows `cmd.exe`.
 */

export const IS_WINDOWS = process.platform === "win32";

/** cmd.exe metacharacters that need a caret inside a caret-quoted string. */
const CMD_META = /[\^&|<>()%!"]/g;

/**
 * Quote a value for the shell.
 *
 * POSIX: single quotes, embedded `'` as `'\''`.
 * Windows: `^"...^"` with caret-escaped metacharacters; a value holding `!`
 * gets doubled carets since delayed expansion eats one level.
 */
export function shellEscape(value: string, windows: boolean = IS_WINDOWS): string {
  if (!windows) {
    return `'${value.replace(/'/g, `'\\''`)}'`;
  }
  const caret = value.includes("!") ? "^^" : "^";
  const escaped = value
    .replace(/(\\*)"/g, (_m, slashes: string) => `${slashes}${slashes}\\"`)
    .replace(/(\\+)$/, (_m, slashes: string) => `${slashes}${slashes}`)
    .replace(CMD_META, (c) => `${caret}${c}`);
  return `^"${escaped}^"`;
}

/**
 * Whether the value already looks quoted for the shell.
 */
export function isEscaped(value: string, windows: boolean = IS_WINDOWS): boolean {
  if (windows && /^\^".*\^"$/s.test(value)) return true;
  return /^'.*'$/s.test(value) || /^".*"$/s.test(value);
}

/** A command that succeeds and prints nothing. */
export function shellNop(windows: boolean = IS_WINDOWS): string {
  return windows ? "break" : "true";
}

/**
 * Escape regex metacharacters so ripgrep matches the text literally.
 */
export function rgEscape(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/[$?()[\]{}*.+|^]/g, (c) => `\\${c}`);
}

/**
 * Escape a query for skim's `--cmd-query`: the `{}` placeholder is wrapped in
 * double quotes, so quotes and backticks inside the query need a backslash.
 */
export function skEscape(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/["`]/g, (c) => `\\${c}`);
}

/**
 * Escape a literal string for use inside a RegExp.
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\-]/g, "\\$&");
}
