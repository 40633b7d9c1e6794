/**
 * Error taxonomy
 *
 * - ConfigurationError: invalid or conflicting definitions, thrown eagerly
 * - CapabilityError: a feature the active finder cannot provide
 * - EnvironmentError: missing binaries, unusable host context
 * - EditorConflictError: benign host-editor state conflict raised by an action
 */

import type { ZodError } from "zod";

export type FinderkitErrorCode =
  | "CONFIGURATION_ERROR"
  | "CAPABILITY_ERROR"
  | "ENVIRONMENT_ERROR"
  | "EDITOR_CONFLICT";

export class FinderkitError extends Error {
  readonly code: FinderkitErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: FinderkitErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "FinderkitError";
    this.code = code;
    this.details = details;
  }
}

export class ConfigurationError extends FinderkitError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("CONFIGURATION_ERROR", message, details);
    this.name = "ConfigurationError";
  }

  /**
   * Wrap a zod failure, keeping the first issue path in the message.
   */
  static fromZod(context: string, error: ZodError): ConfigurationError {
    const issue = error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join(".")}"` : "";
    const reason = issue?.message ?? "invalid value";
    return new ConfigurationError(`${context}${where}: ${reason}`, { issues: error.issues });
  }
}

export class CapabilityError extends FinderkitError {
  constructor(
    message: string,
    readonly feature: string,
  ) {
    super("CAPABILITY_ERROR", message, { feature });
    this.name = "CapabilityError";
  }
}

export class EnvironmentError extends FinderkitError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("ENVIRONMENT_ERROR", message, details);
    this.name = "EnvironmentError";
  }
}

/**
 * Thrown by host actions when the editor refused to open a target because of
 * existing state (e.g. a swap file) and is already asking the user about it.
 * The session treats it as handled.
 */
export class EditorConflictError extends FinderkitError {
  constructor(message = "Editor state conflict", details: Record<string, unknown> = {}) {
    super("EDITOR_CONFLICT", message, details);
    this.name = "EditorConflictError";
  }
}

export function isFinderkitError(error: unknown): error is FinderkitError {
  return error instanceof FinderkitError;
}

export function isEditorConflict(error: unknown): error is EditorConflictError {
  return isFinderkitError(error) && error.code === "EDITOR_CONFLICT";
}

/**
 * Throw a ConfigurationError unless the condition holds.
 */
export function invariant(
  condition: unknown,
  message: string,
  details?: Record<string, unknown>,
): asserts condition {
  if (!condition) {
    throw new ConfigurationError(message, details);
  }
}
