/**
 * # finderkit shared
 *
 * Platform plumbing used by every finderkit package: structured logging,
 * user notifications, the error taxonomy, shell quoting, version comparison
 * and newline framing.
 *
 * @module @finderkit/shared
 */

export * from "./logger.js";
export * from "./notify.js";
export * from "./errors.js";
export * from "./shell.js";
export * from "./version.js";
export * from "./ndjson.js";
