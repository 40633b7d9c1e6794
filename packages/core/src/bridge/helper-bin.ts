#!/usr/bin/env node
/**
 * Entry point the finder runs for stringified callbacks.
 */

import { runHelper } from "./helper.js";

runHelper(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  },
);
