/**
 * Multiprocess command specs.
 *
 * A shell command the finder can run in a helper process without calling
 * back into the host: the spec carries everything needed to rewrite the
 * query and post-process output lines, serialized into a single argv.
 */

import { z } from "zod";
import { ConfigurationError, shellEscape } from "@finderkit/shared";
import { expandQuery } from "../query.js";
import { globParse, rgInsertArgs } from "../rg.js";

export const mtSpecSchema = z.object({
  cmd: z.string(),
  /** Last argv is the live query, substituted into `<query>` */
  argvExpr: z.boolean().default(false),
  cwd: z.string().optional(),
  execEmptyQuery: z.boolean().default(false),
  rgGlob: z.boolean().default(false),
  globFlag: z.string().optional(),
  globSeparator: z.string().optional(),
  stripCwdPrefix: z.boolean().default(false),
  fileIgnorePatterns: z.array(z.string()).default([]),
  windows: z.boolean().default(false),
  /** Host socket the helper registers its pid on */
  socketPath: z.string().optional(),
});

export type MtSpec = z.infer<typeof mtSpecSchema>;
export type MtSpecInput = z.input<typeof mtSpecSchema>;

export function encodeMtSpec(spec: MtSpecInput): string {
  return Buffer.from(JSON.stringify(spec), "utf8").toString("base64url");
}

export function decodeMtSpec(encoded: string): MtSpec {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(encoded, "base64url").toString("utf8"));
  } catch (err) {
    throw new ConfigurationError("Malformed command spec", {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  const parsed = mtSpecSchema.safeParse(raw);
  if (!parsed.success) throw ConfigurationError.fromZod("Invalid command spec", parsed.error);
  return parsed.data;
}

/**
 * The command to run for `argv`, or `undefined` when an empty query should
 * produce no output.
 */
export function resolveMtCommand(spec: MtSpec, argv: readonly string[]): string | undefined {
  if (!spec.argvExpr) return spec.cmd;

  let cmd = spec.cmd;
  let query = argv.length > 0 ? argv[argv.length - 1] : "";
  if (query.length === 0 && !spec.execEmptyQuery) return undefined;

  if (spec.rgGlob) {
    const parsed = globParse(query, spec);
    if (parsed.globArgs !== undefined) {
      query = parsed.query;
      cmd = rgInsertArgs(cmd, parsed.globArgs);
    }
  }
  return expandQuery(cmd, shellEscape(query, spec.windows));
}

/**
 * Per-line filter: strips `./`, drops ignored paths.
 */
export function createLineProcessor(spec: MtSpec): (line: string) => string | undefined {
  const ignore = spec.fileIgnorePatterns.map((pattern) => new RegExp(pattern));
  return (line) => {
    const out = spec.stripCwdPrefix && line.startsWith("./") ? line.slice(2) : line;
    if (ignore.some((re) => re.test(out))) return undefined;
    return out;
  };
}

export function needsProcessing(opts: {
  rgGlob?: boolean | number;
  stripCwdPrefix?: boolean;
  fileIgnorePatterns?: readonly string[];
}): boolean {
  return Boolean(opts.rgGlob) || Boolean(opts.stripCwdPrefix) || (opts.fileIgnorePatterns?.length ?? 0) > 0;
}
