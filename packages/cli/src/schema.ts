/**
 * zod schemas for the options that can be written down: in the config file
 * or as `key=value` command arguments. Callbacks and collaborators have no
 * serialized form and are not accepted here.
 */

import { z } from "zod";

// numbers typed on the command line parse as numbers, accept them where text is expected
const text = z.union([z.string(), z.number().transform(String)]);

const flagValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const colorSpec = z
  .tuple([z.enum(["fg", "bg"]), z.union([z.string(), z.array(z.string())])])
  .rest(z.string());

const previewWinOptsSchema = z
  .object({
    hidden: z.boolean(),
    wrap: z.boolean(),
    border: z.union([z.string(), z.boolean()]),
    layout: z.enum(["flex", "horizontal", "vertical"]),
    horizontal: z.string(),
    vertical: z.string(),
    flipColumns: z.number().int().positive(),
  })
  .partial();

export const winOptsSchema = z
  .object({
    title: z.union([z.string(), z.array(z.tuple([z.string(), z.string().optional()]))]),
    titleFlags: z.boolean(),
    fullscreen: z.boolean(),
    preview: previewWinOptsSchema,
  })
  .partial();

const keymapBind = z.union([z.string(), z.literal(false), z.object({ bind: z.string(), desc: z.string().optional() })]);

export const sessionOptionsSchema = z
  .object({
    cwd: z.string(),
    prompt: text,
    header: text,
    query: text,
    preview: z.string(),
    previewOffset: z.string(),

    fzfBin: z.string(),
    tmuxMode: z.union([z.literal(0), z.literal(1), z.literal(2)]),
    fzfTmuxOpts: z.record(z.string()),
    fzfOpts: z.record(z.union([flagValue, z.array(z.union([z.string(), z.number()]))])),
    fzfColors: z.record(z.union([colorSpec, z.string(), z.literal(false)])),
    highlights: z.record(z.object({ fg: z.string().optional(), bg: z.string().optional() })),
    fzfArgs: z.union([z.string(), z.array(z.string())]),
    fzfRawArgs: z.union([z.string(), z.array(z.string())]),
    fzfCliArgs: z.union([z.string(), z.array(z.string())]),
    keymap: z.object({ fzf: z.record(keymapBind) }).partial(),
    winopts: winOptsSchema,

    multiprocess: z.union([z.boolean(), z.literal(1)]),
    execEmptyQuery: z.boolean(),
    queryDelay: z.number().int().nonnegative(),
    stderrToStdout: z.boolean(),
    silentFail: z.boolean(),
    stripCwdPrefix: z.boolean(),
    fileIgnorePatterns: z.array(z.string()),

    headers: z.union([z.array(z.enum(["cwd", "search", "lsp_query", "regex_filter", "actions"])), z.literal(false)]),
    noHeader: z.boolean(),
    noHeaderI: z.boolean(),
    headerPrefix: z.string(),
    headerSeparator: z.string(),
    cwdHeader: z.boolean(),
    cwdPrompt: z.boolean(),
    cwdPromptShortenLen: z.number().int().nonnegative(),
    cwdPromptShortenVal: z.number().int().positive(),
    cwdHeaderTxt: z.string(),
    grepHeaderTxt: z.string(),
    regexHeaderTxt: z.string(),
    interactiveHeaderTxt: z.string(),

    resume: z.boolean(),
    noResume: z.boolean(),
    windows: z.boolean(),
    autoclose: z.boolean(),
    debug: z.union([z.boolean(), z.literal("verbose")]),
  })
  .partial();

export const grepOptionsSchema = z
  .object({
    search: text,
    cmd: z.string(),
    rawCmd: z.string(),
    rgOpts: z.string(),
    grepOpts: z.string(),
    rgGlob: z.union([z.boolean(), z.number()]),
    globFlag: z.string(),
    globSeparator: z.string(),
    noEsc: z.union([z.boolean(), z.literal(2)]),
    filespec: z.string(),
    filename: z.string(),
    searchPaths: z.union([z.string(), z.array(z.string())]),
    filter: z.string(),
    noColumnHide: z.boolean(),
    silent: z.boolean(),
    toggleHiddenFlag: z.string(),
    toggleIgnoreFlag: z.string(),
    toggleFollowFlag: z.string(),
    hidden: z.boolean(),
    noIgnore: z.boolean(),
    follow: z.boolean(),
    ripgrepConfigPath: z.string(),
    inputPrompt: z.string(),
  })
  .partial();

/** Everything a command line may set */
export const commandOptionsSchema = sessionOptionsSchema.merge(grepOptionsSchema);

export type CommandOptions = z.infer<typeof commandOptionsSchema>;

/** Keys a schema does not know, in input order */
export function unknownKeys(schema: z.AnyZodObject, value: Record<string, unknown>): string[] {
  const known = new Set(Object.keys(schema.shape));
  return Object.keys(value).filter((key) => !known.has(key));
}
