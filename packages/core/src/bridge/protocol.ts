/**
 * Shell Bridge Protocol
 *
 * Messages exchanged between the host process and helper processes spawned
 * by the finder. Newline-delimited JSON over a Unix domain socket (a named
 * pipe on Windows).
 */

import { z } from "zod";

// ============================================================================
// Helper → Host
// ============================================================================

export const helperMessageSchema = z.discriminatedUnion("type", [
  /** Sent first so the host can kill the helper when the session ends */
  z.object({ type: z.literal("register"), pid: z.number().int() }),
  /** Invoke a registered callback with the finder's expanded placeholders */
  z.object({ type: z.literal("call"), id: z.string(), args: z.array(z.string()) }),
]);

export type HelperMessage = z.infer<typeof helperMessageSchema>;

// ============================================================================
// Host → Helper
// ============================================================================

export const hostMessageSchema = z.discriminatedUnion("type", [
  /** Lines for the helper to print on stdout */
  z.object({ type: z.literal("data"), lines: z.array(z.string()) }),
  /** Raw text for the helper to print as is */
  z.object({ type: z.literal("text"), text: z.string() }),
  z.object({ type: z.literal("end") }),
  z.object({ type: z.literal("error"), message: z.string() }),
]);

export type HostMessage = z.infer<typeof hostMessageSchema>;

export function encodeMessage(message: HelperMessage | HostMessage): string {
  return JSON.stringify(message) + "\n";
}

/**
 * Parse one line with the given schema, `undefined` on malformed input.
 */
export function decodeMessage<T>(schema: z.ZodType<T>, line: string): T | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}
