/**
 * Shell Bridge
 *
 * The finder only runs shell commands. To let it call back into this
 * process (live contents, preview text, silent actions) each callback is
 * registered under an id and stringified as a command that starts a small
 * helper process; the helper connects back over a local socket, invokes
 * the callback and prints what comes back.
 *
 *   finder ──sh──▶ helper ──NDJSON──▶ SocketShellBridge ──▶ callback
 */

import net from "node:net";
import fs from "node:fs";
import { randomUUID } from "node:crypto";
import { tmpdir } from "node:os";
import { extname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type { ChildProcess } from "node:child_process";
import type { Readable } from "node:stream";
import { IS_WINDOWS, LineBuffer, Logger, shellEscape } from "@finderkit/shared";
import { isEntryList } from "../contents.js";
import type { ContentsProducer, Entry, EntryTransform, LiveContentsFn } from "../types.js";
import { createLineProcessor, encodeMtSpec, mtSpecSchema, needsProcessing, resolveMtCommand, type MtSpecInput } from "./mt.js";
import { decodeMessage, encodeMessage, helperMessageSchema, type HostMessage } from "./protocol.js";
import { spawnShell } from "./spawn.js";

const log = Logger.for("ShellBridge");

// ============================================================================
// Contracts
// ============================================================================

/** Returns text (or lines) for the helper to print */
export type DataFn = (
  args: string[],
) => string | readonly string[] | undefined | void | Promise<string | readonly string[] | undefined | void>;

/** Returns a command whose output the helper prints */
export type CmdFn = (args: string[]) => string | undefined | Promise<string | undefined>;

/** Runs for its side effect, prints nothing */
export type SilentFn = (items: string[]) => void | Promise<void>;

export interface BridgeCallOptions {
  cwd?: string;
  windows?: boolean;
  fnTransform?: EntryTransform;
}

export interface MtOptions extends BridgeCallOptions {
  argvExpr?: boolean;
  execEmptyQuery?: boolean;
  rgGlob?: boolean | number;
  globFlag?: string;
  globSeparator?: string;
  stripCwdPrefix?: boolean;
  fileIgnorePatterns?: readonly string[];
  /** Run the command from this process instead of a helper */
  inProcess?: boolean;
}

export interface ShellBridge {
  /** Command that streams a producer's entries */
  stringify(produce: ContentsProducer, opts: BridgeCallOptions): string;
  /**
   * Command for live contents: the callback receives the expanded
   * placeholders (`fieldIndex`) on every call.
   */
  stringifyLive(fn: LiveContentsFn, opts: BridgeCallOptions, fieldIndex: string): string;
  /**
   * Command that runs `cmd` in a helper with query substitution and line
   * processing. Returns `cmd` unchanged (and clears `argvExpr`) when no
   * processing is needed.
   */
  stringifyMt(cmd: string, opts: MtOptions): string;
  stringifyData(fn: DataFn, opts: BridgeCallOptions, fieldIndex?: string): string;
  stringifyData2(fn: SilentFn, opts: BridgeCallOptions, fieldIndex?: string): string;
  stringifyCmd(fn: CmdFn, opts: BridgeCallOptions, fieldIndex?: string): string;
  /** Resolves once callbacks can be served */
  ready(): Promise<void>;
  /** Terminate helpers still running from the last session */
  killHelpers(): void;
  /** Number of callbacks registered so far; later callbacks sort after it */
  mark(): number;
  /** Forget callbacks registered up to `mark` */
  release(mark: number): void;
  close(): Promise<void>;
}

// ============================================================================
// Socket implementation
// ============================================================================

type Callback =
  | { kind: "contents"; run: LiveContentsFn; opts: BridgeCallOptions }
  | { kind: "data"; run: DataFn; opts: BridgeCallOptions }
  | { kind: "cmd"; run: CmdFn; opts: BridgeCallOptions };

export interface SocketShellBridgeConfig {
  socketPath?: string;
  /** argv prefix that starts the helper; defaults to this runtime + helper-bin */
  helperCommand?: readonly string[];
  windows?: boolean;
}

function defaultSocketPath(windows: boolean): string {
  const name = `finderkit-${process.pid}-${randomUUID().slice(0, 8)}`;
  return windows ? `\\\\.\\pipe\\${name}` : join(tmpdir(), `${name}.sock`);
}

function defaultHelperCommand(): string[] {
  const self = fileURLToPath(import.meta.url);
  const helper = fileURLToPath(new URL(`./helper-bin${extname(self)}`, import.meta.url));
  return [process.execPath, ...process.execArgv, helper];
}

export interface ReplySocket {
  readonly destroyed: boolean;
  readonly writable: boolean;
  write(chunk: string): boolean;
  once(event: "drain", listener: () => void): unknown;
}

/**
 * Writes host messages to one helper connection.
 */
export class HelperReply {
  constructor(private readonly socket: ReplySocket) {}

  get closed(): boolean {
    return this.socket.destroyed || !this.socket.writable;
  }

  /** False when the message is queued behind a full socket */
  send(message: HostMessage, flushed?: () => void): boolean {
    if (this.closed) return true;
    const ok = this.socket.write(encodeMessage(message));
    if (flushed) {
      if (ok) flushed();
      else this.socket.once("drain", flushed);
    }
    return ok;
  }

  onDrain(listener: () => void): void {
    this.socket.once("drain", listener);
  }
}

/**
 * Send function that pauses `sources` while the helper socket is backed up
 * and resumes them on drain.
 */
export function relayWithBackpressure(
  reply: HelperReply,
  sources: readonly Readable[],
): (message: HostMessage) => void {
  let paused = false;
  return (message) => {
    if (reply.send(message) || paused) return;
    paused = true;
    for (const source of sources) source.pause();
    reply.onDrain(() => {
      paused = false;
      for (const source of sources) source.resume();
    });
  };
}

export class SocketShellBridge implements ShellBridge {
  readonly socketPath: string;
  private readonly helperCommand: readonly string[];
  private readonly windows: boolean;
  private server: net.Server | null = null;
  private listening: Promise<void> | null = null;
  private readonly callbacks = new Map<string, Callback>();
  private readonly helperPids = new Set<number>();
  private nextId = 0;

  constructor(config: SocketShellBridgeConfig = {}) {
    this.windows = config.windows ?? IS_WINDOWS;
    this.socketPath = config.socketPath ?? defaultSocketPath(this.windows);
    this.helperCommand = config.helperCommand ?? defaultHelperCommand();
  }

  stringify(produce: ContentsProducer, opts: BridgeCallOptions): string {
    return this.callCommand({ kind: "contents", run: () => produce, opts });
  }

  stringifyLive(fn: LiveContentsFn, opts: BridgeCallOptions, fieldIndex: string): string {
    return this.callCommand({ kind: "contents", run: fn, opts }, fieldIndex);
  }

  stringifyMt(cmd: string, opts: MtOptions): string {
    const spec: MtSpecInput = {
      cmd,
      argvExpr: opts.argvExpr ?? false,
      cwd: opts.cwd,
      execEmptyQuery: opts.execEmptyQuery ?? false,
      rgGlob: Boolean(opts.rgGlob),
      globFlag: opts.globFlag,
      globSeparator: opts.globSeparator,
      stripCwdPrefix: opts.stripCwdPrefix ?? false,
      fileIgnorePatterns: opts.fileIgnorePatterns ? [...opts.fileIgnorePatterns] : [],
      windows: opts.windows ?? this.windows,
    };

    // transforms are functions: run the command here and stream the result
    const transform = opts.fnTransform;
    if (transform || opts.inProcess) {
      const resolved = mtSpecSchema.parse(spec);
      const processLine = createLineProcessor(resolved);
      const fnTransform: EntryTransform = (line) => {
        const kept = processLine(line);
        return kept === undefined || !transform ? kept : transform(kept);
      };
      return this.callCommand({
        kind: "contents",
        run: (args) => resolveMtCommand(resolved, args),
        opts: { ...opts, fnTransform },
      });
    }

    if (!needsProcessing(opts)) {
      opts.argvExpr = false;
      return cmd;
    }

    this.ensureServer();
    return this.command(["mt", encodeMtSpec({ ...spec, socketPath: this.socketPath })]);
  }

  stringifyData(fn: DataFn, opts: BridgeCallOptions, fieldIndex?: string): string {
    return this.callCommand({ kind: "data", run: fn, opts }, fieldIndex);
  }

  stringifyData2(fn: SilentFn, opts: BridgeCallOptions, fieldIndex?: string): string {
    const run: DataFn = async (args) => {
      await fn(args);
    };
    return this.callCommand({ kind: "data", run, opts }, fieldIndex);
  }

  stringifyCmd(fn: CmdFn, opts: BridgeCallOptions, fieldIndex?: string): string {
    return this.callCommand({ kind: "cmd", run: fn, opts }, fieldIndex);
  }

  async ready(): Promise<void> {
    if (this.listening) await this.listening;
  }

  killHelpers(): void {
    for (const pid of this.helperPids) {
      try {
        process.kill(pid, "SIGTERM");
      } catch (err) {
        // ESRCH: already exited
        log.trace({ pid, err }, "helper already gone");
      }
    }
    this.helperPids.clear();
  }

  mark(): number {
    return this.nextId;
  }

  release(mark: number): void {
    for (const id of this.callbacks.keys()) {
      if (callbackSeq(id) <= mark) this.callbacks.delete(id);
    }
    log.debug({ mark, remaining: this.callbacks.size }, "released callbacks");
  }

  async close(): Promise<void> {
    this.killHelpers();
    this.callbacks.clear();
    const server = this.server;
    if (!server) return;
    this.server = null;
    this.listening = null;
    await new Promise<void>((resolve) => server.close(() => resolve()));
    if (!this.windows) {
      fs.rmSync(this.socketPath, { force: true });
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private callCommand(callback: Callback, fieldIndex?: string): string {
    this.ensureServer();
    const id = `cb${++this.nextId}`;
    this.callbacks.set(id, callback);
    log.debug({ id, kind: callback.kind }, "registered callback");
    return this.command(["call", this.socketPath, id], fieldIndex);
  }

  private command(parts: readonly string[], fieldIndex?: string): string {
    const quoted = [...this.helperCommand, ...parts].map((part) => shellEscape(part, this.windows));
    if (fieldIndex) quoted.push(fieldIndex);
    return quoted.join(" ");
  }

  private ensureServer(): void {
    if (this.server) return;

    if (!this.windows) {
      fs.rmSync(this.socketPath, { force: true });
    }

    const server = net.createServer((socket) => this.handleConnection(socket));
    this.server = server;
    this.listening = new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.socketPath, () => {
        server.off("error", reject);
        server.on("error", (err) => log.error({ err }, "bridge server error"));
        resolve();
      });
    });
    // the finder session, not the bridge, keeps the process alive
    server.unref();
  }

  private handleConnection(socket: net.Socket): void {
    const lineBuffer = new LineBuffer();
    const reply = new HelperReply(socket);
    let children: ChildProcess[] = [];

    socket.on("data", (chunk) => {
      for (const line of lineBuffer.feed(chunk.toString())) {
        const message = decodeMessage(helperMessageSchema, line);
        if (!message) {
          reply.send({ type: "error", message: "Failed to parse message" });
          continue;
        }
        if (message.type === "register") {
          this.helperPids.add(message.pid);
          socket.once("close", () => this.helperPids.delete(message.pid));
          continue;
        }
        this.handleCall(reply, message.id, message.args, (child) => children.push(child)).then(
          () => socket.end(),
          (err: unknown) => log.error({ err, id: message.id }, "bridge call failed"),
        );
      }
    });

    // helper killed (reload, finder exit): stop whatever it was waiting on
    socket.on("close", () => {
      for (const child of children) child.kill();
      children = [];
    });

    socket.on("error", (err) => {
      log.debug({ err }, "helper connection error");
    });
  }

  private async handleCall(
    reply: HelperReply,
    id: string,
    args: string[],
    track: (child: ChildProcess) => void,
  ): Promise<void> {
    const callback = this.callbacks.get(id);
    if (!callback) {
      reply.send({ type: "error", message: `Unknown callback '${id}'` });
      return;
    }

    try {
      switch (callback.kind) {
        case "contents": {
          const result = await callback.run(args);
          await this.feed(result, reply, callback.opts, track);
          break;
        }
        case "data": {
          const result = await callback.run(args);
          if (typeof result === "string") reply.send({ type: "text", text: result });
          else if (result) reply.send({ type: "data", lines: [...result] });
          break;
        }
        case "cmd": {
          const cmd = await callback.run(args);
          if (cmd) await this.runCommand(cmd, reply, callback.opts, track, true);
          break;
        }
      }
      reply.send({ type: "end" });
    } catch (err) {
      log.error({ err, id }, "callback threw");
      reply.send({ type: "error", message: err instanceof Error ? err.message : String(err) });
    }
  }

  private async feed(
    result: Awaited<ReturnType<LiveContentsFn>>,
    reply: HelperReply,
    opts: BridgeCallOptions,
    track: (child: ChildProcess) => void,
  ): Promise<void> {
    if (result === undefined) return;
    if (typeof result === "string") {
      await this.runCommand(result, reply, opts, track, false);
      return;
    }
    const transform = opts.fnTransform;
    const apply = (entry: Entry): string | undefined => (transform ? transform(String(entry)) : String(entry));

    if (isEntryList(result)) {
      const lines: string[] = [];
      for (const entry of result) {
        const line = apply(entry);
        if (line !== undefined) lines.push(line);
      }
      reply.send({ type: "data", lines });
      return;
    }

    await new Promise<void>((resolve, reject) => {
      let ended = false;
      const end = () => {
        if (!ended) {
          ended = true;
          resolve();
        }
      };
      try {
        const pending = result((entry, flushed) => {
          if (ended) return;
          if (entry === undefined || reply.closed) {
            end();
            return;
          }
          const line = apply(entry);
          if (line === undefined) {
            flushed?.();
            return;
          }
          reply.send({ type: "data", lines: [line] }, flushed);
        });
        if (pending instanceof Promise) pending.then(end, reject);
      } catch (err) {
        reject(err);
      }
    });
  }

  private runCommand(
    cmd: string,
    reply: HelperReply,
    opts: BridgeCallOptions,
    track: (child: ChildProcess) => void,
    raw: boolean,
  ): Promise<void> {
    log.debug({ cmd, cwd: opts.cwd }, "running command for helper");
    const child = spawnShell(cmd, { cwd: opts.cwd, windows: opts.windows ?? this.windows });
    track(child);
    const transform = opts.fnTransform;
    const lineBuffer = new LineBuffer();
    const sources = [child.stdout, child.stderr].filter((stream): stream is Readable => stream !== null);
    const send = relayWithBackpressure(reply, sources);

    const forward = (lines: string[]) => {
      const out: string[] = [];
      for (const line of lines) {
        const next = transform ? transform(line) : line;
        if (next !== undefined) out.push(next);
      }
      if (out.length > 0) send({ type: "data", lines: out });
    };

    child.stdout?.on("data", (chunk: Buffer) => {
      if (raw) send({ type: "text", text: chunk.toString() });
      else forward(lineBuffer.feed(chunk.toString()));
    });
    child.stderr?.on("data", (chunk: Buffer) => {
      if (raw) send({ type: "text", text: chunk.toString() });
      else log.debug({ cmd, stderr: chunk.toString() }, "command stderr");
    });

    return new Promise<void>((resolve, reject) => {
      child.on("error", reject);
      child.on("close", () => {
        if (!raw) forward(lineBuffer.flush());
        resolve();
      });
    });
  }
}

/** `cb12` → 12 */
function callbackSeq(id: string): number {
  return Number(id.slice(2));
}
