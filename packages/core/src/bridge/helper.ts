/**
 * Bridge helper: the process the finder spawns for a stringified callback.
 *
 *   call <socket> <id> [args...]   invoke a host callback, print its output
 *   mt <spec> [args...]            run a command spec with line processing
 */

import net from "node:net";
import type { Writable } from "node:stream";
import { LineBuffer } from "@finderkit/shared";
import { createLineProcessor, decodeMtSpec, resolveMtCommand } from "./mt.js";
import { decodeMessage, encodeMessage, hostMessageSchema } from "./protocol.js";
import { spawnShell } from "./spawn.js";

export interface HelperIO {
  stdout: Writable;
  stderr: Writable;
}

const defaultIO: HelperIO = { stdout: process.stdout, stderr: process.stderr };

/**
 * Run the helper for `argv`, resolving with the exit code.
 */
export async function runHelper(argv: readonly string[], io: HelperIO = defaultIO): Promise<number> {
  const [mode, ...rest] = argv;
  switch (mode) {
    case "call": {
      const [socketPath, id, ...args] = rest;
      if (!socketPath || !id) break;
      return runCall(socketPath, id, args, io);
    }
    case "mt": {
      const [encoded, ...args] = rest;
      if (!encoded) break;
      return runMt(encoded, args, io);
    }
  }
  io.stderr.write("usage: helper call <socket> <id> [args...] | mt <spec> [args...]\n");
  return 2;
}

/**
 * Connect to the host, invoke callback `id`, print everything it sends back.
 */
export function runCall(socketPath: string, id: string, args: string[], io: HelperIO = defaultIO): Promise<number> {
  return new Promise<number>((resolve) => {
    const socket = net.createConnection(socketPath);
    const lineBuffer = new LineBuffer();
    let exitCode = 0;

    socket.on("connect", () => {
      socket.write(encodeMessage({ type: "register", pid: process.pid }));
      socket.write(encodeMessage({ type: "call", id, args }));
    });

    const print = (text: string) => {
      if (!io.stdout.write(text)) {
        socket.pause();
        io.stdout.once("drain", () => socket.resume());
      }
    };

    socket.on("data", (chunk) => {
      for (const line of lineBuffer.feed(chunk.toString())) {
        const message = decodeMessage(hostMessageSchema, line);
        if (!message) continue;
        switch (message.type) {
          case "data":
            if (message.lines.length > 0) print(message.lines.join("\n") + "\n");
            break;
          case "text":
            print(message.text);
            break;
          case "error":
            io.stderr.write(`${message.message}\n`);
            exitCode = 1;
            break;
          case "end":
            socket.end();
            break;
        }
      }
    });

    socket.on("error", (err) => {
      io.stderr.write(`unable to reach host: ${err.message}\n`);
      exitCode = 1;
    });

    socket.on("close", () => resolve(exitCode));
  });
}

/**
 * Run a multiprocess spec: substitute the query, spawn, filter lines.
 */
export function runMt(encoded: string, args: string[], io: HelperIO = defaultIO): Promise<number> {
  const spec = decodeMtSpec(encoded);
  const cmd = resolveMtCommand(spec, args);
  if (cmd === undefined) return Promise.resolve(0);

  if (spec.socketPath) registerPid(spec.socketPath);

  const processLine = createLineProcessor(spec);
  const lineBuffer = new LineBuffer();
  const child = spawnShell(cmd, { cwd: spec.cwd, windows: spec.windows, stdio: ["ignore", "pipe", "inherit"] });

  const emit = (lines: string[]) => {
    const out: string[] = [];
    for (const line of lines) {
      const kept = processLine(line);
      if (kept !== undefined) out.push(kept);
    }
    if (out.length > 0 && !io.stdout.write(out.join("\n") + "\n")) {
      child.stdout?.pause();
      io.stdout.once("drain", () => child.stdout?.resume());
    }
  };

  child.stdout?.on("data", (chunk: Buffer) => emit(lineBuffer.feed(chunk.toString())));

  return new Promise<number>((resolve) => {
    child.on("error", (err) => {
      io.stderr.write(`${err.message}\n`);
      resolve(1);
    });
    child.on("close", (code) => {
      emit(lineBuffer.flush());
      resolve(code ?? 1);
    });
  });
}

/**
 * Best effort: lets the host terminate us when its session ends. The
 * connection stays open until exit, closing it unregisters the pid.
 */
function registerPid(socketPath: string): void {
  const socket = net.createConnection(socketPath);
  socket.on("connect", () => socket.write(encodeMessage({ type: "register", pid: process.pid })));
  socket.on("error", () => socket.destroy());
  socket.unref();
}
