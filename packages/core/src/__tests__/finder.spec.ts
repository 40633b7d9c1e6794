/**
 * Finder session tests, run against the in-process fakes.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { EditorConflictError, setNotifySink, type NotifyLevel } from "@finderkit/shared";
import { Finder } from "../finder.js";
import {
  FakeBridge,
  FakeFinderProcess,
  FakeWindow,
  createMockCapability,
  type FakeWindowOptions,
} from "../testing/index.js";

const fzf = createMockCapability("fzf", [0, 55, 0]);

function setup(windowOptions: FakeWindowOptions = {}) {
  const bridge = new FakeBridge();
  const finderProcess = new FakeFinderProcess();
  const windows: FakeWindow[] = [];
  const finder = new Finder({
    bridge,
    process: finderProcess,
    globals: {},
    createWindow: () => {
      const window = new FakeWindow(windowOptions);
      windows.push(window);
      return window;
    },
  });
  return { finder, bridge, finderProcess, windows };
}

let messages: [NotifyLevel, string][] = [];

function captureNotifications(): void {
  setNotifySink((level, message) => messages.push([level, message]));
}

afterEach(() => {
  setNotifySink(undefined);
  messages = [];
});

describe("Finder.exec", () => {
  it("runs the finder on a list and dispatches the selected action", async () => {
    const { finder, finderProcess, windows } = setup();
    const enter = vi.fn();
    finderProcess.respond(["typed", "enter", "two"]);

    const result = await finder.exec(["one", "two"], { finder: fzf, windows: false, actions: { enter } });

    expect(result.selection).toEqual({ key: "enter", items: ["two"] });
    expect(enter).toHaveBeenCalledWith(["two"], result.opts, expect.objectContaining({ key: "enter" }));
    expect(finderProcess.lastRun?.contents).toBe("printf %s 'one\ntwo\n'");
    expect(windows[0]?.closed).toBe(true);
  });

  it("compiles print-query, the hidden preview and the abort keys", async () => {
    const { finder, finderProcess } = setup();
    finderProcess.respond(["", "esc"]);

    await finder.exec(["a"], { finder: fzf, windows: false, actions: { enter: () => {} } });

    expect(finderProcess.lastRun?.argv).toEqual([
      "--print-query",
      "--preview-window",
      "'hidden:right:0'",
      "--bind",
      "'ctrl-c:print(ctrl-c)+accept,ctrl-q:print(ctrl-q)+accept,enter:print(enter)+accept,esc:print(esc)+accept'",
    ]);
  });

  it("reports abort keys as a selection without items", async () => {
    const { finder, finderProcess } = setup();
    const enter = vi.fn();
    finderProcess.respond(["", "esc"]);

    const result = await finder.exec(["a"], { finder: fzf, windows: false, actions: { enter } });

    expect(result.selection).toEqual({ key: "esc", items: [] });
    expect(enter).not.toHaveBeenCalled();
  });

  it("records the query for resume", async () => {
    const { finder, finderProcess } = setup();
    finderProcess.respond(["typed", "enter", "a"]);

    const result = await finder.exec(["a"], { finder: fzf, windows: false, resumeKey: "files" });

    expect(result.opts.lastQuery).toBe("typed");
    expect(finder.registry.get("files")).toEqual({ query: "typed" });
  });

  it("only keeps the last query with noResume", async () => {
    const { finder, finderProcess } = setup();
    finderProcess.respond(["typed", "enter", "a"]);

    const result = await finder.exec(["a"], { finder: fzf, windows: false, resumeKey: "files", noResume: true });

    expect(result.opts.lastQuery).toBe("typed");
    expect(finder.registry.get("files")).toBeUndefined();
    expect(finder.registry.getLast()).toBeUndefined();
  });

  it("returns no selection on an abnormal exit", async () => {
    const { finder, finderProcess, windows } = setup();
    const enter = vi.fn();
    finderProcess.respond(["", "enter", "a"], 2);

    const result = await finder.exec(["a"], { finder: fzf, windows: false, actions: { enter } });

    expect(result.selection).toBeUndefined();
    expect(enter).not.toHaveBeenCalled();
    expect(windows[0]?.exitCodes).toEqual([2]);
    expect(windows[0]?.closed).toBe(true);
  });

  it("does not launch when the window cannot open", async () => {
    captureNotifications();
    const { finder, finderProcess } = setup({ unusable: "no terminal attached to stdin or stdout" });

    const result = await finder.exec(["a"], { finder: fzf });

    expect(result.selection).toBeUndefined();
    expect(finderProcess.runs).toHaveLength(0);
    expect(messages).toEqual([["info", "Unable to open the finder: no terminal attached to stdin or stdout"]]);
  });

  it("compiles without launching when start is false", async () => {
    const { finder, finderProcess } = setup();

    const result = await finder.exec("ls", { finder: fzf, start: false });

    expect(result.cmd).toBe("ls");
    expect(finderProcess.runs).toHaveLength(0);
  });

  it("runs command contents as is without multiprocess", async () => {
    const { finder, bridge, finderProcess } = setup();
    const stringifyMt = vi.spyOn(bridge, "stringifyMt");
    finderProcess.respond(["", "esc"]);

    await finder.exec("rg --files", { finder: fzf, windows: false, multiprocess: false });

    expect(stringifyMt).not.toHaveBeenCalled();
    expect(finderProcess.lastRun?.contents).toBe("rg --files");
  });

  it("filters command lines in process without multiprocess", async () => {
    const { finder, bridge, finderProcess } = setup();
    finderProcess.respond(["", "esc"]);

    await finder.exec("fd", { finder: fzf, windows: false, multiprocess: false, stripCwdPrefix: true });

    expect(finderProcess.lastRun?.contents).toBe("fake-bridge mt cb1");
    expect(bridge.callback("cb1")).toEqual({ kind: "mt", cmd: "fd" });
  });

  it("discards the result of a window hidden while running", async () => {
    const { finder, finderProcess, windows } = setup();
    const enter = vi.fn();
    finderProcess.respondWith(() => {
      windows[0]?.hide();
      return { lines: ["q", "enter", "a"], exitCode: 0 };
    });

    const result = await finder.exec(["a"], { finder: fzf, windows: false, actions: { enter } });

    expect(result.selection).toBeUndefined();
    expect(enter).not.toHaveBeenCalled();
    expect(result.opts.lastQuery).toBeUndefined();
  });

  it("keeps the window open for chained actions", async () => {
    const { finder, finderProcess, windows } = setup();
    finderProcess.respond(["", "ctrl-x", "a"]);

    await finder.exec(["a"], {
      finder: fzf,
      windows: false,
      actions: { enter: () => {}, "ctrl-x": [() => {}, () => {}] },
    });

    expect(windows[0]?.closed).toBe(false);
  });

  it("hands the selection to fnSelected instead of the action", async () => {
    const { finder, finderProcess } = setup();
    const enter = vi.fn();
    const fnSelected = vi.fn();
    finderProcess.respond(["", "enter", "a"]);

    await finder.exec(["a"], { finder: fzf, windows: false, actions: { enter }, fnSelected });

    expect(fnSelected).toHaveBeenCalledWith({ key: "enter", items: ["a"] }, expect.objectContaining({ normalized: true }));
    expect(enter).not.toHaveBeenCalled();
  });

  it("reports failing actions", async () => {
    captureNotifications();
    const { finder, finderProcess } = setup();
    finderProcess.respond(["", "enter", "a"]);

    const result = await finder.exec(["a"], {
      finder: fzf,
      windows: false,
      actions: {
        enter: () => {
          throw new Error("bad target");
        },
      },
    });

    expect(result.selection).toEqual({ key: "enter", items: ["a"] });
    expect(messages).toEqual([["error", "action 'enter' failed: bad target"]]);
  });

  it("treats editor conflicts as handled", async () => {
    captureNotifications();
    const { finder, finderProcess } = setup();
    finderProcess.respond(["", "enter", "a"]);

    await finder.exec(["a"], {
      finder: fzf,
      windows: false,
      actions: {
        enter: () => {
          throw new EditorConflictError();
        },
      },
    });

    expect(messages).toEqual([]);
  });
});

describe("Finder.live", () => {
  it("reloads a plain command with the query substituted", async () => {
    const { finder } = setup();

    const { cmd, opts } = await finder.live("rg -e", { finder: fzf, windows: false, multiprocess: true, start: false });

    expect(cmd).toBe("true");
    expect(opts.fzfOpts["--disabled"]).toBe(true);
    expect(opts.extraArgs).toEqual([
      "--bind='change:+reload:[ -z {q} ] || rg -e {q} 2>&1 || true'",
      "--bind='start:+reload:[ -z {q} ] || rg -e {q} 2>&1 || true'",
    ]);
  });

  it("runs the command once up front without a start event", async () => {
    const { finder } = setup();
    const old = createMockCapability("fzf", [0, 34, 0]);

    const { cmd } = await finder.live("rg -e <query> .", { finder: old, windows: false, multiprocess: true, start: false });

    expect(cmd).toBe("rg -e '' .");
  });

  it("routes the command through the bridge when run in process", async () => {
    const { finder, bridge } = setup();

    const { opts } = await finder.live("rg -e", { finder: fzf, windows: false, start: false });

    expect(bridge.callback("cb1")).toEqual({ kind: "mt", cmd: "rg -e <query>" });
    expect(opts.extraArgs[0]).toBe("--bind='change:+reload:fake-bridge mt cb1 {q} 2>&1 || true'");
  });

  it("answers with reload transforms when globs are parsed here", async () => {
    const { finder, bridge } = setup();

    const { opts } = await finder.live("rg -e", { finder: fzf, windows: false, rgGlob: true, start: false });

    expect(opts.extraArgs[0]).toBe("--bind='change:+transform:fake-bridge data cb2 {q} 2>&1 || true'");
    const transform = bridge.callback("cb2");
    if (transform?.kind !== "data") throw new Error("expected a data callback");
    expect(await transform.fn(["foo -- *.ts"])).toBe("reload:rg --iglob '*.ts' -e 'foo'");
    expect(await transform.fn([""])).toBe("reload:true");
  });

  it("streams a live callback's results", async () => {
    const { finder, bridge } = setup();
    const fn = vi.fn((args: string[]) => [`${args[0] ?? ""}-1`, `${args[0] ?? ""}-2`]);

    const { opts } = await finder.live(fn, { finder: fzf, windows: false, start: false });

    expect(opts.extraArgs[0]).toBe("--bind='change:+reload:[ -z {q} ] || fake-bridge contents cb1 {q} 2>&1 || true'");
    const callback = bridge.callback("cb1");
    if (callback?.kind !== "contents") throw new Error("expected a contents callback");
    expect(await callback.fn(["x"])).toEqual(["x-1", "x-2"]);
  });

  it("turns a live callback's list into a reload command", async () => {
    const { finder, bridge } = setup();

    await finder.live((args) => [`hit:${args[0] ?? ""}`], { finder: fzf, windows: false, rgGlob: true, start: false });

    const transform = bridge.callback("cb2");
    if (transform?.kind !== "data") throw new Error("expected a data callback");
    expect(await transform.fn(["x"])).toBe("reload:printf %s 'hit:x\n'");
    expect(await transform.fn([""])).toBe("reload:true");
  });

  it("binds reload actions to the reload command", async () => {
    const { finder } = setup();
    const remove = function remove() {};

    const { opts } = await finder.live("rg -e", {
      finder: fzf,
      windows: false,
      multiprocess: true,
      start: false,
      actions: { "ctrl-x": { fn: remove, reload: true } },
    });

    expect(opts.keymap.fzf["ctrl-x"]).toEqual({
      bind: "unbind(ctrl-x)+execute-silent(fake-bridge silent cb1 {+})+reload(rg -e {q})",
      desc: "remove",
    });
  });
});

describe("Finder.resume", () => {
  it("relaunches the last session with its query", async () => {
    const { finder, finderProcess } = setup();
    finderProcess.respond(["typed", "esc"]).respond(["typed", "esc"]);
    await finder.exec(["a"], { finder: fzf, windows: false });

    await finder.resume();

    expect(finderProcess.runs).toHaveLength(2);
    expect(finderProcess.runs[1]?.contents).toBe(finderProcess.runs[0]?.contents);
    const argv = finderProcess.runs[1]?.argv ?? [];
    expect(argv[argv.indexOf("--query") + 1]).toBe("'typed'");
  });

  it("drops callbacks of sessions that can no longer be resumed", async () => {
    const { finder, bridge, finderProcess } = setup();
    finderProcess.respond(["", "esc"]).respond(["", "esc"]);

    await finder.exec((emit) => emit(undefined), { finder: fzf, windows: false });
    await finder.exec((emit) => emit(undefined), { finder: fzf, windows: false });

    expect(bridge.callback("cb1")).toBeUndefined();
    expect(bridge.callback("cb2")).toBeDefined();
  });

  it("keeps the resumable session's callbacks while noResume sessions run", async () => {
    const { finder, bridge, finderProcess } = setup();
    finderProcess.respond(["", "esc"]).respond(["", "esc"]).respond(["", "esc"]);

    await finder.exec((emit) => emit(undefined), { finder: fzf, windows: false });
    await finder.exec((emit) => emit(undefined), { finder: fzf, windows: false, noResume: true });
    await finder.resume();

    expect(finderProcess.runs[2]?.contents).toBe("fake-bridge contents cb1");
    expect(bridge.callback("cb1")).toBeDefined();
  });

  it("says so when there is nothing to resume", async () => {
    captureNotifications();
    const { finder } = setup();

    expect(await finder.resume()).toBeUndefined();
    expect(messages).toEqual([["info", "No resume data available."]]);
  });

  it("unhides a hidden foreground window instead of relaunching", async () => {
    const { finder, finderProcess, windows } = setup({ resumable: true });
    finderProcess.respond(["", "ctrl-x", "a"]);
    await finder.exec(["a"], { finder: fzf, windows: false, actions: { enter: () => {}, "ctrl-x": [() => {}] } });
    windows[0]?.hide();

    expect(await finder.resume()).toBeUndefined();
    expect(windows[0]?.hidden).toBe(false);
    expect(finderProcess.runs).toHaveLength(1);
  });
});

describe("Finder.normalize", () => {
  it("picks up stored values on resume", async () => {
    const { finder } = setup();
    finder.registry.set("grep", { search: "needle", noEsc: true });

    const opts = await finder.normalize({ finder: fzf, resume: true }, { resumeKey: "grep" });

    expect(opts.search).toBe("needle");
    expect(opts.noEsc).toBe(true);
  });

  it("layers defaults, globals and picker globals below the call", async () => {
    const finder = new Finder({
      bridge: new FakeBridge(),
      process: new FakeFinderProcess(),
      globals: { prompt: "global> ", fzfOpts: { "--ansi": true } },
      pickerGlobals: { grep: { prompt: "grep> " } },
    });

    const opts = await finder.normalize(
      { finder: fzf, fzfOpts: { "--multi": true } },
      { resumeKey: "grep", defaults: { prompt: "default> ", header: "h" } },
    );

    expect(opts.prompt).toBe("grep> ");
    expect(opts.header).toBe("h");
    expect(opts.fzfOpts).toEqual({ "--ansi": true, "--multi": true });
  });
});
