import { describe, it, expect } from "vitest";
import { resume } from "../actions.js";
import { convertExecSilentActions, convertReloadActions, createBinds, type BindDeps } from "../binds.js";
import { normalizeOptions } from "../options.js";
import { FakeBridge, createMockCapability } from "../testing/index.js";
import type { ActionFn, FinderOptions } from "../types.js";

function normalized(opts: FinderOptions, version: readonly number[] = [0, 55, 0], dialect: "fzf" | "sk" = "fzf") {
  return normalizeOptions({ windows: false, ...opts }, { finder: createMockCapability(dialect, version) });
}

function depsFor(bridge: FakeBridge): BindDeps {
  return { bridge, contextFor: (key) => ({ key, resume: async () => {} }) };
}

const deleteEntry: ActionFn = function deleteEntry() {};

describe("createBinds", () => {
  it("joins simple binds and separates transform binds", () => {
    const opts = normalized({ keymap: { fzf: { "ctrl-y": "up", "ctrl-/": "transform:echo hi" } } });
    expect(createBinds(opts, new FakeBridge())).toEqual(["ctrl-y:up", "ctrl-/:transform:echo hi"]);
  });

  it("keeps event binds separate", () => {
    const opts = normalized({ keymap: { fzf: { "ctrl-y": "up", start: "toggle-preview", "ctrl-n": "down" } } });
    expect(createBinds(opts, new FakeBridge())).toEqual(["ctrl-y:up,ctrl-n:down", "start:toggle-preview"]);
  });

  it("prints the key before a bare accept on fzf 0.53+", () => {
    const opts = normalized({ keymap: { fzf: { "ctrl-o": "accept" } } });
    expect(createBinds(opts, new FakeBridge())).toEqual(["ctrl-o:print(enter)+accept"]);
  });

  it("leaves accept alone on older fzf", () => {
    const opts = normalized({ keymap: { fzf: { "ctrl-o": "accept" } } }, [0, 52, 0]);
    expect(createBinds(opts, new FakeBridge())).toEqual(["ctrl-o:accept"]);
  });

  it("stringifies function binds through the bridge", () => {
    const opts = normalized({ keymap: { fzf: { "ctrl-p": () => {} } } });
    expect(createBinds(opts, new FakeBridge())).toEqual(["ctrl-p:execute-silent:fake-bridge data cb1"]);
  });

  it("skips function binds and disabled binds on skim", () => {
    const opts = normalized({ keymap: { fzf: { "ctrl-p": () => {}, "ctrl-d": false, "ctrl-u": { bind: "up" } } } }, [0, 10, 4], "sk");
    expect(createBinds(opts, new FakeBridge())).toEqual(["ctrl-u:up"]);
  });
});

describe("convertReloadActions", () => {
  it("binds reload actions natively on fzf 0.36+", () => {
    const bridge = new FakeBridge();
    const opts = normalized({ actions: { "ctrl-x": { fn: deleteEntry, reload: true } } });

    convertReloadActions("reload-cmd", opts, depsFor(bridge));

    expect(opts.keymap.fzf["ctrl-x"]).toEqual({
      bind: "unbind(ctrl-x)+execute-silent(fake-bridge silent cb1 {+})+reload(reload-cmd)",
      desc: "deleteEntry",
    });
    expect(opts.extraArgs).toEqual(["--bind='load:+rebind(ctrl-x)'"]);
    expect(opts.actions["ctrl-x"]).toMatchObject({ ignore: true });
  });

  it("leaves the caller's descriptor untouched", () => {
    const descriptor = { fn: deleteEntry, reload: true };
    const opts = normalized({ actions: { "ctrl-x": descriptor } });

    convertReloadActions("reload-cmd", opts, depsFor(new FakeBridge()));

    expect(descriptor).toEqual({ fn: deleteEntry, reload: true });
    expect(normalized({ actions: { "ctrl-x": descriptor } }).actions["ctrl-x"]).not.toHaveProperty("ignore");
  });

  it("falls back to run-then-resume below fzf 0.36", () => {
    const opts = normalized({ actions: { "ctrl-x": { fn: deleteEntry, reload: true } } }, [0, 35, 0]);

    convertReloadActions("reload-cmd", opts, depsFor(new FakeBridge()));

    expect(opts.actions["ctrl-x"]).toEqual([deleteEntry, resume]);
    expect(opts.keymap.fzf["ctrl-x"]).toBeUndefined();
    expect(opts.extraArgs).toEqual([]);
  });

  it("falls back without a reload command", () => {
    const opts = normalized({ actions: { "ctrl-x": { fn: deleteEntry, reload: true } } });
    convertReloadActions(undefined, opts, depsFor(new FakeBridge()));
    expect(opts.actions["ctrl-x"]).toEqual([deleteEntry, resume]);
  });

  it("upgrades [fn, resume] chains when reload binds are available", () => {
    const opts = normalized({ actions: { "ctrl-x": [deleteEntry, resume] } });

    convertReloadActions("reload-cmd", opts, depsFor(new FakeBridge()));

    expect(opts.actions["ctrl-x"]).toMatchObject({ fn: deleteEntry, reload: true, ignore: true });
    expect(opts.keymap.fzf["ctrl-x"]).toMatchObject({
      bind: "unbind(ctrl-x)+execute-silent(fake-bridge silent cb1 {+})+reload(reload-cmd)",
    });
  });

  it("applies prefix and postfix around the reload", () => {
    const opts = normalized({
      actions: { "ctrl-x": { fn: deleteEntry, reload: true, prefix: "select-all", postfix: "first" } },
    });

    convertReloadActions("reload-cmd", opts, depsFor(new FakeBridge()));

    expect(opts.keymap.fzf["ctrl-x"]).toMatchObject({
      bind: "select-all+unbind(ctrl-x)+execute-silent(fake-bridge silent cb1 {+})+reload(reload-cmd)+first",
    });
  });

  it("runs the action with the selected items from inside the finder", async () => {
    const bridge = new FakeBridge();
    const seen: string[][] = [];
    const opts = normalized({ actions: { "ctrl-x": { fn: (items) => void seen.push(items), reload: true } } });

    convertReloadActions("reload-cmd", opts, depsFor(bridge));
    const callback = bridge.callback("cb1");
    expect(callback?.kind).toBe("silent");
    if (callback?.kind !== "silent") return;
    await callback.fn(["a.ts", "b.ts"]);

    expect(seen).toEqual([["a.ts", "b.ts"]]);
  });
});

describe("convertExecSilentActions", () => {
  it("binds execute-silent actions", () => {
    const opts = normalized({ actions: { "ctrl-s": { fn: deleteEntry, execSilent: true } } });
    convertExecSilentActions(opts, depsFor(new FakeBridge()));
    expect(opts.keymap.fzf["ctrl-s"]).toEqual({
      bind: "execute-silent:fake-bridge silent cb1 {+}",
      desc: "deleteEntry",
    });
  });

  it("uses the bracket form when a postfix follows", () => {
    const opts = normalized({ actions: { "ctrl-s": { fn: deleteEntry, execSilent: true, postfix: "down" } } });
    convertExecSilentActions(opts, depsFor(new FakeBridge()));
    expect(opts.keymap.fzf["ctrl-s"]).toMatchObject({ bind: "execute-silent(fake-bridge silent cb1 {+})+down" });
  });

  it("does nothing on skim", () => {
    const opts = normalized({ actions: { "ctrl-s": { fn: deleteEntry, execSilent: true } } }, [0, 10, 4], "sk");
    convertExecSilentActions(opts, depsFor(new FakeBridge()));
    expect(opts.keymap.fzf["ctrl-s"]).toBeUndefined();
  });
});
