import { describe, it, expect, vi } from "vitest";
import { ConfigurationError } from "@finderkit/shared";
import {
  BUILTIN_ACTIONS,
  act,
  actionsHeader,
  compileExpect,
  defineActionLabel,
  grepLgrep,
  normalizeSelected,
  resolveAction,
  toggleHidden,
} from "../actions.js";
import { normalizeOptions } from "../options.js";
import { createMockCapability } from "../testing/index.js";
import type { ActionContext, ActionFn, FinderOptions } from "../types.js";

const noop: ActionFn = () => {};

const ctx: ActionContext = { key: "enter", resume: async () => {} };

function normalized(opts: FinderOptions = {}, version: readonly number[] = [0, 55, 0]) {
  return normalizeOptions(opts, { finder: createMockCapability("fzf", version) });
}

describe("resolveAction", () => {
  it("resolves built-in names", () => {
    expect(resolveAction("enter", "print")).toBe(BUILTIN_ACTIONS.print);
  });

  it("rejects chains that carry named fields", () => {
    const mixed = Object.assign([noop], { reload: true });
    expect(() => resolveAction("ctrl-r", mixed)).toThrow("Action 'ctrl-r' mixes positional and named definitions");
  });

  it("rejects descriptors that carry positional entries", () => {
    const mixed = { fn: noop, 0: noop };
    expect(() => resolveAction("ctrl-r", mixed)).toThrow("Action 'ctrl-r' mixes positional and named definitions");
  });

  it("rejects unknown descriptor fields", () => {
    const descriptor = { fn: noop, relaod: true };
    expect(() => resolveAction("ctrl-r", descriptor)).toThrow(ConfigurationError);
  });

  it("accepts each style", () => {
    const chain = [noop, noop];
    const descriptor = { fn: noop, reload: true };
    expect(resolveAction("a", noop)).toBe(noop);
    expect(resolveAction("b", chain)).toBe(chain);
    expect(resolveAction("c", descriptor)).toEqual(descriptor);
  });

  it("copies descriptors", () => {
    const descriptor = { fn: noop, reload: true };
    expect(resolveAction("c", descriptor)).not.toBe(descriptor);
  });
});

describe("compileExpect", () => {
  const actions = {
    enter: noop,
    "ctrl-v": { fn: noop, prefix: "select-all" },
    "ctrl-x": { fn: noop, ignore: true },
  };

  it("uses print binds on fzf 0.53+", () => {
    expect(compileExpect(actions, { finder: createMockCapability("fzf", [0, 53, 0]) })).toEqual({
      keys: [],
      binds: ["ctrl-v:select-all+print(ctrl-v)+accept", "enter:print(enter)+accept"],
    });
  });

  it("uses --expect keys on older fzf", () => {
    expect(compileExpect(actions, { finder: createMockCapability("fzf", [0, 44, 0]) })).toEqual({
      keys: ["ctrl-v"],
      binds: ["ctrl-v:select-all"],
    });
  });

  it("maps the default action to enter", () => {
    expect(compileExpect({ default: noop }, { finder: createMockCapability("fzf", [0, 55, 0]) }).binds).toEqual([
      "enter:print(enter)+accept",
    ]);
  });
});

describe("normalizeSelected", () => {
  it("has no key line with a single enter action", () => {
    expect(normalizeSelected(["a", "b"], { enter: noop })).toEqual({ key: "enter", items: ["a", "b"] });
  });

  it("reads the key line with several actions", () => {
    const actions = { enter: noop, "ctrl-v": noop };
    expect(normalizeSelected(["ctrl-v", "a"], actions)).toEqual({ key: "ctrl-v", items: ["a"] });
    expect(normalizeSelected(["", "a"], actions)).toEqual({ key: "enter", items: ["a"] });
  });

  it("maps an empty key line to the default action", () => {
    expect(normalizeSelected(["", "x"], { default: noop, "ctrl-s": noop })).toEqual({
      key: "default",
      items: ["x"],
    });
  });

  it("returns undefined for no output", () => {
    expect(normalizeSelected([], { enter: noop })).toBeUndefined();
  });
});

describe("act", () => {
  it("runs a chain in order", async () => {
    const calls: string[] = [];
    const opts = normalized({
      actions: {
        enter: [(items) => void calls.push(`first:${items.join(",")}`), () => void calls.push("second")],
      },
    });
    await act({ key: "enter", items: ["x"] }, opts, ctx);
    expect(calls).toEqual(["first:x", "second"]);
  });

  it("runs a descriptor's function", async () => {
    const fn = vi.fn();
    const opts = normalized({ actions: { "ctrl-s": { fn, execSilent: true } } });
    await act({ key: "ctrl-s", items: ["a", "b"] }, opts, ctx);
    expect(fn).toHaveBeenCalledWith(["a", "b"], opts, ctx);
  });

  it("ignores keys without an action", async () => {
    await expect(act({ key: "ctrl-z", items: [] }, normalized(), ctx)).resolves.toBeUndefined();
  });
});

describe("built-in actions", () => {
  it("relaunches with the flag toggled and the last query", async () => {
    const callFn = vi.fn(async () => {});
    const opts = normalized({ cmd: "rg --column -e 'x'", search: "x" });
    opts.callFn = callFn;
    opts.lastQuery = "typed";

    await toggleHidden([], opts, ctx);

    expect(callFn).toHaveBeenCalledWith(
      expect.objectContaining({
        resume: true,
        cmd: "rg --hidden --column -e 'x'",
        search: "x",
        query: "typed",
      }),
    );
  });

  it("carries the live query over to regex grep", async () => {
    const actTo = vi.fn(async () => {});
    const opts = normalized({ search: "old" });
    opts.fnReload = "rg <query>";
    opts.lastQuery = "new";
    opts.actTo = actTo;

    await grepLgrep([], opts, ctx);

    expect(actTo).toHaveBeenCalledWith(expect.objectContaining({ search: "new", noEsc: true, query: undefined }));
  });
});

describe("actionsHeader", () => {
  it("lists labelled actions in key order", () => {
    const opts = normalized({
      cmd: "rg --column",
      actions: { "ctrl-g": "grep-lgrep", "alt-h": "toggle-hidden", enter: "print" },
    });
    expect(actionsHeader(opts)).toBe(":: <alt-h> to Include hidden files|<ctrl-g> to Regex Search");
  });

  it("honors header overrides", () => {
    const opts = normalized({
      actions: { "ctrl-g": { fn: grepLgrep, header: false }, "ctrl-y": { fn: noop, header: "Copy" } },
    });
    expect(actionsHeader(opts)).toBe(":: <ctrl-y> to Copy");
  });

  it("pins labels at their position", () => {
    const stage: ActionFn = () => {};
    const unstage: ActionFn = () => {};
    defineActionLabel(stage, { label: "Stage", pos: 1 });
    defineActionLabel(unstage, { label: "Unstage", pos: 2 });

    const opts = normalized({ actions: { z: stage, y: unstage, a: { fn: noop, header: "Other" } } });

    expect(actionsHeader(opts)).toBe(":: <z> to Stage|<y> to Unstage|<a> to Other");
  });

  it("places a descriptor header in key order over a pinned label", () => {
    const stage: ActionFn = () => {};
    defineActionLabel(stage, { label: "Stage", pos: 1 });

    const opts = normalized({ actions: { b: { fn: stage, header: "Add" }, a: { fn: noop, header: "Other" } } });

    expect(actionsHeader(opts)).toBe(":: <a> to Other|<b> to Add");
  });

  it("is undefined without labels", () => {
    expect(actionsHeader(normalized({ actions: { enter: "print" } }))).toBeUndefined();
  });
});
