import { describe, it, expect } from "vitest";
import { normalizeCwd, setFieldIndex, setHeader, setTitleFlags, shortenPath, type PathEnv } from "../header.js";
import { normalizeOptions } from "../options.js";
import { createMockCapability } from "../testing/index.js";
import type { FinderOptions } from "../types.js";

const env: PathEnv = { cwd: "/work/project", home: "/home/user" };

function normalized(opts: FinderOptions = {}) {
  return normalizeOptions(opts, { finder: createMockCapability("fzf", [0, 55, 0]) });
}

describe("normalizeCwd", () => {
  it("is relative inside the process cwd", () => {
    expect(normalizeCwd("/work/project/src", env)).toBe("src");
  });

  it("abbreviates the home directory", () => {
    expect(normalizeCwd("/home/user/code", env)).toBe("~/code");
    expect(normalizeCwd("/home/user", env)).toBe("~");
  });

  it("keeps the process cwd itself absolute", () => {
    expect(normalizeCwd("/work/project", env)).toBe("/work/project");
  });
});

describe("shortenPath", () => {
  it("shortens every component but the last", () => {
    expect(shortenPath("~/code/finderkit/packages")).toBe("~/c/f/packages");
  });

  it("keeps one more character for dot directories", () => {
    expect(shortenPath("~/.config/finderkit", 2)).toBe("~/.co/finderkit");
  });
});

describe("setHeader", () => {
  it("shows the cwd when it differs from the process cwd", () => {
    const opts = setHeader(normalized({ cwd: "/work/project/src" }), undefined, env);
    expect(opts.fzfOpts["--header"]).toBe("cwd: src");
  });

  it("hides the cwd of the process cwd unless asked", () => {
    expect(setHeader(normalized({ cwd: "/work/project" }), undefined, env).fzfOpts["--header"]).toBeUndefined();
    expect(setHeader(normalized({ cwdHeader: true }), undefined, env).fzfOpts["--header"]).toBe("cwd: /work/project");
  });

  it("joins sections in order", () => {
    const opts = normalized({ cwd: "/home/user/x", search: "foo", actions: { "ctrl-g": "grep-lgrep" } });
    setHeader(opts, ["actions", "cwd", "search"], env);
    expect(opts.fzfOpts["--header"]).toBe(":: <ctrl-g> to Regex Search, cwd: ~/x, Grep string: foo");
  });

  it("takes label overrides", () => {
    const opts = normalized({ search: "foo", grepHeaderTxt: "Search: " });
    setHeader(opts, ["search"], env);
    expect(opts.fzfOpts["--header"]).toBe("Search: foo");
  });

  it("describes regex filters", () => {
    const opts = normalized({ regexFilter: { pattern: "^test", exclude: true } });
    setHeader(opts, ["regex_filter"], env);
    expect(opts.fzfOpts["--header"]).toBe("Regex filter: not ^test");
  });

  it("lets the caller's sections win", () => {
    const opts = normalized({ search: "foo", headers: ["search"], cwd: "/tmp" });
    setHeader(opts, ["cwd"], env);
    expect(opts.fzfOpts["--header"]).toBe("Grep string: foo");
  });

  it("does nothing when headers are off", () => {
    expect(setHeader(normalized({ cwd: "/tmp", noHeader: true }), undefined, env).fzfOpts["--header"]).toBeUndefined();
    expect(setHeader(normalized({ cwd: "/tmp", headers: false }), undefined, env).fzfOpts["--header"]).toBeUndefined();
  });

  it("puts a shortened cwd in the prompt", () => {
    const opts = normalized({ cwd: "/home/user/code/finderkit/packages", cwdPrompt: true, cwdPromptShortenLen: 10 });
    setHeader(opts, undefined, env);
    expect(opts.prompt).toBe("~/c/f/packages/");
    expect(opts.fzfOpts["--header"]).toBeUndefined();
  });
});

describe("setTitleFlags", () => {
  it("adds a badge per enabled flag", () => {
    const opts = normalized({ cmd: "rg --hidden -L --column", winopts: { title: "Grep" } });
    setTitleFlags(opts, ["cmd"]);
    expect(opts.winopts.title).toEqual([
      ["Grep", "FinderTitle"],
      [" h ", "FinderTitleFlags"],
      [" f ", "FinderTitleFlags"],
    ]);
  });

  it("leaves the title alone when disabled or untitled", () => {
    const off = normalized({ cmd: "rg --hidden", winopts: { title: "Grep", titleFlags: false } });
    expect(setTitleFlags(off, ["cmd"]).winopts.title).toBe("Grep");

    const untitled = normalized({ cmd: "rg --hidden" });
    expect(setTitleFlags(untitled, ["cmd"]).winopts.title).toBeUndefined();

    const notCmd = normalized({ cmd: "rg --hidden", winopts: { title: "Grep" } });
    expect(setTitleFlags(notCmd, ["live"]).winopts.title).toBe("Grep");
  });
});

describe("setFieldIndex", () => {
  it("defaults to file {1} and line {2} without overriding", () => {
    const opts = setFieldIndex(normalized());
    expect(opts.fieldIndexExpr).toBe("{1}");
    expect(opts.lineFieldIndex).toBe("{2}");
    expect(setFieldIndex(normalized({ fieldIndexExpr: "{3}" })).fieldIndexExpr).toBe("{3}");
  });
});
