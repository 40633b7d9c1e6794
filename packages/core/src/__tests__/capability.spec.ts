import { describe, it, expect } from "vitest";
import { EnvironmentError } from "@finderkit/shared";
import { FinderCapability, parseFinderVersion } from "../capability.js";

describe("parseFinderVersion", () => {
  it("detects fzf with its version", () => {
    const finder = parseFinderVersion("fzf", "0.54.3 (brew)\n");
    expect(finder.dialect).toBe("fzf");
    expect(finder.version).toEqual([0, 54, 3]);
    expect(finder.bin).toBe("fzf");
  });

  it("detects skim by binary name", () => {
    expect(parseFinderVersion("/usr/local/bin/sk", "0.10.4").dialect).toBe("sk");
  });

  it("detects skim by version output", () => {
    expect(parseFinderVersion("my-finder", "sk 0.9.0").dialect).toBe("sk");
  });

  it("throws an EnvironmentError for unparseable output", () => {
    expect(() => parseFinderVersion("fzf", "unknown")).toThrow(EnvironmentError);
  });
});

describe("FinderCapability", () => {
  const fzf = new FinderCapability("fzf", [0, 44, 1]);

  it("gates on dialect and minimum version", () => {
    expect(fzf.has("fzf")).toBe(true);
    expect(fzf.has("fzf", [0, 36])).toBe(true);
    expect(fzf.has("fzf", [0, 45])).toBe(false);
    expect(fzf.has("sk")).toBe(false);
  });

  it("formats as dialect and version", () => {
    expect(fzf.toString()).toBe("fzf 0.44.1");
    expect(new FinderCapability("sk", [0, 10, 0]).isSkim).toBe(true);
  });
});
