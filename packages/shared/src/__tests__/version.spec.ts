import { describe, it, expect } from "vitest";
import { compareVersions, formatVersion, parseVersion, versionAtLeast } from "../version.js";

describe("parseVersion", () => {
  it("parses the first x.y.z in the text", () => {
    expect(parseVersion("0.54.3 (brew)")).toEqual([0, 54, 3]);
    expect(parseVersion("sk 0.11.1")).toEqual([0, 11, 1]);
  });

  it("defaults the patch to 0", () => {
    expect(parseVersion("0.35")).toEqual([0, 35, 0]);
  });

  it("returns undefined without a version", () => {
    expect(parseVersion("fzf")).toBeUndefined();
  });
});

describe("compareVersions", () => {
  it("compares component-wise", () => {
    expect(compareVersions([0, 36, 0], [0, 35, 9])).toBe(1);
    expect(compareVersions([0, 9, 0], [0, 10, 0])).toBe(-1);
    expect(compareVersions([1, 0, 0], [1, 0, 0])).toBe(0);
  });

  it("treats missing components as 0", () => {
    expect(compareVersions([0, 45], [0, 45, 0])).toBe(0);
  });
});

describe("versionAtLeast", () => {
  it("includes the minimum itself", () => {
    expect(versionAtLeast([0, 40, 0], [0, 40])).toBe(true);
    expect(versionAtLeast([0, 39, 9], [0, 40])).toBe(false);
  });
});

describe("formatVersion", () => {
  it("joins with dots", () => {
    expect(formatVersion([0, 53, 1])).toBe("0.53.1");
  });
});
