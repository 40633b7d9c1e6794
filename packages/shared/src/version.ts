/**
 * Semantic version helpers for finder capability gates.
 */

export type Version = readonly [major: number, minor: number, patch: number];

/**
 * Parse the first `x.y[.z]` found in a version string such as
 * `0.54.3 (brew)` or `sk 0.11.1`.
 */
export function parseVersion(text: string): Version | undefined {
  const match = /(\d+)\.(\d+)(?:\.(\d+))?/.exec(text);
  if (!match) return undefined;
  return [Number(match[1]), Number(match[2]), Number(match[3] ?? 0)];
}

export function compareVersions(a: readonly number[], b: readonly number[]): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

export function versionAtLeast(version: readonly number[], min: readonly number[]): boolean {
  return compareVersions(version, min) >= 0;
}

export function formatVersion(version: readonly number[]): string {
  return version.join(".");
}
