/**
 * Dotted version comparison
 *
 * Segments compare numerically, so 1.10.0 sorts after 1.2.0. Missing
 * trailing segments count as zero and a segment is worth its leading
 * digits ("0-SNAPSHOT" is 0, "rc1" is 0).
 */

function parseSegments(version: string): number[] {
  return version
    .trim()
    .split('.')
    .map((segment) => {
      const digits = /^\d+/.exec(segment);
      return digits ? Number(digits[0]) : 0;
    });
}

export function compareVersions(a: string, b: string): -1 | 0 | 1 {
  const left = parseSegments(a);
  const right = parseSegments(b);
  const len = Math.max(left.length, right.length);

  for (let i = 0; i < len; i++) {
    const l = left[i] ?? 0;
    const r = right[i] ?? 0;
    if (l < r) return -1;
    if (l > r) return 1;
  }
  return 0;
}

export function isVersionBelow(version: string, minimum: string): boolean {
  return compareVersions(version, minimum) < 0;
}
