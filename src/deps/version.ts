/** Dotted-numeric version parsing. Not semver: `1.2-rc1` does not parse. */
export function parseVersion(version: string): number[] | null {
  const parts = version.split('.');
  const out: number[] = [];
  for (const part of parts) {
    if (!/^[0-9]+$/.test(part)) return null;
    out.push(Number.parseInt(part, 10));
  }
  return out;
}

/**
 * Negative, zero or positive like a sort comparator; null when either side has a
 * non-numeric component. The shorter version is padded with zeros.
 */
export function compareVersions(a: string, b: string): number | null {
  const left = parseVersion(a);
  const right = parseVersion(b);
  if (!left || !right) return null;
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i += 1) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

/** Inclusive range check; an empty bound is open. Any incomparable bound fails. */
export function versionInRange(version: string, minVersion: string, maxVersion: string): boolean {
  if (minVersion !== '') {
    const cmp = compareVersions(minVersion, version);
    if (cmp === null || cmp > 0) return false;
  }
  if (maxVersion !== '') {
    const cmp = compareVersions(version, maxVersion);
    if (cmp === null || cmp > 0) return false;
  }
  return true;
}
