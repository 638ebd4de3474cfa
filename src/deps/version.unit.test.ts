import { describe, expect, it } from 'vitest';
import { compareVersions, parseVersion, versionInRange } from './version.js';

describe('parseVersion', () => {
  it('parses dotted numbers', () => {
    expect(parseVersion('1.10.3')).toEqual([1, 10, 3]);
    expect(parseVersion('7')).toEqual([7]);
  });

  it('rejects anything non-numeric', () => {
    expect(parseVersion('1.2-rc1')).toBeNull();
    expect(parseVersion('')).toBeNull();
    expect(parseVersion('1..2')).toBeNull();
  });
});

describe('compareVersions', () => {
  it('compares numerically, padding the shorter side', () => {
    expect(compareVersions('1.10', '1.9')).toBeGreaterThan(0);
    expect(compareVersions('2', '2.0.0')).toBe(0);
    expect(compareVersions('2.0.1', '2.1')).toBeLessThan(0);
  });

  it('is null when either side does not parse', () => {
    expect(compareVersions('1.0', 'beta')).toBeNull();
  });
});

describe('versionInRange', () => {
  it('treats both bounds as inclusive', () => {
    expect(versionInRange('2.0', '2.0', '3.0')).toBe(true);
    expect(versionInRange('3.0', '2.0', '3.0')).toBe(true);
    expect(versionInRange('3.0.1', '2.0', '3.0')).toBe(false);
    expect(versionInRange('1.9', '2.0', '')).toBe(false);
  });

  it('leaves empty bounds open', () => {
    expect(versionInRange('0.1', '', '')).toBe(true);
    expect(versionInRange('99', '1', '')).toBe(true);
  });

  it('fails closed on an incomparable version', () => {
    expect(versionInRange('2.x', '1.0', '')).toBe(false);
    expect(versionInRange('2.0', 'old', '')).toBe(false);
  });
});
