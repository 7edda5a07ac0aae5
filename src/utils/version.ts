/**
 * Package Version Ordering
 *
 * Debian package manager ordering: `[epoch:]upstream[-revision]`.
 * Epochs compare numerically, upstream and revision parts compare as
 * alternating runs of non-digits and digits. In the non-digit runs `~` sorts
 * before everything (the end of the string included) and letters sort before
 * other characters; digit runs compare numerically.
 *
 * Migration gating depends on this ordering matching the package manager
 * exactly, so `2.13-1` must be newer than `2.7-1`.
 *
 * @module utils/version
 */

export type VersionOrdering = 'LESS' | 'EQUAL' | 'GREATER';

interface ParsedVersion {
  epoch: number;
  upstream: string;
  revision: string;
}

const VERSION_PATTERN = /^(?:\d+:)?\d[A-Za-z0-9.+~:-]*$/;

/**
 * Check that a string is a version the package manager would hand us
 */
export function isValidVersion(version: string): boolean {
  return VERSION_PATTERN.test(version) && !version.endsWith('-');
}

function parseVersion(version: string): ParsedVersion {
  let rest = version.trim();
  let epoch = 0;

  const colon = rest.indexOf(':');
  if (colon > 0 && /^\d+$/.test(rest.slice(0, colon))) {
    epoch = Number.parseInt(rest.slice(0, colon), 10);
    rest = rest.slice(colon + 1);
  }

  const dash = rest.lastIndexOf('-');
  if (dash >= 0) {
    return { epoch, upstream: rest.slice(0, dash), revision: rest.slice(dash + 1) };
  }
  return { epoch, upstream: rest, revision: '' };
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

/**
 * Sort weight of one character inside a non-digit run; '' is end of string.
 */
function charWeight(ch: string): number {
  if (ch === '' || isDigit(ch)) return 0;
  if (isLetter(ch)) return ch.charCodeAt(0);
  if (ch === '~') return -1;
  return ch.charCodeAt(0) + 256;
}

function compareFragment(a: string, b: string): number {
  let i = 0;
  let j = 0;

  while (i < a.length || j < b.length) {
    while ((i < a.length && !isDigit(a[i])) || (j < b.length && !isDigit(b[j]))) {
      const wa = charWeight(a.charAt(i));
      const wb = charWeight(b.charAt(j));
      if (wa !== wb) return wa - wb;
      i++;
      j++;
    }

    while (a.charAt(i) === '0') i++;
    while (b.charAt(j) === '0') j++;

    let firstDiff = 0;
    while (i < a.length && j < b.length && isDigit(a[i]) && isDigit(b[j])) {
      if (firstDiff === 0) firstDiff = a.charCodeAt(i) - b.charCodeAt(j);
      i++;
      j++;
    }
    if (i < a.length && isDigit(a[i])) return 1;
    if (j < b.length && isDigit(b[j])) return -1;
    if (firstDiff !== 0) return firstDiff;
  }

  return 0;
}

function toOrdering(diff: number): VersionOrdering {
  if (diff < 0) return 'LESS';
  if (diff > 0) return 'GREATER';
  return 'EQUAL';
}

/**
 * Compare two package versions
 *
 * @example
 * compareVersions('2.5-3', '2.6-1') // 'LESS'
 * compareVersions('2.13-1', '2.7-1') // 'GREATER'
 */
export function compareVersions(a: string, b: string): VersionOrdering {
  const va = parseVersion(a);
  const vb = parseVersion(b);

  if (va.epoch !== vb.epoch) {
    return toOrdering(va.epoch - vb.epoch);
  }

  const upstream = compareFragment(va.upstream, vb.upstream);
  if (upstream !== 0) {
    return toOrdering(upstream);
  }

  return toOrdering(compareFragment(va.revision, vb.revision));
}

/** True when `version` is at or before `threshold` */
export function lessOrEqual(version: string, threshold: string): boolean {
  return compareVersions(version, threshold) !== 'GREATER';
}

/** True when `version` is strictly before `threshold` */
export function lessThan(version: string, threshold: string): boolean {
  return compareVersions(version, threshold) === 'LESS';
}
