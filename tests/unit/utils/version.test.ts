/**
 * Package version ordering
 *
 * @module tests/unit/utils/version
 */

import { describe, it, expect } from 'vitest';
import {
  compareVersions,
  isValidVersion,
  lessOrEqual,
  lessThan,
} from '../../../src/utils/version.js';

describe('compareVersions', () => {
  it('orders the release versions the migrations are keyed on', () => {
    expect(compareVersions('2.6-1', '2.6-1')).toBe('EQUAL');
    expect(compareVersions('2.5-3', '2.6-1')).toBe('LESS');
    expect(compareVersions('2.13-1', '2.7-1')).toBe('GREATER');
  });

  it('compares digit runs numerically', () => {
    expect(compareVersions('2.10', '2.9')).toBe('GREATER');
    expect(compareVersions('1.007', '1.7')).toBe('EQUAL');
  });

  it('sorts ~ before the end of the string', () => {
    expect(compareVersions('1.0~rc1', '1.0')).toBe('LESS');
    expect(compareVersions('1.0~rc1', '1.0~rc2')).toBe('LESS');
    expect(compareVersions('1.0~~', '1.0~')).toBe('LESS');
  });

  it('sorts letters before other characters', () => {
    expect(compareVersions('1.0a', '1.0')).toBe('GREATER');
    expect(compareVersions('1.0+b', '1.0a')).toBe('GREATER');
  });

  it('compares the epoch first', () => {
    expect(compareVersions('1:1.0-1', '9.9-9')).toBe('GREATER');
    expect(compareVersions('0:2.6-1', '2.6-1')).toBe('EQUAL');
  });

  it('compares the revision after the upstream version', () => {
    expect(compareVersions('2.6-2', '2.6-10')).toBe('LESS');
    expect(compareVersions('2.6-1', '2.6')).toBe('GREATER');
  });

  it('splits upstream and revision on the last hyphen', () => {
    expect(compareVersions('1.0-beta-2', '1.0-beta-10')).toBe('LESS');
  });
});

describe('lessOrEqual / lessThan', () => {
  it('treats equal versions as at the threshold but not before it', () => {
    expect(lessOrEqual('2.6-1', '2.6-1')).toBe(true);
    expect(lessThan('2.6-1', '2.6-1')).toBe(false);
  });

  it('agrees with compareVersions on either side', () => {
    expect(lessOrEqual('2.5-3', '2.6-1')).toBe(true);
    expect(lessThan('2.5-3', '2.6-1')).toBe(true);
    expect(lessOrEqual('2.13-1', '2.7-1')).toBe(false);
    expect(lessThan('2.13-1', '2.7-1')).toBe(false);
  });
});

describe('isValidVersion', () => {
  it.each(['2.6-1', '1:2.0', '1.0~rc1-1', '2.13', '3.0+dfsg-2'])('accepts %s', (version) => {
    expect(isValidVersion(version)).toBe(true);
  });

  it.each(['', 'abc', '2.6-', '2.6 1', 'v2.6', '2.6_1'])('rejects %j', (version) => {
    expect(isValidVersion(version)).toBe(false);
  });
});
