/**
 * Tests for string helpers
 */

import { describe, it, expect } from 'vitest';
import {
  normalizeVersion,
  parseDuration,
  shortId,
  stripNonPrintable,
} from '../../../../src/shared/utils/strings.js';

describe('normalizeVersion', () => {
  it('should strip one leading v and replace dots', () => {
    expect(normalizeVersion('v2.10.3')).toBe('2_10_3');
    expect(normalizeVersion('2.8.1')).toBe('2_8_1');
    expect(normalizeVersion('vv1.0')).toBe('v1_0');
  });
});

describe('stripNonPrintable', () => {
  it('should keep printable ASCII and tab', () => {
    expect(stripNonPrintable('a\tb c~')).toBe('a\tb c~');
  });

  it('should drop escape and control characters', () => {
    expect(stripNonPrintable('\x1b[32mINFO\x1b[0m done\r\x00')).toBe('[32mINFO[0m done');
  });

  it('should drop non-ASCII characters', () => {
    expect(stripNonPrintable('café ✓')).toBe('caf ');
  });
});

describe('shortId', () => {
  it('should keep the first 12 characters', () => {
    expect(shortId('0123456789abcdef')).toBe('0123456789ab');
    expect(shortId('abc')).toBe('abc');
  });
});

describe('parseDuration', () => {
  it('should read a bare number as seconds', () => {
    expect(parseDuration('90')).toBe(90_000);
  });

  it('should read unit suffixes', () => {
    expect(parseDuration('30s')).toBe(30_000);
    expect(parseDuration('5m')).toBe(300_000);
    expect(parseDuration('1h')).toBe(3_600_000);
    expect(parseDuration('250ms')).toBe(250);
  });

  it('should add combined units', () => {
    expect(parseDuration('1m30s')).toBe(90_000);
  });

  it('should reject malformed durations', () => {
    expect(() => parseDuration('')).toThrow('invalid duration: ');
    expect(() => parseDuration('5 minutes')).toThrow('invalid duration: 5 minutes');
    expect(() => parseDuration('m5')).toThrow('invalid duration: m5');
  });
});
