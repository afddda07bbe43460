import { describe, it, expect } from 'vitest';
import { MatchGrouper, matchKey, normalizeMatch } from '../../src/application/match-grouper.js';
import { createErrorRule } from '../../src/domain/rules/error-rule.js';
import { fakeLogger, ts } from '../helpers.js';

function firstMatch(pattern: RegExp, text: string): RegExpMatchArray {
  const match = pattern.exec(text);
  if (match === null) throw new Error(`no match for ${String(pattern)}`);
  return match;
}

describe('normalizeMatch', () => {
  it('should return the whole match when there are no groups', () => {
    expect(normalizeMatch(firstMatch(/disk \w+/, 'disk sda failed'))).toBe('disk sda');
  });

  it('should return capture groups as a list', () => {
    expect(normalizeMatch(firstMatch(/(\w+) failed on (\w+)/, 'driver failed on gpu0'))).toEqual([
      'driver',
      'gpu0',
    ]);
  });

  it('should collapse a single group to a string', () => {
    expect(normalizeMatch(firstMatch(/error: (\w+)/, 'error: timeout'))).toBe('timeout');
  });

  it('should drop unmatched and empty groups', () => {
    expect(normalizeMatch(firstMatch(/(foo)(bar)?/, 'foo'))).toBe('foo');
    expect(normalizeMatch(firstMatch(/(a*)(b+)/, 'bb'))).toBe('bb');
    expect(normalizeMatch(firstMatch(/(x?)(y?)/, 'z'))).toEqual([]);
  });

  it('should split a multi-line whole match into its non-empty lines', () => {
    const match = firstMatch(/start[\s\S]*?end/, '  start\n  middle\n\nend  ');
    expect(normalizeMatch(match)).toEqual(['start', '  middle', 'end']);
  });

  it('should not split multi-line capture groups', () => {
    expect(normalizeMatch(firstMatch(/(a\nb)(c)/, 'a\nbc'))).toEqual(['a\nb', 'c']);
  });
});

describe('matchKey', () => {
  it('should distinguish a joined string from a list', () => {
    expect(matchKey('a,b')).not.toBe(matchKey(['a', 'b']));
    expect(matchKey(['a', 'b'])).toBe('["a","b"]');
    expect(matchKey('x')).toBe('"x"');
  });
});

describe('MatchGrouper', () => {
  const gpu = createErrorRule(/gpu hang/, 'GPU hang', { category: 'SW_DRIVER' });
  const os = createErrorRule(/hang/, 'Generic hang', { category: 'OS', severity: 'WARNING' });

  it('should create one event per key and count repeats', () => {
    const grouper = new MatchGrouper(60, fakeLogger());
    grouper.record(gpu, 'gpu hang', 'dmesg', ts('10:00:00'));
    grouper.record(gpu, 'gpu hang', 'dmesg', ts('10:05:00'));
    grouper.record(gpu, 'other', 'dmesg', ts('10:06:00'));

    expect(grouper.size).toBe(2);
    const [first, second] = grouper.values();
    expect(first?.data.count).toBe(2);
    expect(first?.data.timestamps).toEqual([ts('10:00:00'), ts('10:05:00')]);
    expect(second?.data.match_content).toBe('other');
  });

  it('should drop timestamps inside the collapse interval', () => {
    const grouper = new MatchGrouper(60, fakeLogger());
    grouper.record(gpu, 'gpu hang', 'dmesg', ts('10:00:00'));
    grouper.record(gpu, 'gpu hang', 'dmesg', ts('10:00:59'));

    const [event] = grouper.values();
    expect(event?.data.count).toBe(2);
    expect(event?.data.timestamps).toEqual([ts('10:00:00')]);
  });

  it('should keep the classification of the first rule to see a key', () => {
    const grouper = new MatchGrouper(60, fakeLogger());
    grouper.record(gpu, 'hang', 'dmesg', null);
    grouper.record(os, 'hang', 'dmesg', null);

    const [event] = grouper.values();
    expect(grouper.size).toBe(1);
    expect(event?.description).toBe('GPU hang');
    expect(event?.category).toBe('SW_DRIVER');
    expect(event?.severity).toBe('ERROR');
    expect(event?.data.count).toBe(2);
  });

  it('should start a timestamp list when the first match had none', () => {
    const grouper = new MatchGrouper(60, fakeLogger());
    grouper.record(gpu, 'gpu hang', 'dmesg', null);
    expect(grouper.values()[0]?.data.timestamps).toBeUndefined();

    grouper.record(gpu, 'gpu hang', 'dmesg', ts('10:00:00'));
    expect(grouper.values()[0]?.data.timestamps).toEqual([ts('10:00:00')]);
  });
});
