import { describe, it, expect } from 'vitest';
import { isWithinInterval } from '../../src/application/time-window.js';
import { fakeLogger, ts } from '../helpers.js';

describe('isWithinInterval', () => {
  it('should collapse a timestamp inside the interval', () => {
    expect(isWithinInterval(ts('10:00:30'), [ts('10:00:00')], 60, fakeLogger())).toBe(true);
  });

  it('should keep a timestamp exactly one interval away', () => {
    expect(isWithinInterval(ts('10:01:00'), [ts('10:00:00')], 60, fakeLogger())).toBe(false);
  });

  it('should keep a timestamp beyond the interval', () => {
    expect(isWithinInterval(ts('10:02:00'), [ts('10:00:00')], 60, fakeLogger())).toBe(false);
  });

  it('should compare against every recorded timestamp', () => {
    const existing = [ts('10:00:00'), ts('10:05:00')];
    expect(isWithinInterval(ts('10:05:20'), existing, 60, fakeLogger())).toBe(true);
  });

  it('should compare instants across offsets', () => {
    const existing = [ts('10:00:00', '-04:00')];
    expect(isWithinInterval(ts('14:00:30', '+00:00'), existing, 60, fakeLogger())).toBe(true);
  });

  it('should not compare timestamps with and without an offset', () => {
    expect(isWithinInterval('2024-10-07T10:00:10', ['2024-10-07T10:00:00Z'], 60, fakeLogger())).toBe(false);
    expect(isWithinInterval('2024-10-07T10:00:10Z', ['2024-10-07T10:00:00'], 60, fakeLogger())).toBe(false);
    expect(isWithinInterval('2024-10-07T10:00:10', ['2024-10-07T10:00:00'], 60, fakeLogger())).toBe(true);
  });

  it('should return false for an empty list', () => {
    expect(isWithinInterval(ts('10:00:00'), [], 60, fakeLogger())).toBe(false);
  });

  it('should log and keep an unparsable new timestamp', () => {
    const log = fakeLogger();
    expect(isWithinInterval('2024-99-99T00:00:00', [ts('10:00:00')], 60, log)).toBe(false);
    expect(log.warn).toHaveBeenCalledWith(
      { timestamp: '2024-99-99T00:00:00' },
      'Failed to parse date from timestamp',
    );
  });

  it('should skip unparsable recorded timestamps', () => {
    const log = fakeLogger();
    expect(isWithinInterval(ts('10:00:10'), ['garbage', ts('10:00:00')], 60, log)).toBe(true);
    expect(isWithinInterval(ts('10:00:10'), ['garbage'], 60, log)).toBe(false);
    expect(log.warn).not.toHaveBeenCalled();
  });
});
