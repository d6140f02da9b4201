import { formatBannerTimestamp, formatClockTime, formatDuration, formatSeconds } from '../src/utils/timeFormat.js';

describe('formatDuration', () => {
  test.each([
    [65.4, '1m5s'],
    [90061, '1d1h1m1s'],
    [3600, '1h'],
    [0, '0s'],
    [-3, '0s'],
  ])('%p -> %p', (seconds, expected) => {
    expect(formatDuration(seconds)).toBe(expected);
  });
});

describe('formatSeconds', () => {
  test('under a minute', () => {
    expect(formatSeconds(45.5)).toBe('45.5s');
  });

  test('minutes', () => {
    expect(formatSeconds(90)).toBe('1m 30.0s');
  });

  test('hours', () => {
    expect(formatSeconds(7205)).toBe('2h 0m 5.0s');
  });
});

describe('clock formatting', () => {
  test('12-hour clock with zero padding', () => {
    expect(formatClockTime(new Date(2026, 0, 5, 14, 3, 9))).toBe('02:03:09 PM');
    expect(formatClockTime(new Date(2026, 0, 5, 0, 0, 0))).toBe('12:00:00 AM');
  });

  test('banner timestamp', () => {
    expect(formatBannerTimestamp(new Date(2026, 0, 5, 14, 3, 9))).toBe('2:03PM on Jan 05, 2026');
  });
});
