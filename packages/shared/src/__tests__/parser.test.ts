import { describe, it, expect } from 'vitest';
import {
  parseDuration,
  formatDuration,
  formatBytes,
  formatPercent,
  roundTo2,
} from '../utils/parser.js';

describe('parseDuration', () => {
  it('should return the number directly when given a number', () => {
    expect(parseDuration(5000)).toBe(5000);
    expect(parseDuration(0)).toBe(0);
  });

  it('should parse seconds', () => {
    expect(parseDuration('30s')).toBe(30000);
    expect(parseDuration('0s')).toBe(0);
  });

  it('should parse minutes and hours', () => {
    expect(parseDuration('1m')).toBe(60000);
    expect(parseDuration('1h')).toBe(3600000);
  });

  it('should parse milliseconds', () => {
    expect(parseDuration('100ms')).toBe(100);
  });

  it('should throw on invalid duration string', () => {
    expect(() => parseDuration('invalid')).toThrow('Invalid duration string: "invalid"');
  });
});

describe('formatDuration', () => {
  it('should format milliseconds below 1 second', () => {
    expect(formatDuration(0)).toBe('0ms');
    expect(formatDuration(999)).toBe('999ms');
  });

  it('should format seconds, minutes, hours and days', () => {
    expect(formatDuration(30000)).toBe('30s');
    expect(formatDuration(300000)).toBe('5m');
    expect(formatDuration(3600000)).toBe('1h');
    expect(formatDuration(172800000)).toBe('2d');
  });

  it('should round to nearest unit', () => {
    expect(formatDuration(1500)).toBe('2s');
    expect(formatDuration(90000)).toBe('2m');
  });
});

describe('formatBytes', () => {
  it('should format with a space between value and unit', () => {
    expect(formatBytes(1024)).toBe('1 KB');
    expect(formatBytes(1073741824)).toBe('1 GB');
  });

  it('should keep up to two decimals', () => {
    expect(formatBytes(1610612736)).toBe('1.5 GB');
  });
});

describe('roundTo2', () => {
  it('should round to two decimal places', () => {
    expect(roundTo2(56.666666)).toBe(56.67);
    expect(roundTo2(10)).toBe(10);
    expect(roundTo2(0.125)).toBe(0.13);
  });
});

describe('formatPercent', () => {
  it('should drop trailing zeros', () => {
    expect(formatPercent(85)).toBe('85%');
    expect(formatPercent(12.5)).toBe('12.5%');
  });

  it('should round to two decimals', () => {
    expect(formatPercent(33.33333)).toBe('33.33%');
  });
});
