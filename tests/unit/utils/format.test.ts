import { describe, it, expect } from 'vitest';
import { formatBytes, formatUptime } from '../../../src/utils/format.js';

describe('formatBytes', () => {
  it('formats zero and small values in bytes', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
  });

  it('scales to the largest whole unit and rounds to two decimals', () => {
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(1572864)).toBe('1.5 MB');
    expect(formatBytes(1024 * 1024 * 1024)).toBe('1 GB');
    expect(formatBytes(1000)).toBe('1000 B');
    expect(formatBytes(1234567)).toBe('1.18 MB');
  });

  it('keeps the sign of negative values', () => {
    expect(formatBytes(-2048)).toBe('-2 KB');
  });
});

describe('formatUptime', () => {
  it('shows minutes only below an hour', () => {
    expect(formatUptime(59)).toBe('0m');
    expect(formatUptime(125)).toBe('2m');
  });

  it('includes hours and days when present', () => {
    expect(formatUptime(3 * 3600 + 5 * 60)).toBe('3h 5m');
    expect(formatUptime(86400 + 3600 + 60 + 1)).toBe('1d 1h 1m');
  });

  it('treats negative input as zero', () => {
    expect(formatUptime(-10)).toBe('0m');
  });
});
