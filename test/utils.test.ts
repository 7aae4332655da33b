import { describe, expect, it } from 'vitest';

import { formatBytes, formatTime, truncateKey } from '../src/utils';

describe('formatBytes', () => {
  it('formats sizes with binary units', () => {
    expect(formatBytes(0)).toBe('0 Bytes');
    expect(formatBytes(512)).toBe('512 Bytes');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5 MB');
  });
});

describe('formatTime', () => {
  it('formats durations', () => {
    expect(formatTime(0)).toBe('0s');
    expect(formatTime(120)).toBe('2m');
    expect(formatTime(3725)).toBe('1h 2m 5s');
  });
});

describe('truncateKey', () => {
  it('keeps the end of long keys', () => {
    expect(truncateKey('short')).toBe('short');
    expect(truncateKey('a/very/long/key/name.txt', 10)).toBe('...y/name.txt');
  });
});
