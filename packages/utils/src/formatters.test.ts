import { describe, it, expect } from 'vitest';
import {
  formatFileSize,
  formatFileTimestamp,
  formatSequenceFileName,
  sanitizeFileName,
} from './formatters';

describe('formatters', () => {
  it('formats file sizes', () => {
    expect(formatFileSize(0)).toBe('0 Bytes');
    expect(formatFileSize(512)).toBe('512 Bytes');
    expect(formatFileSize(1536)).toBe('1.5 KB');
    expect(formatFileSize(5 * 1024 * 1024)).toBe('5 MB');
  });

  it('formats file timestamps in local time', () => {
    const date = new Date(2024, 0, 5, 7, 8, 9);
    expect(formatFileTimestamp(date)).toBe('20240105_070809');
  });

  it('pads sequence file names to five digits', () => {
    expect(formatSequenceFileName('frame', 0, 'jpg')).toBe('frame_00000.jpg');
    expect(formatSequenceFileName('frame', 123, 'jpg')).toBe('frame_00123.jpg');
  });

  it('sanitizes file names', () => {
    expect(sanitizeFileName('my clip/1.avi')).toBe('my_clip_1.avi');
  });
});
