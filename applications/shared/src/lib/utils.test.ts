import { describe, it, expect } from 'vitest';
import { clamp, dropLastCharacter, formatDuration, truncate } from './utils';

describe('utils', () => {
  describe('formatDuration', () => {
    it('should format minutes and seconds', () => {
      expect(formatDuration(0)).toBe('0:00');
      expect(formatDuration(65)).toBe('1:05');
      expect(formatDuration(59.9)).toBe('0:59');
    });

    it('should include hours past the hour', () => {
      expect(formatDuration(3725)).toBe('1:02:05');
    });

    it('should render invalid input as zero', () => {
      expect(formatDuration(-1)).toBe('0:00');
      expect(formatDuration(Number.NaN)).toBe('0:00');
      expect(formatDuration(Number.POSITIVE_INFINITY)).toBe('0:00');
    });
  });

  describe('dropLastCharacter', () => {
    it('should remove a whole emoji', () => {
      expect(dropLastCharacter('Mix 🎸')).toBe('Mix ');
    });

    it('should leave an empty string empty', () => {
      expect(dropLastCharacter('')).toBe('');
    });
  });

  describe('truncate', () => {
    it('should keep text that fits', () => {
      expect(truncate('abc', 5)).toBe('abc');
      expect(truncate('abc', 3)).toBe('abc');
    });

    it('should cut long text with an ellipsis', () => {
      expect(truncate('abcdef', 4)).toBe('abc…');
      expect(truncate('abc', 1)).toBe('…');
      expect(truncate('abc', 0)).toBe('');
    });
  });

  it('should clamp into range', () => {
    expect(clamp(5, 0, 3)).toBe(3);
    expect(clamp(-2, 0, 3)).toBe(0);
    expect(clamp(2, 0, 3)).toBe(2);
  });
});
