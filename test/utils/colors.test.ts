import { describe, it, expect } from 'vitest';
import colors, { detectColors } from '../../src/utils/colors.js';

describe('Colors Utility', () => {
  describe('detectColors', () => {
    it('should honor NO_COLOR over everything', () => {
      expect(detectColors({ NO_COLOR: '1', FORCE_COLOR: '1' }, true)).toBe(false);
    });

    it('should honor FORCE_COLOR', () => {
      expect(detectColors({ FORCE_COLOR: '1' }, false)).toBe(true);
    });

    it('should not color dumb terminals', () => {
      expect(detectColors({ TERM: 'dumb' }, true)).toBe(false);
    });

    it('should color TTYs and CI', () => {
      expect(detectColors({}, true)).toBe(true);
      expect(detectColors({ CI: 'true' }, false)).toBe(true);
      expect(detectColors({}, false)).toBe(false);
    });
  });

  describe('styles', () => {
    it('should keep the text', () => {
      const styled = colors.red(colors.bold('error'));
      expect(styled.replace(/\x1b\[\d+m/g, '')).toBe('error');
    });

    it('should accept numbers', () => {
      expect(colors.gray(42).replace(/\x1b\[\d+m/g, '')).toBe('42');
    });
  });
});
