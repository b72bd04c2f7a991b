import { countWords, normalizeWhitespace, truncateText } from '../../../src/utils/text.js';

describe('Text Utils', () => {
  describe('normalizeWhitespace', () => {
    it('should collapse runs of whitespace', () => {
      expect(normalizeWhitespace('  one\n\ttwo   three ')).toBe('one two three');
    });

    it('should return empty for blank text', () => {
      expect(normalizeWhitespace(' \n ')).toBe('');
    });
  });

  describe('countWords', () => {
    it('should count whitespace-separated words', () => {
      expect(countWords('Hello   there,\nfriend')).toBe(3);
    });

    it('should return zero for blank text', () => {
      expect(countWords('   ')).toBe(0);
    });
  });

  describe('truncateText', () => {
    it('should cut long text', () => {
      expect(truncateText('abcdefgh', 3)).toBe('abc');
    });

    it('should keep short text unchanged', () => {
      expect(truncateText('abc', 10)).toBe('abc');
    });
  });
});
