import { describe, it, expect } from 'vitest';
import { QuotingEncoder } from '@/services/QuotingEncoder';

describe('QuotingEncoder', () => {
  describe('encode', () => {
    it('should leave values that need no quoting unchanged', () => {
      expect(QuotingEncoder.encode('a')).toBe('a');
      expect(QuotingEncoder.encode('a a')).toBe('a a');
      expect(QuotingEncoder.encode('a "a')).toBe('a "a');
      expect(QuotingEncoder.encode("a' a")).toBe("a' a");
      expect(QuotingEncoder.encode('a\' "a')).toBe('a\' "a');
      expect(QuotingEncoder.encode('')).toBe('');
    });

    it('should quote values with leading or trailing spaces', () => {
      expect(QuotingEncoder.encode(' a')).toBe('" a"');
      expect(QuotingEncoder.encode('a ')).toBe('"a "');
      expect(QuotingEncoder.encode(' a ')).toBe('" a "');
      expect(QuotingEncoder.encode(' ')).toBe('" "');
    });

    it('should quote values containing a semicolon', () => {
      expect(QuotingEncoder.encode('a;a')).toBe('"a;a"');
      expect(QuotingEncoder.encode(' a;a')).toBe('" a;a"');
      expect(QuotingEncoder.encode('a;a ')).toBe('"a;a "');
      expect(QuotingEncoder.encode(' a;a ')).toBe('" a;a "');
    });

    it('should quote values containing control characters', () => {
      expect(QuotingEncoder.encode('\u0000')).toBe('"\u0000"');
      expect(QuotingEncoder.encode('a\u0000a')).toBe('"a\u0000a"');
      expect(QuotingEncoder.encode('a\tb')).toBe('"a\tb"');
      expect(QuotingEncoder.encode('a\u0085b')).toBe('"a\u0085b"');
    });

    it('should use double quotes around values with single quotes', () => {
      expect(QuotingEncoder.encode(" a'a")).toBe('" a\'a"');
    });

    it('should use single quotes around values with double quotes', () => {
      expect(QuotingEncoder.encode(' a"a')).toBe('\' a"a\'');
    });

    it('should double embedded double quotes when both quote types are present', () => {
      expect(QuotingEncoder.encode(' \'a"a')).toBe('" \'a""a"');
      expect(QuotingEncoder.encode(' \'a""a')).toBe('" \'a""""a"');
    });
  });

  describe('needsQuotes', () => {
    it('should not flag inner spaces or quotes alone', () => {
      expect(QuotingEncoder.needsQuotes('a b')).toBe(false);
      expect(QuotingEncoder.needsQuotes('a"b\'c')).toBe(false);
    });

    it('should flag unicode control characters only', () => {
      expect(QuotingEncoder.includesControlCharacter('line\nbreak')).toBe(true);
      expect(QuotingEncoder.includesControlCharacter('\u007f')).toBe(true);
      expect(QuotingEncoder.includesControlCharacter('café')).toBe(false);
    });
  });
});
