import { describe, it, expect } from 'vitest';
import { TextBatcher, splitLines, textLength } from '../../../src/domain/services/TextBatcher.js';

function batchesOf(text: string, maxBatchLength: number): readonly string[] {
  const result = new TextBatcher(maxBatchLength).split(text);
  if (!result.ok) throw new Error(`unexpected split failure: ${result.error.message}`);
  return result.batches;
}

describe('splitLines', () => {
  it('should keep line terminators on every line', () => {
    expect(splitLines('a\nb\nc')).toEqual(['a\n', 'b\n', 'c']);
  });

  it('should treat \\r\\n as a single terminator', () => {
    expect(splitLines('one\r\ntwo\r\n')).toEqual(['one\r\n', 'two\r\n']);
  });

  it('should split on a lone \\r and on unicode line separators', () => {
    expect(splitLines('a\rb\u2028c\u2029d\x85e')).toEqual(['a\r', 'b\u2028', 'c\u2029', 'd\x85', 'e']);
  });

  it('should yield an empty line for consecutive terminators', () => {
    expect(splitLines('a\n\nb')).toEqual(['a\n', '\n', 'b']);
  });

  it('should return nothing for empty text', () => {
    expect(splitLines('')).toEqual([]);
  });
});

describe('textLength', () => {
  it('should count a character outside the BMP once', () => {
    expect(textLength('a😀b')).toBe(3);
    expect('a😀b'.length).toBe(4);
  });
});

describe('TextBatcher', () => {
  describe('constructor', () => {
    it('should throw when the maximum batch length is not a positive integer', () => {
      expect(() => new TextBatcher(0)).toThrow('Maximum batch length must be a positive integer');
      expect(() => new TextBatcher(-5)).toThrow('Maximum batch length must be a positive integer');
      expect(() => new TextBatcher(2.5)).toThrow('Maximum batch length must be a positive integer');
    });

    it('should accept a maximum of 1', () => {
      expect(() => new TextBatcher(1)).not.toThrow();
    });
  });

  describe('split', () => {
    it('should flush a batch as soon as the next line would overflow it', () => {
      expect(batchesOf('hello\nworld\nearly\nin the\nmorning', 12)).toEqual([
        'hello\nworld\n',
        'early\n',
        'in the\n',
        'morning',
      ]);
    });

    it('should put everything in one batch when the text fits', () => {
      expect(batchesOf('one\ntwo\nthree\n', 500)).toEqual(['one\ntwo\nthree\n']);
    });

    it('should fill a batch up to exactly the maximum', () => {
      expect(batchesOf('abc\ndef\nghi\n', 8)).toEqual(['abc\ndef\n', 'ghi\n']);
    });

    it('should return no batches for empty text', () => {
      const result = new TextBatcher(10).split('');
      expect(result).toEqual({ ok: true, batches: [] });
    });

    it('should keep an empty line inside the batch it falls into', () => {
      expect(batchesOf('ab\n\ncd\n', 4)).toEqual(['ab\n\n', 'cd\n']);
    });

    it('should measure lines in code points', () => {
      expect(batchesOf('😀😀\n😀\n', 3)).toEqual(['😀😀\n', '😀\n']);
    });

    it('should report an over-long line with its number and sizes', () => {
      const text = ['short', 'also short', 'x'.repeat(500), 'tail'].join('\n');
      const result = new TextBatcher(500).split(text);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toEqual({
        code: 'LINE_TOO_LONG',
        lineNumber: 3,
        length: 501,
        maxLength: 500,
        message: 'The line 3 is too long (got 501, max. is 500).',
      });
      expect('batches' in result).toBe(false);
    });

    it('should count the terminator towards the line length', () => {
      const result = new TextBatcher(3).split('abc\n');
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.lineNumber).toBe(1);
      expect(result.error.length).toBe(4);
    });

    it('should reconstruct the text and respect the bound for a range of inputs', () => {
      const texts = [
        'Мама мыла раму.\nПапа читал газету.\r\nДети играли во дворе.\n',
        'a\nbb\nccc\ndddd\neeeee\nffffff',
        '\n\n\n',
        'single line without terminator',
        'mixed\rterminators\r\nhere\u2028and there\n',
      ];

      for (const text of texts) {
        for (const max of [31, 40, 64, 500]) {
          const batches = batchesOf(text, max);
          expect(batches.join('')).toBe(text);
          for (const batch of batches) {
            expect(textLength(batch)).toBeLessThanOrEqual(max);
            expect(batch.length).toBeGreaterThan(0);
          }
        }
      }
    });
  });
});
