import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  ConfigurationError,
  FormatError,
  InvalidInputError,
  UnsupportedError,
} from '../errors.js';
import { getLogLevel, onLog, setLogLevel } from '../logger.js';
import type { LogEntry } from '../logger.js';
import { decodeRoman, isValidRoman, normalizeRoman, scanValues } from '../roman/decoder.js';
import { encodeRoman } from '../roman/encoder.js';
import { ADDITIVE_GRAMMAR } from '../roman/grammar.js';
import type { RewriteTable } from '../rewrite.js';

describe('decodeRoman', () => {
  describe('lenient mode', () => {
    it('decodes canonical numerals', () => {
      expect(decodeRoman('MDCLXVI')).toBe(1666);
      expect(decodeRoman('MCMXCIV')).toBe(1994);
      expect(decodeRoman('MMMCMXCIX')).toBe(3999);
    });

    it('subtracts any symbol followed by a larger one', () => {
      expect(decodeRoman('IC')).toBe(99);
      expect(decodeRoman('IIM')).toBe(998);
      expect(decodeRoman('VL')).toBe(45);
      expect(decodeRoman('LXL')).toBe(90);
    });

    it('accepts more than three repeats', () => {
      expect(decodeRoman('MMMMMM')).toBe(6000);
      expect(decodeRoman('IIII')).toBe(4);
    });
  });

  describe('normalisation', () => {
    it('reads Unicode number forms and ligatures', () => {
      expect(decodeRoman('ⅬⅩⅬⅨ')).toBe(99);
      expect(decodeRoman('ⅩⅫ')).toBe(22);
      expect(decodeRoman('ⅯⅮⅭⅬⅩⅥ')).toBe(1666);
    });

    it('ignores case and surrounding whitespace', () => {
      expect(decodeRoman('mdclxvi')).toBe(1666);
      expect(decodeRoman('ⅿⅾⅽⅼⅹⅵ')).toBe(1666);
      expect(decodeRoman('  xiv  ')).toBe(14);
    });

    it('reads archaic glyphs', () => {
      expect(decodeRoman('ↆↅ')).toBe(56);
      expect(decodeRoman('ⅩⅩↅ')).toBe(26);
    });

    it('undoes caller alternatives', () => {
      const alternatives = [['Ⅿ', 'ↀ']] as const;
      expect(decodeRoman('ↀↀ', { alternatives })).toBe(2000);
      expect(() => decodeRoman('ↀↀ')).toThrow(UnsupportedError);
    });

    it('undoes chained alternatives last to first', () => {
      const alternatives: RewriteTable = [
        ['Ⅱ', 'Q'],
        ['Q', 'Z'],
      ];
      expect(encodeRoman(2, { alternatives })).toBe('Z');
      expect(decodeRoman('Z', { alternatives })).toBe(2);
      expect(encodeRoman(-2, { alternatives, uppercase: false })).toBe('-z');
      expect(decodeRoman('-z', { alternatives })).toBe(-2);
    });
  });

  describe('zero', () => {
    it('decodes N', () => {
      expect(decodeRoman('N')).toBe(0);
      expect(decodeRoman('n')).toBe(0);
      expect(decodeRoman('-N')).toBe(0);
    });

    it('rejects N mixed with other symbols', () => {
      expect(() => decodeRoman('NI')).toThrow(InvalidInputError);
      expect(() => decodeRoman('XN')).toThrow(InvalidInputError);
      expect(() => decodeRoman('NO')).toThrow(InvalidInputError);
    });
  });

  describe('sign', () => {
    it('negates a leading sign', () => {
      expect(decodeRoman('-XIV')).toBe(-14);
      expect(decodeRoman('~XIV', { negativeSign: '~' })).toBe(-14);
      expect(decodeRoman('−Ⅻ', { negativeSign: '−' })).toBe(-12);
    });

    it('rejects a misplaced sign', () => {
      expect(() => decodeRoman('X-IV')).toThrow(InvalidInputError);
      expect(() => decodeRoman('--X')).toThrow(InvalidInputError);
    });

    it('rejects a sign with nothing after it', () => {
      expect(() => decodeRoman('-')).toThrow(InvalidInputError);
    });

    it('rejects a sign made of numeral symbols', () => {
      expect(() => decodeRoman('X', { negativeSign: 'X' })).toThrow(ConfigurationError);
    });
  });

  describe('invalid input', () => {
    it('rejects empty input', () => {
      expect(() => decodeRoman('')).toThrow(InvalidInputError);
      expect(() => decodeRoman('   ')).toThrow(InvalidInputError);
    });

    it('names the first unknown symbol', () => {
      try {
        decodeRoman('ABC');
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(InvalidInputError);
        expect(e).toHaveProperty('symbol', 'A');
      }
    });

    it('reports unknown symbols before large-number notation', () => {
      expect(() => decodeRoman('OZ')).toThrow(InvalidInputError);
    });

    it('rejects mistyped options', () => {
      try {
        decodeRoman('X', JSON.parse('{"strict": "yes"}'));
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(ConfigurationError);
        expect(e).toHaveProperty('option', 'strict');
      }
    });
  });

  describe('large-number notation', () => {
    it('is recognised but not decoded', () => {
      expect(() => decodeRoman('ⅭↀↃ')).toThrow(UnsupportedError);
      expect(() => decodeRoman('MDO')).toThrow(UnsupportedError);
      expect(() => decodeRoman('ↁ')).toThrow(UnsupportedError);
      expect(() => decodeRoman('ⅽↀↄ')).toThrow(UnsupportedError);
    });

    it('flags apostrophus glyphs whose ASCII reads as a plain numeral', () => {
      expect(() => decodeRoman('ↀ')).toThrow(UnsupportedError);
      expect(() => decodeRoman('ⅯↀⅩ')).toThrow(UnsupportedError);
      expect(decodeRoman('CD')).toBe(400);
    });
  });

  describe('strict mode', () => {
    it('accepts canonical numerals', () => {
      expect(decodeRoman('MCMXCIV', { strict: true })).toBe(1994);
      expect(decodeRoman('MMMCMXCIX', { strict: true })).toBe(3999);
      expect(decodeRoman('-XL', { strict: true })).toBe(-40);
    });

    it('rejects non-canonical numerals', () => {
      expect(() => decodeRoman('MMMMMM', { strict: true })).toThrow(FormatError);
      expect(() => decodeRoman('IIM', { strict: true })).toThrow(FormatError);
      expect(() => decodeRoman('VL', { strict: true })).toThrow(FormatError);
      expect(() => decodeRoman('LXL', { strict: true })).toThrow(FormatError);
      expect(() => decodeRoman('N', { strict: true })).toThrow(FormatError);
    });

    it('uses the given grammar', () => {
      expect(decodeRoman('IIII', { strict: true, grammar: ADDITIVE_GRAMMAR })).toBe(4);
      expect(() => decodeRoman('IV', { strict: true, grammar: ADDITIVE_GRAMMAR })).toThrow(
        FormatError,
      );
    });

    it('keeps the original text in the error', () => {
      try {
        decodeRoman(' iiii ', { strict: true });
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(FormatError);
        expect(e).toHaveProperty('input', ' iiii ');
      }
    });
  });

  describe('logging', () => {
    const level = getLogLevel();

    afterEach(() => {
      setLogLevel(level);
      vi.restoreAllMocks();
    });

    it('logs lenient acceptance of non-canonical numerals at debug level', () => {
      vi.spyOn(console, 'debug').mockImplementation(() => {});
      setLogLevel('debug');
      const entries: LogEntry[] = [];
      const off = onLog((entry) => entries.push(entry));

      decodeRoman('IIM');
      decodeRoman('XIV');
      off();

      expect(entries.map((e) => e.message)).toEqual([
        'decodeRoman: accepted non-canonical numeral IIM',
      ]);
      expect(entries[0].level).toBe('debug');
    });
  });
});

describe('isValidRoman', () => {
  it('reports validity without throwing', () => {
    expect(isValidRoman('XIV')).toBe(true);
    expect(isValidRoman('XIZ')).toBe(false);
    expect(isValidRoman('IIII', { strict: true })).toBe(false);
    expect(isValidRoman('ⅭↀↃ')).toBe(false);
  });

  it('still throws on bad options', () => {
    expect(() => isValidRoman('X', { negativeSign: 'X' })).toThrow(ConfigurationError);
  });
});

describe('normalizeRoman', () => {
  it('maps glyphs to canonical ASCII', () => {
    expect(normalizeRoman('ⅻ')).toBe('XII');
    expect(normalizeRoman('ⅭↀↃ')).toBe('CCDO');
    expect(normalizeRoman('ↅↆ')).toBe('VIL');
  });
});

describe('scanValues', () => {
  it('subtracts values followed by a larger one', () => {
    expect(scanValues([1, 1, 1000])).toBe(998);
    expect(scanValues([50, 10, 50, 1, 10])).toBe(99);
    expect(scanValues([])).toBe(0);
  });
});
