// ============================================================================
// @numerals/core — Roman Numeral Decoder
// ============================================================================
//
// text → sign → normalise to I V X L C D M N (O) → validate → scan → integer
//
// The scan is a lookahead rule, not a grammar: a symbol is subtracted when any
// later symbol is strictly larger, otherwise added. Lenient mode therefore
// accepts non-canonical text such as IIM (998) or VL (45).
// ============================================================================

import { FormatError, InvalidInputError, UnsupportedError } from '../errors.js';
import { debug, isDebugEnabled } from '../logger.js';
import { invertPairs, rewrite } from '../rewrite.js';
import type { RewriteTable } from '../rewrite.js';
import { STANDARD_GRAMMAR, matchGrammar } from './grammar.js';
import { resolveDecodeOptions } from './options.js';
import type { RomanDecodeOptions } from './options.js';
import {
  ASCII_VALUES,
  ENCLOSURE_ASCII,
  LARGE_NUMBER_GLYPHS,
  UNICODE_TO_ASCII,
  ZERO_SYMBOL,
  isAsciiRomanSymbol,
} from './tables.js';

/**
 * Undo the encoder's caller substitutions on uppercased text. The pairs run
 * last to first so each one sees the text its successor produced.
 */
function undoAlternatives(text: string, alternatives?: RewriteTable): string {
  if (!alternatives) return text;
  const inverse = invertPairs(alternatives)
    .reverse()
    .map(([pattern, replacement]) => [pattern.toUpperCase(), replacement.toUpperCase()] as const);
  return rewrite(text, inverse);
}

/**
 * Uppercase `text` and rewrite every glyph to canonical ASCII.
 * Alternative glyphs are undone first.
 */
export function normalizeRoman(text: string, alternatives?: RewriteTable): string {
  return rewrite(undoAlternatives(text.toUpperCase(), alternatives), UNICODE_TO_ASCII);
}

/**
 * Sum canonical symbol values: subtract a value when a larger one follows.
 */
export function scanValues(values: readonly number[]): number {
  let total = 0;
  let maxAfter = 0;
  for (let i = values.length - 1; i >= 0; i--) {
    const value = values[i];
    total += value < maxAfter ? -value : value;
    if (value > maxAfter) maxAfter = value;
  }
  return total;
}

/**
 * Decode a Roman numeral.
 *
 * Accepts Unicode number forms, their lowercase variants, the ↅ/ↆ archaic
 * glyphs and plain ASCII.
 *
 * @example
 * ```ts
 * decodeRoman('MDCLXVI');                   // → 1666
 * decodeRoman('ⅬⅩⅬⅨ');                      // → 99
 * decodeRoman('IIM');                       // → 998
 * decodeRoman('MMMMMM', { strict: true });  // throws FormatError
 * ```
 *
 * @throws {InvalidInputError} On unknown symbols, a misplaced sign or empty input
 * @throws {UnsupportedError} On Claudian / apostrophus large-number notation
 * @throws {FormatError} In strict mode, when the grammar rejects the numeral
 */
export function decodeRoman(text: string, options: RomanDecodeOptions = {}): number {
  const resolved = resolveDecodeOptions(options);
  const sign = resolved.negativeSign;

  let body = text.trim();
  const negative = body.startsWith(sign);
  if (negative) body = body.slice(sign.length);

  if (body.includes(sign)) {
    throw new InvalidInputError(`Negative sign "${sign}" must lead the numeral.`, {
      input: text,
      symbol: sign,
    });
  }
  if (body.length === 0) {
    throw new InvalidInputError('Nothing to decode.', { input: text });
  }

  const restored = undoAlternatives(body.toUpperCase(), resolved.alternatives);
  const canonical = rewrite(restored, UNICODE_TO_ASCII);

  const values: number[] = [];
  let enclosed = [...restored].some((ch) => LARGE_NUMBER_GLYPHS.has(ch));
  for (const ch of canonical) {
    if (isAsciiRomanSymbol(ch)) {
      values.push(ASCII_VALUES[ch]);
    } else if (ch === ENCLOSURE_ASCII) {
      enclosed = true;
    } else {
      throw new InvalidInputError(`Invalid symbol: "${ch}".`, { input: text, symbol: ch });
    }
  }

  if (canonical.includes(ZERO_SYMBOL) && canonical.length > 1) {
    throw new InvalidInputError(`"${ZERO_SYMBOL}" cannot be combined with other symbols.`, {
      input: text,
      symbol: ZERO_SYMBOL,
    });
  }
  if (enclosed) {
    throw new UnsupportedError(text);
  }

  if (resolved.strict) {
    if (!matchGrammar(canonical, resolved.grammar)) {
      throw new FormatError(text);
    }
  } else if (
    isDebugEnabled() &&
    canonical !== ZERO_SYMBOL &&
    !matchGrammar(canonical, STANDARD_GRAMMAR)
  ) {
    debug(`decodeRoman: accepted non-canonical numeral ${canonical}`, { input: text });
  }

  const value = scanValues(values);
  return negative && value !== 0 ? -value : value;
}

/**
 * Check validity without throwing. Bad options still throw.
 */
export function isValidRoman(text: string, options: RomanDecodeOptions = {}): boolean {
  resolveDecodeOptions(options);
  try {
    decodeRoman(text, options);
    return true;
  } catch (e) {
    if (
      e instanceof InvalidInputError ||
      e instanceof FormatError ||
      e instanceof UnsupportedError
    ) {
      return false;
    }
    throw e;
  }
}
