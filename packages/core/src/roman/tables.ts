// ============================================================================
// @numerals/core — Roman Symbol Tables
// ============================================================================
//
// One source table, two derived views:
//   - SCAN_SYMBOLS   value-ordered, no ligatures, no zero (used by the encoder)
//   - SYMBOL_VALUES  symbol → value, every glyph (used for lookup)
//
// Everything here is built once at module load and frozen.
// ============================================================================

import type { RewriteTable } from '../rewrite.js';

export interface RomanSymbol {
  readonly symbol: string;
  readonly value: number;
  /** Produced only by the ligature rewrite, never by the additive scan. */
  readonly ligature?: boolean;
}

export const ZERO_SYMBOL = 'N';

/** Unicode number forms, highest value first. */
export const ROMAN_SYMBOLS: readonly RomanSymbol[] = Object.freeze([
  { symbol: 'Ⅿ', value: 1000 },
  { symbol: 'Ⅾ', value: 500 },
  { symbol: 'Ⅽ', value: 100 },
  { symbol: 'Ⅼ', value: 50 },
  { symbol: 'Ⅻ', value: 12, ligature: true },
  { symbol: 'Ⅺ', value: 11, ligature: true },
  { symbol: 'Ⅹ', value: 10 },
  { symbol: 'Ⅸ', value: 9 },
  { symbol: 'Ⅷ', value: 8 },
  { symbol: 'Ⅶ', value: 7 },
  { symbol: 'Ⅵ', value: 6 },
  { symbol: 'Ⅴ', value: 5 },
  { symbol: 'Ⅳ', value: 4 },
  { symbol: 'Ⅲ', value: 3 },
  { symbol: 'Ⅱ', value: 2 },
  { symbol: 'Ⅰ', value: 1 },
  { symbol: ZERO_SYMBOL, value: 0 },
]);

export const SCAN_SYMBOLS: readonly RomanSymbol[] = Object.freeze(
  ROMAN_SYMBOLS.filter((entry) => !entry.ligature && entry.value > 0),
);

export const SYMBOL_VALUES: ReadonlyMap<string, number> = new Map(
  ROMAN_SYMBOLS.map((entry) => [entry.symbol, entry.value]),
);

/** Largest value of the scan view; the standard range ends at a multiple of it. */
export const MAX_STANDARD_VALUE = SCAN_SYMBOLS[0].value;

export function maxConsecutive(onlyAdditive: boolean): number {
  return onlyAdditive ? 4 : 3;
}

/** First value that needs magnitude-extension notation. */
export function standardThreshold(onlyAdditive: boolean): number {
  return MAX_STANDARD_VALUE * (maxConsecutive(onlyAdditive) + 1);
}

// ---------------------------------------------------------------------------
// Large numbers
// ---------------------------------------------------------------------------

/** Apostrophus glyphs for the tabulated magnitudes. */
export const APOSTROPHUS: ReadonlyMap<number, string> = new Map([
  [1000, 'ↀ'],
  [5000, 'ↁ'],
  [10000, 'ↂ'],
  [50000, 'ↇ'],
  [100000, 'ↈ'],
]);

/**
 * Building blocks of Claudian notation. The bare 1000 block is the Unicode
 * Ⅿ rather than a Latin M, so non-ASCII output stays in one script; the two
 * transliterate to the same ASCII.
 */
export const CLAUDIAN = Object.freeze({
  hundred: 'Ⅽ',
  half: 'Ⅾ',
  thousand: 'Ⅿ',
  inner: 'ↀ',
  enclosure: 'Ↄ',
});

/** Magnitude class of the first extension step (10^3). */
export const BASE_MAGNITUDE_ORDER = 3;

export const ENCLOSURE_ASCII = 'O';

/**
 * Glyphs that only occur in large-number notation. Their ASCII forms can
 * read as ordinary numerals (ↀ is CD), so the decoder looks for them first.
 */
export const LARGE_NUMBER_GLYPHS: ReadonlySet<string> = new Set([
  ...APOSTROPHUS.values(),
  CLAUDIAN.enclosure,
]);

// ---------------------------------------------------------------------------
// Rewrite tables
// ---------------------------------------------------------------------------

export const LIGATURES: RewriteTable = Object.freeze([
  ['ⅩⅠ', 'Ⅺ'],
  ['ⅩⅡ', 'Ⅻ'],
] as const);

export const ADDITIVE_REWRITES: RewriteTable = Object.freeze([
  ['Ⅳ', 'ⅡⅡ'],
  ['Ⅸ', 'ⅤⅡⅡ'],
] as const);

export const ARCHAIC_GLYPHS: RewriteTable = Object.freeze([
  ['Ⅵ', 'ↅ'],
  ['Ⅼ', 'ↆ'],
] as const);

/** Unicode → ASCII, with the traditional letter spellings of the apostrophus glyphs. */
export const UNICODE_TO_ASCII: RewriteTable = Object.freeze([
  ['Ⅰ', 'I'],
  ['Ⅱ', 'II'],
  ['Ⅲ', 'III'],
  ['Ⅳ', 'IV'],
  ['Ⅴ', 'V'],
  ['Ⅵ', 'VI'],
  ['Ⅶ', 'VII'],
  ['Ⅷ', 'VIII'],
  ['Ⅸ', 'IX'],
  ['Ⅹ', 'X'],
  ['Ⅺ', 'XI'],
  ['Ⅻ', 'XII'],
  ['Ⅼ', 'L'],
  ['Ⅽ', 'C'],
  ['Ⅾ', 'D'],
  ['Ⅿ', 'M'],
  ['ↅ', 'VI'],
  ['ↆ', 'L'],
  ['Ↄ', 'O'],
  ['ↀ', 'CD'],
  ['ↁ', 'DO'],
  ['ↂ', 'CCDO'],
  ['ↇ', 'DOO'],
  ['ↈ', 'CCCDOO'],
] as const);

// ---------------------------------------------------------------------------
// Canonical ASCII symbol set (decoder)
// ---------------------------------------------------------------------------

export type AsciiRomanSymbol = 'I' | 'V' | 'X' | 'L' | 'C' | 'D' | 'M' | 'N';

export const ASCII_VALUES: Readonly<Record<AsciiRomanSymbol, number>> = Object.freeze({
  I: 1,
  V: 5,
  X: 10,
  L: 50,
  C: 100,
  D: 500,
  M: 1000,
  N: 0,
});

export function isAsciiRomanSymbol(ch: string): ch is AsciiRomanSymbol {
  return Object.hasOwn(ASCII_VALUES, ch);
}

/** Every character that can appear in a numeral, in any rendering. */
export const ROMAN_CHARACTERS: ReadonlySet<string> = new Set([
  ...Object.keys(ASCII_VALUES),
  ENCLOSURE_ASCII,
  ...ROMAN_SYMBOLS.map((entry) => entry.symbol),
  ...APOSTROPHUS.values(),
  ...Object.values(CLAUDIAN),
  ...ARCHAIC_GLYPHS.map(([, glyph]) => glyph),
]);
