// ============================================================================
// @numerals/core — Public API
// ============================================================================

// Bijective base-k / letters
export {
  encodeBijective,
  decodeBijective,
  isValidBijective,
  validateTokens,
  encodeLetters,
  decodeLetters,
  isValidLetters,
  DEFAULT_ALPHABET,
  DEFAULT_NEGATIVE_SIGN,
} from './bijective.js';
export type { Alphabet } from './bijective.js';

// Roman numerals
export { encodeRoman, decideRun, planMagnitudeStep, claudianBlock } from './roman/encoder.js';
export type { MagnitudeStep, RunDecision, RunState } from './roman/encoder.js';
export { decodeRoman, isValidRoman, normalizeRoman, scanValues } from './roman/decoder.js';
export { STANDARD_GRAMMAR, ADDITIVE_GRAMMAR, matchGrammar } from './roman/grammar.js';
export type { GrammarGroup, RomanGrammar } from './roman/grammar.js';
export {
  romanEncodeOptionsSchema,
  romanDecodeOptionsSchema,
  resolveEncodeOptions,
  resolveDecodeOptions,
  validateRomanSign,
} from './roman/options.js';
export type {
  RomanEncodeOptions,
  RomanDecodeOptions,
  ResolvedEncodeOptions,
  ResolvedDecodeOptions,
} from './roman/options.js';
export {
  ROMAN_SYMBOLS,
  SCAN_SYMBOLS,
  SYMBOL_VALUES,
  APOSTROPHUS,
  CLAUDIAN,
  ZERO_SYMBOL,
  LIGATURES,
  ADDITIVE_REWRITES,
  ARCHAIC_GLYPHS,
  UNICODE_TO_ASCII,
  ASCII_VALUES,
  maxConsecutive,
  standardThreshold,
} from './roman/tables.js';
export type { RomanSymbol, AsciiRomanSymbol } from './roman/tables.js';

// Rewriting
export { rewrite, invertPairs } from './rewrite.js';
export type { RewritePair, RewriteTable } from './rewrite.js';

// Errors
export {
  NumeralError,
  ConfigurationError,
  InvalidInputError,
  FormatError,
  UnsupportedError,
} from './errors.js';

// Logging
export {
  debug,
  info,
  warn,
  error,
  onLog,
  setLogLevel,
  getLogLevel,
  isDebugEnabled,
  levelFromEnv,
} from './logger.js';
export type { LogLevel, LogEntry, LogCallback } from './logger.js';
