// ============================================================================
// @numerals/core — Roman Numeral Encoder
// ============================================================================
//
// integer → symbol buffer → rewrite passes → text
//
// The standard range is generated greedily from SCAN_SYMBOLS. A small state
// machine over (last symbol, run length) turns a run that would grow past the
// repeat limit into a subtractive pair: III + I → IV, XXX + X → XL.
//
// Above the standard range each power of ten (or half power) is emitted as
// one magnitude block, Claudian ⅭↀↃ-style or as an apostrophus glyph, until
// the remainder falls back into the standard range.
// ============================================================================

import { ConfigurationError, InvalidInputError } from '../errors.js';
import { debug } from '../logger.js';
import { rewrite } from '../rewrite.js';
import { resolveEncodeOptions } from './options.js';
import type { ResolvedEncodeOptions, RomanEncodeOptions } from './options.js';
import {
  ADDITIVE_REWRITES,
  APOSTROPHUS,
  ARCHAIC_GLYPHS,
  BASE_MAGNITUDE_ORDER,
  CLAUDIAN,
  LIGATURES,
  SCAN_SYMBOLS,
  UNICODE_TO_ASCII,
  ZERO_SYMBOL,
  maxConsecutive,
  standardThreshold,
} from './tables.js';

// ---------------------------------------------------------------------------
// Run-length state machine
// ---------------------------------------------------------------------------

export interface RunState {
  last?: string;
  run: number;
}

export type RunDecision =
  | { kind: 'append'; symbol: string }
  | { kind: 'replace-run'; drop: number; symbol: string };

/**
 * Decide how to emit `candidate`.
 *
 * @param previous - The next larger symbol of the scan, if any
 * @param limit - Maximum number of identical consecutive symbols
 */
export function decideRun(
  state: Readonly<RunState>,
  candidate: string,
  previous: string | undefined,
  limit: number,
): RunDecision {
  if (candidate === state.last && state.run >= limit && previous !== undefined) {
    return { kind: 'replace-run', drop: limit - 1, symbol: previous };
  }
  return { kind: 'append', symbol: candidate };
}

function applyRun(buffer: string[], state: RunState, decision: RunDecision): void {
  if (decision.kind === 'replace-run') {
    buffer.length -= decision.drop;
    buffer.push(decision.symbol);
    state.last = decision.symbol;
    state.run = 1;
    return;
  }
  buffer.push(decision.symbol);
  state.run = decision.symbol === state.last ? state.run + 1 : 1;
  state.last = decision.symbol;
}

/**
 * Emit a value below the standard threshold.
 */
function emitStandard(buffer: string[], value: number, limit: number): void {
  const state: RunState = { run: 0 };
  let rest = value;
  while (rest > 0) {
    let previous: string | undefined;
    for (const entry of SCAN_SYMBOLS) {
      if (entry.value <= rest) {
        applyRun(buffer, state, decideRun(state, entry.symbol, previous, limit));
        rest -= entry.value;
        break;
      }
      previous = entry.symbol;
    }
  }
}

// ---------------------------------------------------------------------------
// Magnitude extension
// ---------------------------------------------------------------------------

export interface MagnitudeStep {
  /** ⌊log10 remainder⌋ */
  order: number;
  /** Remainder is at least 5·10^order. */
  half: boolean;
  /** Nesting depth of the Claudian block. */
  repeat: number;
  /** Value the block stands for. */
  unit: number;
  /** Remainder after the block. */
  next: number;
}

/**
 * Plan one magnitude block for `remainder`.
 *
 * Four or more of the same block fold into the next step: the block is
 * emitted as the subtrahend and the remainder grows by its unit
 * (4000 → M + ⅮↃ).
 */
export function planMagnitudeStep(remainder: number, limit: number): MagnitudeStep {
  let order = 0;
  let power = 1;
  while (power * 10 <= remainder) {
    power *= 10;
    order++;
  }
  const half = remainder >= 5 * power;
  const unit = half ? 5 * power : power;
  const repeat = order - BASE_MAGNITUDE_ORDER + (half ? 1 : 0);
  const correction = remainder >= unit * (limit + 1) ? -2 * unit : 0;
  return { order, half, repeat, unit, next: remainder - (unit + correction) };
}

export function claudianBlock(step: Pick<MagnitudeStep, 'half' | 'repeat'>): string {
  const closing = CLAUDIAN.enclosure.repeat(step.repeat);
  if (step.half) {
    return CLAUDIAN.half + closing;
  }
  const core = step.repeat > 0 ? CLAUDIAN.inner : CLAUDIAN.thousand;
  return CLAUDIAN.hundred.repeat(step.repeat) + core + closing;
}

function renderBlock(step: MagnitudeStep, options: ResolvedEncodeOptions): string {
  const glyph = APOSTROPHUS.get(step.unit);
  if (!options.claudian) {
    if (glyph === undefined) {
      throw new ConfigurationError(
        `Magnitude ${step.unit} has no apostrophus glyph; it needs the \`claudian\` option.`,
        'claudian',
      );
    }
    return glyph;
  }
  // Lowercase Claudian blocks are written with their apostrophus glyph.
  const lowering = !options.uppercase && !options.onlyAscii;
  if (lowering && step.repeat > 0 && glyph !== undefined) {
    return glyph;
  }
  return claudianBlock(step);
}

function emitSymbols(value: number, options: ResolvedEncodeOptions): string[] {
  const limit = maxConsecutive(options.onlyAdditive);
  const threshold = standardThreshold(options.onlyAdditive);
  const buffer: string[] = [];

  let rest = value;
  while (rest >= threshold) {
    if (!options.extended) {
      throw new ConfigurationError(
        `${value} is beyond the standard range; it needs the \`extended\` option.`,
        'extended',
      );
    }
    const step = planMagnitudeStep(rest, limit);
    const block = renderBlock(step, options);
    debug(`encodeRoman: magnitude block ${block}`, {
      order: step.order,
      half: step.half,
      unit: step.unit,
    });
    buffer.push(block);
    rest = step.next;
  }
  emitStandard(buffer, rest, limit);
  return buffer;
}

function postProcess(text: string, options: ResolvedEncodeOptions): string {
  let out = rewrite(text, LIGATURES);
  if (options.onlyAdditive) out = rewrite(out, ADDITIVE_REWRITES);
  if (options.archaic) out = rewrite(out, ARCHAIC_GLYPHS);
  if (options.alternatives) out = rewrite(out, options.alternatives);
  if (options.onlyAscii) out = rewrite(out, UNICODE_TO_ASCII);
  return options.uppercase ? out.toUpperCase() : out.toLowerCase();
}

/**
 * Encode an integer as a Roman numeral.
 *
 * @example
 * ```ts
 * encodeRoman(1666);                      // → 'ⅯⅮⅭⅬⅩⅥ'
 * encodeRoman(1666, { onlyAscii: true }); // → 'MDCLXVI'
 * encodeRoman(4, { onlyAdditive: true }); // → 'ⅡⅡ'
 * encodeRoman(0);                         // → 'N'
 * encodeRoman(40000);                     // → 'ⅭↀↃⅮↃↃ'
 * ```
 *
 * @throws {ConfigurationError} When the options cannot express `num`
 * @throws {InvalidInputError} When `num` is not a safe integer
 */
export function encodeRoman(num: number, options: RomanEncodeOptions = {}): string {
  const resolved = resolveEncodeOptions(options);
  if (!Number.isSafeInteger(num)) {
    throw new InvalidInputError(`Expected a safe integer, got ${num}.`, { input: String(num) });
  }
  if (num < 0 && !resolved.signed) {
    throw new ConfigurationError(`${num} needs the \`signed\` option.`, 'signed');
  }

  const magnitude = Math.abs(num);
  let body: string;
  if (magnitude === 0) {
    if (!resolved.extended) {
      throw new ConfigurationError('0 needs the `extended` option.', 'extended');
    }
    body = ZERO_SYMBOL;
  } else {
    body = emitSymbols(magnitude, resolved).join('');
  }

  const sign = num < 0 ? resolved.negativeSign : '';
  return sign + postProcess(body, resolved);
}
