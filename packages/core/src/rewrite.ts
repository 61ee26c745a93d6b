// ============================================================================
// @numerals/core — Sequential Literal Rewriting
// ============================================================================
//
// Applies an ordered list of literal (non-regex) substitutions. Each pair
// replaces every occurrence of its pattern before the next pair runs, so a
// later pair sees the output of the earlier ones. One pass, no fixed point.
// ============================================================================

import { ConfigurationError } from './errors.js';

/** A literal `[pattern, replacement]` substitution. */
export type RewritePair = readonly [pattern: string, replacement: string];

/** An ordered list of substitutions, applied first to last. */
export type RewriteTable = readonly RewritePair[];

/**
 * Apply every substitution in `pairs` to `text`, in order.
 *
 * @example
 * ```ts
 * rewrite('x-x-x-x', [['x', 'est'], ['est', 'test']]); // → 'test-test-test-test'
 * rewrite('x-x-', [['-x-', '.test']]);                 // → 'x.test'
 * ```
 *
 * @throws {ConfigurationError} If a pattern is the empty string
 */
export function rewrite(text: string, pairs: RewriteTable): string {
  let out = text;
  for (const [pattern, replacement] of pairs) {
    if (pattern.length === 0) {
      throw new ConfigurationError('Rewrite patterns must be non-empty.', 'pairs');
    }
    out = out.replaceAll(pattern, replacement);
  }
  return out;
}

/**
 * Swap pattern and replacement of every pair, keeping the order.
 */
export function invertPairs(pairs: RewriteTable): RewritePair[] {
  return pairs.map(([pattern, replacement]) => [replacement, pattern] as const);
}
