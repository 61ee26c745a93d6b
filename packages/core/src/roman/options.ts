// ============================================================================
// @numerals/core — Roman Codec Options
// ============================================================================

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import type { RewriteTable } from '../rewrite.js';
import { STANDARD_GRAMMAR } from './grammar.js';
import type { RomanGrammar } from './grammar.js';
import { ROMAN_CHARACTERS } from './tables.js';

/**
 * Options for {@link encodeRoman}. Every field is optional.
 */
export interface RomanEncodeOptions {
  /** Transliterate to plain ASCII letters. Default `false`. */
  onlyAscii?: boolean;
  /** Never use subtractive pairs; allow four repeats. Default `false`. */
  onlyAdditive?: boolean;
  /** Allow zero and values beyond the standard range. Default `true`. */
  extended?: boolean;
  /** Default `true`. */
  uppercase?: boolean;
  /** Render large numbers in Claudian notation rather than apostrophus glyphs. Default `true`. */
  claudian?: boolean;
  /** Use the archaic ↅ (6) and ↆ (50) glyphs. Default `false`. */
  archaic?: boolean;
  /** Extra substitutions applied after the archaic pass. */
  alternatives?: RewriteTable;
  /** Allow negative numbers. Default `true`. */
  signed?: boolean;
  /** Default `"-"`. */
  negativeSign?: string;
}

/**
 * Options for {@link decodeRoman}. Every field is optional.
 */
export interface RomanDecodeOptions {
  /** Reject anything the grammar does not accept. Default `false`. */
  strict?: boolean;
  /** Grammar used in strict mode. Default {@link STANDARD_GRAMMAR}. */
  grammar?: RomanGrammar;
  /** Default `"-"`. */
  negativeSign?: string;
  /** The substitutions passed to the encoder, if any; applied in reverse. */
  alternatives?: RewriteTable;
}

const rewriteTableSchema = z.array(z.tuple([z.string().min(1), z.string()]));

const grammarSchema = z.object({
  groups: z.array(
    z.object({
      unit: z.string().min(1),
      five: z.string().min(1).optional(),
      ten: z.string().min(1).optional(),
      maxRepeat: z.number().int().nonnegative(),
      subtractive: z.boolean(),
    }),
  ),
});

export const romanEncodeOptionsSchema = z
  .object({
    onlyAscii: z.boolean().default(false),
    onlyAdditive: z.boolean().default(false),
    extended: z.boolean().default(true),
    uppercase: z.boolean().default(true),
    claudian: z.boolean().default(true),
    archaic: z.boolean().default(false),
    alternatives: rewriteTableSchema.optional(),
    signed: z.boolean().default(true),
    negativeSign: z.string().min(1).default('-'),
  })
  .strict();

export const romanDecodeOptionsSchema = z
  .object({
    strict: z.boolean().default(false),
    grammar: grammarSchema.default(() => ({ groups: [...STANDARD_GRAMMAR.groups] })),
    negativeSign: z.string().min(1).default('-'),
    alternatives: rewriteTableSchema.optional(),
  })
  .strict();

export type ResolvedEncodeOptions = z.output<typeof romanEncodeOptionsSchema>;
export type ResolvedDecodeOptions = z.output<typeof romanDecodeOptionsSchema>;

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options: unknown): T {
  const result = schema.safeParse(options);
  if (!result.success) {
    const issue = result.error.issues[0];
    const option = issue?.path.join('.') || undefined;
    throw new ConfigurationError(
      `Invalid option${option ? ` "${option}"` : ''}: ${issue?.message ?? 'unknown'}.`,
      option,
    );
  }
  return result.data;
}

/**
 * The sign must not be confusable with a numeral.
 *
 * @throws {ConfigurationError}
 */
export function validateRomanSign(negativeSign: string): void {
  for (const ch of negativeSign.toUpperCase()) {
    if (ROMAN_CHARACTERS.has(ch)) {
      throw new ConfigurationError(
        `Negative sign "${negativeSign}" contains the numeral symbol "${ch}".`,
        'negativeSign',
      );
    }
  }
}

export function resolveEncodeOptions(options: RomanEncodeOptions = {}): ResolvedEncodeOptions {
  const resolved = parseWith(romanEncodeOptionsSchema, options);
  validateRomanSign(resolved.negativeSign);
  return resolved;
}

export function resolveDecodeOptions(options: RomanDecodeOptions = {}): ResolvedDecodeOptions {
  const resolved = parseWith(romanDecodeOptionsSchema, options);
  validateRomanSign(resolved.negativeSign);
  return resolved;
}
