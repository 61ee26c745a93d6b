// ============================================================================
// @numerals/core — Bijective Base-k Codec
// ============================================================================
//
// Integers ↔ token sequences in bijective base-k: k non-zero digits, no
// symbol for zero, so every non-negative integer has exactly one spelling
// and there is no leading-zero ambiguity.
//
//   tokens = a..z   →   0:a  25:z  26:aa  27:ab  ...  702:aaa
//
// The only difference from positional notation is the `− 1` after each
// division, undone on decode by adding 1 to every digit but the last.
// ============================================================================

import { ConfigurationError, InvalidInputError } from './errors.js';

/** The 26 lowercase ASCII letters, in order. */
export const DEFAULT_ALPHABET = 'abcdefghijklmnopqrstuvwxyz';

export const DEFAULT_NEGATIVE_SIGN = '-';

/**
 * Check a token alphabet and sign marker.
 *
 * @throws {ConfigurationError} On an empty alphabet, empty or duplicate
 *   tokens, or a sign that equals or occurs inside a token
 */
export function validateTokens(tokens: readonly string[], negativeSign: string): void {
  if (tokens.length === 0) {
    throw new ConfigurationError('At least one token is required.', 'tokens');
  }
  if (negativeSign.length === 0) {
    throw new ConfigurationError('The negative sign must be a non-empty string.', 'negativeSign');
  }
  const seen = new Set<string>();
  for (const token of tokens) {
    if (token.length === 0) {
      throw new ConfigurationError('Tokens must be non-empty strings.', 'tokens');
    }
    if (seen.has(token)) {
      throw new ConfigurationError(`Duplicate token: "${token}".`, 'tokens');
    }
    if (token.includes(negativeSign)) {
      throw new ConfigurationError(
        `Negative sign "${negativeSign}" collides with token "${token}".`,
        'negativeSign',
      );
    }
    seen.add(token);
  }
}

/**
 * Encode an integer as a bijective base-k token sequence, k = `tokens.length`.
 *
 * @example
 * ```ts
 * encodeBijective(161, ['po', 'ta']); // → 'potapopopotata'
 * encodeBijective(-3, ['a', 'b', 'c']); // → '-aa'
 * ```
 */
export function encodeBijective(
  num: number,
  tokens: readonly string[],
  negativeSign: string = DEFAULT_NEGATIVE_SIGN,
): string {
  validateTokens(tokens, negativeSign);
  if (!Number.isSafeInteger(num)) {
    throw new InvalidInputError(`Expected a safe integer, got ${num}.`, { input: String(num) });
  }

  const k = tokens.length;
  const digits: string[] = [];
  let rest = Math.abs(num);
  while (rest >= 0) {
    digits.push(tokens[rest % k]);
    rest = Math.floor(rest / k) - 1;
  }
  digits.reverse();

  const sign = num < 0 ? negativeSign : '';
  return sign + digits.join('');
}

/**
 * Match tokens as suffixes from the end of `body`, first match in list order.
 * Returns the token indexes from least significant up, and whatever prefix
 * no token could end.
 */
function splitTokens(body: string, tokens: readonly string[]): { digits: number[]; rest: string } {
  const digits: number[] = [];
  let rest = body;
  while (rest.length > 0) {
    const index = tokens.findIndex((token) => rest.endsWith(token));
    if (index === -1) break;
    digits.push(index);
    rest = rest.slice(0, rest.length - tokens[index].length);
  }
  return { digits, rest };
}

/**
 * Decode a bijective base-k token sequence.
 *
 * Tokens are matched as suffixes from the end of the text, first match in
 * list order. Alphabets where two tokens can both end a valid text (for
 * example `a` and `ba`) decode deterministically but may not round-trip.
 *
 * @throws {InvalidInputError} On unknown characters, a misplaced sign, an
 *   empty body, or a value outside the safe integer range
 */
export function decodeBijective(
  text: string,
  tokens: readonly string[],
  negativeSign: string = DEFAULT_NEGATIVE_SIGN,
): number {
  validateTokens(tokens, negativeSign);

  let body = text;
  const negative = body.startsWith(negativeSign);
  if (negative) body = body.slice(negativeSign.length);

  if (body.length === 0) {
    throw new InvalidInputError('Nothing to decode.', { input: text });
  }

  const { digits, rest } = splitTokens(body, tokens);
  if (rest.length > 0) {
    // A sign inside the body is only an error where the tokens cannot
    // account for it; tokens may concatenate to the sign text.
    if (body.includes(negativeSign)) {
      throw new InvalidInputError(`Negative sign "${negativeSign}" must lead the text.`, {
        input: text,
        symbol: negativeSign,
      });
    }
    const alphabet = new Set(tokens.flatMap((token) => [...token]));
    const unknown = [...body].find((ch) => !alphabet.has(ch));
    if (unknown !== undefined) {
      throw new InvalidInputError(`Invalid symbol: "${unknown}".`, { input: text, symbol: unknown });
    }
    throw new InvalidInputError(`No token ends "${rest}".`, { input: text });
  }

  const k = tokens.length;
  let num = 0;
  let weight = 1;
  for (let position = 0; position < digits.length; position++) {
    const offset = position === 0 ? 0 : 1;
    num += (digits[position] + offset) * weight;
    weight *= k;
    if (!Number.isSafeInteger(num)) {
      throw new InvalidInputError('Decoded value exceeds the safe integer range.', { input: text });
    }
  }

  return negative && num !== 0 ? -num : num;
}

/**
 * Check validity without throwing. A bad alphabet still throws.
 */
export function isValidBijective(
  text: string,
  tokens: readonly string[],
  negativeSign: string = DEFAULT_NEGATIVE_SIGN,
): boolean {
  validateTokens(tokens, negativeSign);
  try {
    decodeBijective(text, tokens, negativeSign);
    return true;
  } catch (e) {
    if (e instanceof InvalidInputError) return false;
    throw e;
  }
}

// ---------------------------------------------------------------------------
// Letters ("spreadsheet column" numbering)
// ---------------------------------------------------------------------------

/** An alphabet given as a string, or as a list of single characters. */
export type Alphabet = string | readonly string[];

function lettersOf(alphabet: Alphabet): string[] {
  const letters = typeof alphabet === 'string' ? Array.from(alphabet) : [...alphabet];
  for (const letter of letters) {
    if (Array.from(letter).length !== 1) {
      throw new ConfigurationError(`Alphabet entries must be single characters: "${letter}".`, 'alphabet');
    }
  }
  return letters;
}

/**
 * Encode an integer as letters, zero being the first letter.
 *
 * @example
 * ```ts
 * encodeLetters(23);   // → 'x'
 * encodeLetters(26);   // → 'aa'
 * encodeLetters(1983); // → 'bxh'
 * ```
 */
export function encodeLetters(
  num: number,
  alphabet: Alphabet = DEFAULT_ALPHABET,
  negativeSign: string = DEFAULT_NEGATIVE_SIGN,
): string {
  return encodeBijective(num, lettersOf(alphabet), negativeSign);
}

export function decodeLetters(
  text: string,
  alphabet: Alphabet = DEFAULT_ALPHABET,
  negativeSign: string = DEFAULT_NEGATIVE_SIGN,
): number {
  return decodeBijective(text, lettersOf(alphabet), negativeSign);
}

export function isValidLetters(
  text: string,
  alphabet: Alphabet = DEFAULT_ALPHABET,
  negativeSign: string = DEFAULT_NEGATIVE_SIGN,
): boolean {
  return isValidBijective(text, lettersOf(alphabet), negativeSign);
}
