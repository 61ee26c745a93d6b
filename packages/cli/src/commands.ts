// ============================================================================
// @numerals/cli — Command dispatch
// ============================================================================
// Commands:
//   numeral roman     <int>  [--ascii] [--additive] [--no-extended] [--lower]
//                            [--apostrophus] [--archaic] [--unsigned] [--sign s]
//   numeral unroman   <text> [--strict] [--additive-grammar] [--sign s]
//   numeral letters   <int>  [--alphabet chars] [--sign s]
//   numeral unletters <text> [--alphabet chars] [--sign s]
//   numeral tokens    <int>  --tokens a,b,... [--sign s]
//   numeral untokens  <text> --tokens a,b,... [--sign s]
//   numeral selftest
// ============================================================================

import {
  ADDITIVE_GRAMMAR,
  DEFAULT_ALPHABET,
  NumeralError,
  decodeBijective,
  decodeLetters,
  decodeRoman,
  encodeBijective,
  encodeLetters,
  encodeRoman,
} from '@numerals/core';
import type { RomanDecodeOptions, RomanEncodeOptions } from '@numerals/core';
import { runSelfTest } from './selftest.js';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: numeral <command> [args]

Commands:
  roman <int>        Encode an integer as a Roman numeral
      --ascii          ASCII letters only
      --additive       no subtractive pairs (IIII, VIIII)
      --no-extended    refuse values outside 1..3999
      --lower          lowercase output
      --apostrophus    single glyphs for large Claudian blocks
      --archaic        archaic glyphs for 6 and 50
      --unsigned       refuse negative values
      --sign <s>       negative sign (default "-")
  unroman <text>     Decode a Roman numeral
      --strict         reject non-canonical numerals
      --additive-grammar  canonical form is additive notation
  letters <int>      Encode with letters (a, b, ..., z, aa, ...)
  unletters <text>   Decode letters
      --alphabet <chars>  alphabet to use (default a-z)
  tokens <int>       Encode in bijective base-k over custom tokens
  untokens <text>    Decode bijective base-k text
      --tokens <a,b,...>  comma-separated tokens (required)
  selftest           Check the documented examples
  help               Show this text`;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function getFlag(args: readonly string[], name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  if (idx !== -1 && idx + 1 < args.length) return args[idx + 1];
  return undefined;
}

function hasFlag(args: readonly string[], name: string): boolean {
  return args.includes(`--${name}`);
}

function requireTarget(args: readonly string[], what: string): string {
  const target = args[1];
  if (target === undefined || target.startsWith('--')) {
    throw new UsageError(`${args[0]} needs ${what}`);
  }
  return target;
}

function parseInteger(raw: string): number {
  if (!/^[-+]?\d+$/.test(raw)) throw new UsageError(`not an integer: ${raw}`);
  return Number(raw);
}

function signOption(args: readonly string[]): { negativeSign?: string } {
  const sign = getFlag(args, 'sign');
  return sign === undefined ? {} : { negativeSign: sign };
}

function romanEncodeOptions(args: readonly string[]): RomanEncodeOptions {
  return {
    onlyAscii: hasFlag(args, 'ascii'),
    onlyAdditive: hasFlag(args, 'additive'),
    extended: !hasFlag(args, 'no-extended'),
    uppercase: !hasFlag(args, 'lower'),
    claudian: !hasFlag(args, 'apostrophus'),
    archaic: hasFlag(args, 'archaic'),
    signed: !hasFlag(args, 'unsigned'),
    ...signOption(args),
  };
}

function romanDecodeOptions(args: readonly string[]): RomanDecodeOptions {
  return {
    strict: hasFlag(args, 'strict'),
    ...(hasFlag(args, 'additive-grammar') ? { grammar: ADDITIVE_GRAMMAR } : {}),
    ...signOption(args),
  };
}

function alphabetOf(args: readonly string[]): string {
  return getFlag(args, 'alphabet') ?? DEFAULT_ALPHABET;
}

function tokensOf(args: readonly string[]): string[] {
  const raw = getFlag(args, 'tokens');
  if (raw === undefined) throw new UsageError(`${args[0]} needs --tokens a,b,...`);
  return raw.split(',');
}

function selfTest(io: CliIO): number {
  const results = runSelfTest();
  let failed = 0;
  for (const result of results) {
    if (result.passed) {
      io.out(`  ✓ ${result.label}`);
    } else {
      failed++;
      io.out(`  ✗ ${result.label}: ${result.detail ?? 'failed'}`);
    }
  }
  io.out(`${results.length - failed} passed, ${failed} failed`);
  return failed === 0 ? EXIT_OK : EXIT_FAILURE;
}

function dispatch(args: readonly string[], io: CliIO): number {
  const command = args[0];
  switch (command) {
    case 'roman':
      io.out(encodeRoman(parseInteger(requireTarget(args, 'an integer')), romanEncodeOptions(args)));
      return EXIT_OK;
    case 'unroman':
      io.out(String(decodeRoman(requireTarget(args, 'a numeral'), romanDecodeOptions(args))));
      return EXIT_OK;
    case 'letters':
      io.out(
        encodeLetters(parseInteger(requireTarget(args, 'an integer')), alphabetOf(args), getFlag(args, 'sign')),
      );
      return EXIT_OK;
    case 'unletters':
      io.out(String(decodeLetters(requireTarget(args, 'text'), alphabetOf(args), getFlag(args, 'sign'))));
      return EXIT_OK;
    case 'tokens':
      io.out(
        encodeBijective(parseInteger(requireTarget(args, 'an integer')), tokensOf(args), getFlag(args, 'sign')),
      );
      return EXIT_OK;
    case 'untokens':
      io.out(String(decodeBijective(requireTarget(args, 'text'), tokensOf(args), getFlag(args, 'sign'))));
      return EXIT_OK;
    case 'selftest':
      return selfTest(io);
    case undefined:
    case 'help':
    case '--help':
      io.out(USAGE);
      return EXIT_OK;
    default:
      throw new UsageError(`unknown command: ${command}`);
  }
}

/**
 * Run one CLI invocation and return its exit code.
 * Library errors go to `io.err` as `Error: <name>: <message>`.
 */
export function runCli(argv: readonly string[], io: CliIO): number {
  try {
    return dispatch(argv, io);
  } catch (error) {
    if (error instanceof UsageError) {
      io.err(`Error: ${error.message}`);
      io.err(USAGE);
      return EXIT_USAGE;
    }
    if (error instanceof NumeralError) {
      io.err(`Error: ${error.name}: ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  }
}
