// ============================================================================
// @numerals/cli — Self-test battery
// ============================================================================
//
// Documented examples, checked against the live codecs. `numeral selftest`
// prints one line per check and exits non-zero if any fails.
// ============================================================================

import {
  ConfigurationError,
  FormatError,
  UnsupportedError,
  decodeBijective,
  decodeLetters,
  decodeRoman,
  encodeBijective,
  encodeLetters,
  encodeRoman,
} from '@numerals/core';

type ErrorClass = new (...args: never[]) => Error;

export type SelfTestCase =
  | { label: string; run: () => unknown; expected: unknown }
  | { label: string; run: () => unknown; throws: ErrorClass };

export interface SelfTestResult {
  label: string;
  passed: boolean;
  detail?: string;
}

const PO_TA = ['po', 'ta'];

export const SELF_TEST_CASES: readonly SelfTestCase[] = [
  {
    label: 'encodeBijective 0..7 over (po, ta)',
    run: () => [0, 1, 2, 3, 4, 5, 6, 7].map((n) => encodeBijective(n, PO_TA)),
    expected: ['po', 'ta', 'popo', 'pota', 'tapo', 'tata', 'popopo', 'popota'],
  },
  {
    label: 'decodeBijective potapopopotata',
    run: () => decodeBijective('potapopopotata', PO_TA),
    expected: 161,
  },
  { label: 'encodeLetters 23', run: () => encodeLetters(23), expected: 'x' },
  { label: 'encodeLetters 26', run: () => encodeLetters(26), expected: 'aa' },
  { label: 'encodeLetters 1983', run: () => encodeLetters(1983), expected: 'bxh' },
  { label: 'decodeLetters bxh', run: () => decodeLetters('bxh'), expected: 1983 },
  {
    label: 'encodeRoman 1666 (ASCII)',
    run: () => encodeRoman(1666, { onlyAscii: true }),
    expected: 'MDCLXVI',
  },
  {
    label: 'encodeRoman 0..12',
    run: () => Array.from({ length: 13 }, (_, n) => encodeRoman(n)),
    expected: ['N', 'Ⅰ', 'Ⅱ', 'Ⅲ', 'Ⅳ', 'Ⅴ', 'Ⅵ', 'Ⅶ', 'Ⅷ', 'Ⅸ', 'Ⅹ', 'Ⅺ', 'Ⅻ'],
  },
  {
    label: 'encodeRoman 16384 (ASCII)',
    run: () => encodeRoman(16384, { onlyAscii: true }),
    expected: 'CCDODOMCCCLXXXIV',
  },
  { label: 'encodeRoman 99', run: () => encodeRoman(99), expected: 'ⅬⅩⅬⅨ' },
  { label: 'encodeRoman 40000', run: () => encodeRoman(40000), expected: 'ⅭↀↃⅮↃↃ' },
  {
    label: 'encodeRoman 4 (additive)',
    run: () => encodeRoman(4, { onlyAdditive: true, onlyAscii: true }),
    expected: 'IIII',
  },
  { label: 'decodeRoman MDCLXVI', run: () => decodeRoman('MDCLXVI'), expected: 1666 },
  { label: 'decodeRoman IC', run: () => decodeRoman('IC'), expected: 99 },
  { label: 'decodeRoman IIM', run: () => decodeRoman('IIM'), expected: 998 },
  { label: 'decodeRoman VL', run: () => decodeRoman('VL'), expected: 45 },
  { label: 'decodeRoman MMMMMM', run: () => decodeRoman('MMMMMM'), expected: 6000 },
  {
    label: 'encodeRoman -5 unsigned',
    run: () => encodeRoman(-5, { signed: false }),
    throws: ConfigurationError,
  },
  {
    label: 'encodeRoman 0 without extended',
    run: () => encodeRoman(0, { extended: false }),
    throws: ConfigurationError,
  },
  {
    label: 'decodeRoman MMMMMM (strict)',
    run: () => decodeRoman('MMMMMM', { strict: true }),
    throws: FormatError,
  },
  { label: 'decodeRoman ⅭↀↃ', run: () => decodeRoman('ⅭↀↃ'), throws: UnsupportedError },
];

function describeValue(value: unknown): string {
  return JSON.stringify(value) ?? String(value);
}

function runCase(testCase: SelfTestCase): SelfTestResult {
  const { label } = testCase;
  if ('throws' in testCase) {
    try {
      const value = testCase.run();
      return { label, passed: false, detail: `expected ${testCase.throws.name}, got ${describeValue(value)}` };
    } catch (e) {
      if (e instanceof testCase.throws) return { label, passed: true };
      const name = e instanceof Error ? e.name : String(e);
      return { label, passed: false, detail: `expected ${testCase.throws.name}, got ${name}` };
    }
  }

  try {
    const actual = describeValue(testCase.run());
    const expected = describeValue(testCase.expected);
    if (actual === expected) return { label, passed: true };
    return { label, passed: false, detail: `expected ${expected}, got ${actual}` };
  } catch (e) {
    const message = e instanceof Error ? `${e.name}: ${e.message}` : String(e);
    return { label, passed: false, detail: `threw ${message}` };
  }
}

/**
 * Run every case and report results in order.
 */
export function runSelfTest(cases: readonly SelfTestCase[] = SELF_TEST_CASES): SelfTestResult[] {
  return cases.map(runCase);
}
