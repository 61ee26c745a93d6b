// ============================================================================
// @numerals/core — Strict Roman Grammar
// ============================================================================
//
// A canonical numeral is a sequence of fixed groups, highest first. Each group
// is one of:
//
//   unit ten          e.g. CM, XC, IX        (subtractive groups only)
//   unit five         e.g. CD, XL, IV        (subtractive groups only)
//   five? unit{0,n}   e.g. DCCC, LX, III, ''
//
// Groups are matched left to right; every text the standard grammar accepts
// has exactly one parse, so no backtracking is needed.
// ============================================================================

export interface GrammarGroup {
  readonly unit: string;
  readonly five?: string;
  readonly ten?: string;
  readonly maxRepeat: number;
  readonly subtractive: boolean;
}

export interface RomanGrammar {
  readonly groups: readonly GrammarGroup[];
}

/** Canonical subtractive numerals, 1–3999. */
export const STANDARD_GRAMMAR: RomanGrammar = Object.freeze({
  groups: Object.freeze([
    { unit: 'M', maxRepeat: 3, subtractive: false },
    { unit: 'C', five: 'D', ten: 'M', maxRepeat: 3, subtractive: true },
    { unit: 'X', five: 'L', ten: 'C', maxRepeat: 3, subtractive: true },
    { unit: 'I', five: 'V', ten: 'X', maxRepeat: 3, subtractive: true },
  ]),
});

/** Additive-only numerals (IIII, VIIII, ...), 1–4999. */
export const ADDITIVE_GRAMMAR: RomanGrammar = Object.freeze({
  groups: Object.freeze([
    { unit: 'M', maxRepeat: 4, subtractive: false },
    { unit: 'C', five: 'D', maxRepeat: 4, subtractive: false },
    { unit: 'X', five: 'L', maxRepeat: 4, subtractive: false },
    { unit: 'I', five: 'V', maxRepeat: 4, subtractive: false },
  ]),
});

/** Returns the position after the group's match (possibly `pos` itself). */
function matchGroup(text: string, pos: number, group: GrammarGroup): number {
  const { unit, five, ten } = group;

  if (group.subtractive) {
    if (ten !== undefined && text.startsWith(unit + ten, pos)) {
      return pos + unit.length + ten.length;
    }
    if (five !== undefined && text.startsWith(unit + five, pos)) {
      return pos + unit.length + five.length;
    }
  }

  let p = pos;
  if (five !== undefined && text.startsWith(five, p)) {
    p += five.length;
  }
  for (let n = 0; n < group.maxRepeat && text.startsWith(unit, p); n++) {
    p += unit.length;
  }
  return p;
}

/**
 * Check a canonical (uppercase ASCII) numeral against a grammar.
 * The empty string never matches.
 */
export function matchGrammar(text: string, grammar: RomanGrammar = STANDARD_GRAMMAR): boolean {
  if (text.length === 0) return false;

  let pos = 0;
  for (const group of grammar.groups) {
    pos = matchGroup(text, pos, group);
  }
  return pos === text.length;
}
