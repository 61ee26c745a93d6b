import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { invertPairs, rewrite } from '../rewrite.js';

describe('rewrite', () => {
  it('applies every pair', () => {
    expect(
      rewrite('river.bend', [
        ['ver', 'ng'],
        ['end', 'and'],
      ]),
    ).toBe('ring.band');
  });

  it('lets later pairs see the output of earlier ones', () => {
    expect(
      rewrite('x-x-x-x', [
        ['x', 'est'],
        ['est', 'test'],
      ]),
    ).toBe('test-test-test-test');
  });

  it('is order-sensitive', () => {
    expect(
      rewrite('ab', [
        ['a', 'b'],
        ['b', 'c'],
      ]),
    ).toBe('cc');
    expect(
      rewrite('ab', [
        ['b', 'c'],
        ['a', 'b'],
      ]),
    ).toBe('bc');
  });

  it('matches multi-character patterns', () => {
    expect(rewrite('x-x-', [['-x-', '.test']])).toBe('x.test');
  });

  it('makes a single pass per pair', () => {
    expect(rewrite('aaa', [['aa', 'a']])).toBe('aa');
  });

  it('returns the text unchanged for an empty table', () => {
    expect(rewrite('ⅩⅠ', [])).toBe('ⅩⅠ');
  });

  it('rejects an empty pattern', () => {
    expect(() => rewrite('abc', [['', 'x']])).toThrow(ConfigurationError);
  });
});

describe('invertPairs', () => {
  it('swaps each pair and keeps the order', () => {
    expect(
      invertPairs([
        ['a', '1'],
        ['b', '2'],
      ]),
    ).toEqual([
      ['1', 'a'],
      ['2', 'b'],
    ]);
  });
});
