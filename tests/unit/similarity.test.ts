import { describe, expect, it } from 'vitest';
import { StringUtils } from '../../src/utils/similarity';

describe('StringUtils.tokenSetRatio', () => {
  it('ignores token order', () => {
    expect(StringUtils.tokenSetRatio('acme hvac', 'hvac acme')).toBe(100);
  });

  it('scores 100 when one token set contains the other', () => {
    expect(StringUtils.tokenSetRatio('acme hvac', 'acme hvac | official site')).toBe(100);
  });

  it('compares joined leftovers when nothing is shared', () => {
    // LCS 8 over lengths 9 + 8: 100 - 100/17, truncated
    expect(StringUtils.tokenSetRatio('acme hvac', 'acmehvac')).toBe(94);
    expect(StringUtils.tokenSetRatio('abc', 'xyz')).toBe(0);
  });

  it('takes the best comparison when both sides keep tokens of their own', () => {
    expect(StringUtils.tokenSetRatio('acme hvac', 'acme plumbing')).toBe(61);
    expect(StringUtils.tokenSetRatio('blue river', 'river blues co')).toBe(83);
    expect(StringUtils.tokenSetRatio('a b c', 'a x y z')).toBe(50);
  });

  it('returns 0 for an empty side', () => {
    expect(StringUtils.tokenSetRatio('', 'acme')).toBe(0);
    expect(StringUtils.tokenSetRatio('acme', '   ')).toBe(0);
  });

  it('is case sensitive', () => {
    expect(StringUtils.tokenSetRatio('ACME', 'acme')).toBe(0);
  });
});

describe('StringUtils.indelDistance', () => {
  it('counts insertions and deletions', () => {
    expect(StringUtils.indelDistance('kitten', 'sitting')).toBe(5);
    expect(StringUtils.indelDistance('', 'abc')).toBe(3);
    expect(StringUtils.indelDistance('same', 'same')).toBe(0);
  });
});
