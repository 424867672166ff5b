import { describe, it, expect } from 'vitest';
import { round2, toNumber } from '../utils/fields';

describe('round2', () => {
  it.each<[number, number]>([
    [0.125, 0.12],
    [0.375, 0.38],
    [17.625, 17.62],
    [41.125, 41.12],
    [2.5, 2.5],
  ])('exact tie %s → %s', (input, expected) => {
    expect(round2(input)).toBe(expected);
  });

  it('rounds non-ties to the nearest cent', () => {
    expect(round2(3.510152)).toBe(3.51);
    expect(round2(0.009808)).toBe(0.01);
    expect(round2(820)).toBe(820);
  });
});

describe('toNumber', () => {
  it('keeps the sign of a numeric string', () => {
    expect(toNumber(' -12.5 ')).toBe(-12.5);
  });

  it('non-finite values read as 0', () => {
    expect(toNumber(Number.NaN)).toBe(0);
    expect(toNumber('Infinity')).toBe(0);
  });
});
