import { describe, it, expect } from 'vitest';
import { borderlineLabel } from '../../components/RatingBandLadder';

describe('RatingBandLadder — borderlineLabel', () => {
  it.each<[number, string]>([
    [81, 'borderline A/B'],
    [78, 'borderline A/B'],
    [62, 'borderline B/C'],
    [41, 'borderline C/D'],
  ])('%d → %s', (score, label) => {
    expect(borderlineLabel(score)).toBe(label);
  });

  it.each([100, 83, 70, 50, 37, 0])('%d is not borderline', score => {
    expect(borderlineLabel(score)).toBeNull();
  });
});
