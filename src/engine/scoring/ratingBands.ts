import type { Rating } from '../../contracts/AssessmentOutputV1';

export interface RatingBand {
  rating: Rating;
  /** Inclusive lower bound. */
  minScore: number;
  label: string;
}

/** Highest band first; the last band starts at 0 so the ladder covers 0–100. */
export const RATING_BANDS: readonly RatingBand[] = [
  { rating: 'A', minScore: 80, label: 'Loan-ready' },
  { rating: 'B', minScore: 60, label: 'Strong foundation' },
  { rating: 'C', minScore: 40, label: 'Developing' },
  { rating: 'D', minScore: 0, label: 'Getting started' },
];

export function clampScore(score: number): number {
  return Math.max(0, Math.min(100, Math.round(score)));
}

export function ratingForScore(score: number): Rating {
  const clamped = clampScore(score);
  return RATING_BANDS.find(band => clamped >= band.minScore)?.rating ?? 'D';
}
