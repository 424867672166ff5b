import type { Category, IntakeData, RawIntake } from '../../contracts/AssessmentInputV1';
import type { ScorecardV1 } from '../../contracts/AssessmentOutputV1';
import { parseIntake } from '../schema/IntakeSchemaV1';
import type { RubricTally } from '../scoring/RubricTally';
import { scoreGreenRubric } from '../scoring/greenRubric';
import { scoreSllRubric } from '../scoring/sllRubric';
import { scoreOtherRubric } from '../scoring/otherRubric';
import { clampScore, ratingForScore } from '../scoring/ratingBands';

function runRubric(intake: IntakeData): RubricTally {
  switch (intake.category) {
    case 'green':
      return scoreGreenRubric(intake.data);
    case 'sll':
      return scoreSllRubric(intake.data);
    case 'other':
      return scoreOtherRubric(intake.data);
  }
}

/**
 * Score a validated intake against its category's rubric.
 *
 * Scoring model:
 *   - Each criterion contributes points up to its own maximum.
 *   - Sum, clamp to [0, 100].
 *   - Band: ≥ 80 A, ≥ 60 B, ≥ 40 C, else D.
 */
export function scoreIntake(intake: IntakeData): ScorecardV1 {
  const tally = runRubric(intake);
  const score = clampScore(tally.total);

  const breakdown: Record<string, number> = {};
  for (const criterion of tally.criteria) {
    breakdown[criterion.label] = criterion.points;
  }

  return {
    score,
    rating: ratingForScore(score),
    breakdown,
    criteria: [...tally.criteria],
    suggestions: [...tally.suggestions],
  };
}

/**
 * Validate a raw intake mapping for `category` and score it.
 * @throws IntakeValidationError when the mapping belongs to another category.
 */
export function generateScorecard(category: Category, data: RawIntake): ScorecardV1 {
  return scoreIntake(parseIntake(category, data));
}
