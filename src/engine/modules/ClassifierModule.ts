import type { Category, OnboardingAnswers } from '../../contracts/AssessmentInputV1';

/** Green score at or above which the user is routed to the green loan track. */
export const GREEN_THRESHOLD = 3;

/** SLL score at or above which the user is routed to the sustainability-linked track. */
export const SLL_THRESHOLD = 2;

export interface OnboardingScores {
  greenScore: number;
  /** May be fractional: significant energy use adds 0.5. */
  sllScore: number;
}

export function scoreOnboarding(answers: OnboardingAnswers): OnboardingScores {
  let greenScore = 0;
  let sllScore = 0;

  // Environmental signals
  if (answers.isManufacturing) greenScore += 1;
  if (answers.consumesSignificantEnergy) {
    greenScore += 1;
    sllScore += 0.5;
  }
  if (answers.tracksEnvMetrics) greenScore += 2;
  if (answers.measuresEmissions) greenScore += 2;

  // Social & governance signals
  if (answers.hasSustainabilityGoals) sllScore += 2;
  if (answers.appliedForEsgLoan) sllScore += 1;
  if (answers.hasEmployeePolicies) sllScore += 1;

  return { greenScore, sllScore };
}

/**
 * Route a user to one assessment track from the seven onboarding answers.
 * Green takes precedence over SLL when both thresholds are met.
 */
export function classifyUser(answers: OnboardingAnswers): Category {
  const { greenScore, sllScore } = scoreOnboarding(answers);
  if (greenScore >= GREEN_THRESHOLD) return 'green';
  if (sllScore >= SLL_THRESHOLD) return 'sll';
  return 'other';
}
