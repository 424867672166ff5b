import type { Category, OnboardingAnswers, RawIntake } from '../contracts/AssessmentInputV1';
import type { AssessmentResultV1, PipelineOutputV1 } from '../contracts/AssessmentOutputV1';
import { ENGINE_VERSION, CONTRACT_VERSION } from '../contracts/versions';
import { classifyUser } from './modules/ClassifierModule';
import { estimateCarbonV1 } from './modules/CarbonEstimatorModule';
import { scoreIntake } from './modules/ScorecardModule';
import { parseIntake } from './schema/IntakeSchemaV1';

export interface AssessmentInput {
  answers: OnboardingAnswers;
  intake: RawIntake;
}

/**
 * Validate → estimate → score for an already-classified user.
 * Only the green intake carries consumption figures; other categories
 * estimate to zero.
 */
export function runIntakeAssessment(category: Category, rawIntake: RawIntake): AssessmentResultV1 {
  const intake = parseIntake(category, rawIntake);
  const carbonEstimate = estimateCarbonV1(intake.data);
  const scorecard = scoreIntake(intake);

  return {
    meta: { engineVersion: ENGINE_VERSION, contractVersion: CONTRACT_VERSION },
    category,
    intake,
    carbonEstimate,
    scorecard,
  };
}

/** Full pipeline: classify from onboarding answers, then assess the intake. */
export function runAssessment(input: AssessmentInput): AssessmentResultV1 {
  return runIntakeAssessment(classifyUser(input.answers), input.intake);
}

export function toPipelineOutput(result: AssessmentResultV1): PipelineOutputV1 {
  const { carbonEstimate, scorecard } = result;
  return {
    category: result.category,
    carbon_estimate: {
      value: carbonEstimate.estimatedCarbon,
      breakdown: { ...carbonEstimate.breakdown },
      unit: carbonEstimate.unit,
    },
    scorecard: {
      score: scorecard.score,
      rating: scorecard.rating,
      breakdown: { ...scorecard.breakdown },
      suggestions: scorecard.suggestions.map(({ text, icon }) => ({ text, icon })),
    },
  };
}
