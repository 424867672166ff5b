import type { ENGINE_VERSION, CONTRACT_VERSION } from './versions';
import type { CriterionId, SuggestionId } from './scoring.criterionIds';
import type { Category, IntakeData } from './AssessmentInputV1';

export interface CarbonBreakdownV1 {
  electricity: number;
  fuel: number;
  water: number;
}

export interface CarbonEstimateV1 {
  /** kgCO2e per year, rounded to 2 dp. */
  estimatedCarbon: number;
  /** Per-source contributions, each rounded to 2 dp on its own. */
  breakdown: CarbonBreakdownV1;
  unit: 'kgCO2e/year';
}

export type Rating = 'A' | 'B' | 'C' | 'D';

export interface SuggestionV1 {
  id: SuggestionId;
  text: string;
  icon: string;
}

export interface CriterionResultV1 {
  id: CriterionId;
  label: string;
  points: number;
  maxPoints: number;
}

export interface ScorecardV1 {
  /** Integer, clamped to 0–100. */
  score: number;
  rating: Rating;
  /** Criterion label → points, in rubric order. */
  breakdown: Record<string, number>;
  criteria: CriterionResultV1[];
  suggestions: SuggestionV1[];
}

export interface AssessmentMetaV1 {
  engineVersion: typeof ENGINE_VERSION;
  contractVersion: typeof CONTRACT_VERSION;
}

export interface AssessmentResultV1 {
  meta: AssessmentMetaV1;
  category: Category;
  intake: IntakeData;
  carbonEstimate: CarbonEstimateV1;
  scorecard: ScorecardV1;
}

/**
 * Shape handed to persistence and the verdict composer over the wire.
 * Field names follow the form/JSON convention rather than the engine's.
 */
export interface PipelineOutputV1 {
  category: Category;
  carbon_estimate: {
    value: number;
    breakdown: CarbonBreakdownV1;
    unit: CarbonEstimateV1['unit'];
  };
  scorecard: {
    score: number;
    rating: Rating;
    breakdown: Record<string, number>;
    suggestions: Array<{ text: string; icon: string }>;
  };
}
