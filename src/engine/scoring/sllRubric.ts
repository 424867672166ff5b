import type { SllIntake } from '../../contracts/AssessmentInputV1';
import { CRITERION_IDS, SUGGESTION_IDS } from '../../contracts/scoring.criterionIds';
import { countKeywordMatches } from '../utils/fields';
import { RubricTally } from './RubricTally';

export const GOVERNANCE_KEYWORDS: readonly string[] = [
  'anti-corruption',
  'whistleblower',
  'ethics',
  'compliance',
  'audit',
];

/** A quantified target: "15%" or "15 percent". */
const QUANTIFIED_TARGET = /\d+%|\d+ percent/;

/**
 * Sustainability-linked loan rubric (social & governance focus), max 100.
 */
export function scoreSllRubric(data: SllIntake): RubricTally {
  const tally = new RubricTally();

  // Goal clarity (20)
  const goals = data.targetImprovementGoals;
  const isQuantified = QUANTIFIED_TARGET.test(goals.toLowerCase());
  if (isQuantified && goals.length > 30) {
    tally.award(CRITERION_IDS.GOAL_CLARITY, 'Goal Clarity', 20, 20);
  } else if (goals.length > 20) {
    tally.award(CRITERION_IDS.GOAL_CLARITY, 'Goal Clarity', 10, 20);
  } else {
    tally.award(CRITERION_IDS.GOAL_CLARITY, 'Goal Clarity', 0, 20, SUGGESTION_IDS.QUANTIFY_TARGETS);
  }

  // Safety record (25)
  const incidents = data.safetyIncidentCount;
  if (incidents === 0) {
    tally.award(CRITERION_IDS.SAFETY_RECORD, 'Safety Record', 25, 25);
  } else if (incidents <= 2) {
    tally.award(CRITERION_IDS.SAFETY_RECORD, 'Safety Record', 15, 25);
  } else if (incidents <= 5) {
    tally.award(CRITERION_IDS.SAFETY_RECORD, 'Safety Record', 5, 25);
  } else {
    tally.award(CRITERION_IDS.SAFETY_RECORD, 'Safety Record', 0, 25, SUGGESTION_IDS.SAFETY_PROTOCOLS);
  }

  // Diversity tracking (15)
  if ((data.workforceDiversityStats ?? '').length > 5) {
    tally.award(CRITERION_IDS.DIVERSITY_TRACKING, 'Diversity Tracking', 15, 15);
  } else {
    tally.award(CRITERION_IDS.DIVERSITY_TRACKING, 'Diversity Tracking', 0, 15, SUGGESTION_IDS.DIVERSITY_METRICS);
  }

  // Governance policies (20)
  const governance = data.governancePolicies ?? '';
  const governanceMatches = countKeywordMatches(governance, GOVERNANCE_KEYWORDS);
  if (governanceMatches >= 2) {
    tally.award(CRITERION_IDS.GOVERNANCE, 'Governance', 20, 20);
  } else if (governanceMatches === 1 || governance.length > 20) {
    tally.award(CRITERION_IDS.GOVERNANCE, 'Governance', 10, 20);
  } else {
    tally.award(CRITERION_IDS.GOVERNANCE, 'Governance', 0, 20, SUGGESTION_IDS.GOVERNANCE_POLICIES);
  }

  // Training programmes (10)
  if ((data.trainingPrograms ?? '').length > 5) {
    tally.award(CRITERION_IDS.EMPLOYEE_TRAINING, 'Employee Training', 10, 10);
  } else {
    tally.award(CRITERION_IDS.EMPLOYEE_TRAINING, 'Employee Training', 0, 10, SUGGESTION_IDS.TRAINING_PROGRAMS);
  }

  // Organisation scale (10): floor of 5, no suggestion
  const employees = data.numEmployees;
  const scalePoints = employees > 50 ? 10 : employees >= 20 ? 7 : 5;
  tally.award(CRITERION_IDS.ORGANIZATION_SCALE, 'Organization Scale', scalePoints, 10);

  return tally;
}
