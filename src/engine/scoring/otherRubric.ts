import type { OtherIntake } from '../../contracts/AssessmentInputV1';
import { CRITERION_IDS, SUGGESTION_IDS } from '../../contracts/scoring.criterionIds';
import { countKeywordMatches } from '../utils/fields';
import { RubricTally } from './RubricTally';
import { DEFAULT_READINESS_SUGGESTIONS, suggestion } from './suggestionCatalog';

export const CERTIFICATION_KEYWORDS: readonly string[] = ['iso', 'bis', 'fssai', 'gmp', 'haccp', 'ohsas', 'sa8000'];

export const INTEREST_KEYWORDS: readonly string[] = ['water', 'energy', 'waste', 'solar', 'recycle', 'carbon', 'green'];

/**
 * ESG readiness rubric, max 100. Every criterion has a non-zero floor except
 * documentation, and the scorecard always carries at least one suggestion.
 */
export function scoreOtherRubric(data: OtherIntake): RubricTally {
  const tally = new RubricTally();

  // Business description (20)
  const businessInfo = data.businessInfo;
  const clarityPoints = businessInfo.length > 100 ? 20 : businessInfo.length > 30 ? 10 : 5;
  tally.award(CRITERION_IDS.BUSINESS_CLARITY, 'Business Clarity', clarityPoints, 20);

  // Existing documentation / certifications (40)
  const docs = data.existingDocs ?? '';
  const docMatches = countKeywordMatches(docs, CERTIFICATION_KEYWORDS);
  if (docMatches >= 2) {
    tally.award(CRITERION_IDS.DOCUMENTATION, 'Documentation', 40, 40);
  } else if (docMatches === 1 || docs.length > 30) {
    tally.award(CRITERION_IDS.DOCUMENTATION, 'Documentation', 20, 40);
  } else {
    tally.award(CRITERION_IDS.DOCUMENTATION, 'Documentation', 0, 40, SUGGESTION_IDS.DOCUMENT_PROCESSES);
  }

  // Sustainability interest areas (40)
  const interestMatches = countKeywordMatches(data.interestAreas ?? '', INTEREST_KEYWORDS);
  if (interestMatches >= 3) {
    tally.award(CRITERION_IDS.SUSTAINABILITY_INTEREST, 'Sustainability Interest', 40, 40);
  } else if (interestMatches >= 1) {
    tally.award(CRITERION_IDS.SUSTAINABILITY_INTEREST, 'Sustainability Interest', 20, 40);
  } else {
    tally.award(CRITERION_IDS.SUSTAINABILITY_INTEREST, 'Sustainability Interest', 10, 40, SUGGESTION_IDS.QUICK_WINS);
  }

  if (tally.suggestions.length === 0) {
    tally.suggestions.push(...DEFAULT_READINESS_SUGGESTIONS.map(suggestion));
  }

  return tally;
}
