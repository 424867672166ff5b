import type { CriterionId, SuggestionId } from '../../contracts/scoring.criterionIds';
import type { CriterionResultV1, SuggestionV1 } from '../../contracts/AssessmentOutputV1';
import { suggestion } from './suggestionCatalog';

/**
 * Accumulates one rubric's criteria in evaluation order.
 * Each `award` records exactly one criterion and at most one suggestion.
 */
export class RubricTally {
  readonly criteria: CriterionResultV1[] = [];
  readonly suggestions: SuggestionV1[] = [];

  award(id: CriterionId, label: string, points: number, maxPoints: number, suggestionId?: SuggestionId): void {
    this.criteria.push({ id, label, points, maxPoints });
    if (suggestionId) this.suggestions.push(suggestion(suggestionId));
  }

  get total(): number {
    return this.criteria.reduce((sum, c) => sum + c.points, 0);
  }
}
