import { describe, it, expect } from 'vitest';
import { classifyUser, scoreOnboarding } from '../modules/ClassifierModule';
import { NO_ANSWERS, ONBOARDING_QUESTION_IDS } from '../schema/OnboardingSchemaV1';
import type { OnboardingAnswers } from '../../contracts/AssessmentInputV1';

/** Every one of the 128 combinations of the seven answers. */
function allAnswerCombinations(): OnboardingAnswers[] {
  const combos: OnboardingAnswers[] = [];
  for (let mask = 0; mask < 2 ** ONBOARDING_QUESTION_IDS.length; mask++) {
    const answers: OnboardingAnswers = { ...NO_ANSWERS };
    ONBOARDING_QUESTION_IDS.forEach((id, bit) => {
      answers[id] = (mask & (1 << bit)) !== 0;
    });
    combos.push(answers);
  }
  return combos;
}

describe('ClassifierModule — scoreOnboarding', () => {
  it('all answers false → both scores 0', () => {
    expect(scoreOnboarding(NO_ANSWERS)).toEqual({ greenScore: 0, sllScore: 0 });
  });

  it('significant energy use counts towards both tracks', () => {
    expect(scoreOnboarding({ ...NO_ANSWERS, consumesSignificantEnergy: true })).toEqual({ greenScore: 1, sllScore: 0.5 });
  });

  it('all answers true → green 6, sll 4.5', () => {
    const all = { ...NO_ANSWERS };
    for (const id of ONBOARDING_QUESTION_IDS) all[id] = true;
    expect(scoreOnboarding(all)).toEqual({ greenScore: 6, sllScore: 4.5 });
  });
});

describe('ClassifierModule — classifyUser', () => {
  it('all answers false → other', () => {
    expect(classifyUser(NO_ANSWERS)).toBe('other');
  });

  it('manufacturing + tracks metrics + measures emissions → green (score 5)', () => {
    const answers = { ...NO_ANSWERS, isManufacturing: true, tracksEnvMetrics: true, measuresEmissions: true };
    expect(scoreOnboarding(answers).greenScore).toBe(5);
    expect(classifyUser(answers)).toBe('green');
  });

  it('sustainability goals + ESG loan → sll (score 3)', () => {
    const answers = { ...NO_ANSWERS, hasSustainabilityGoals: true, appliedForEsgLoan: true };
    expect(scoreOnboarding(answers)).toEqual({ greenScore: 0, sllScore: 3 });
    expect(classifyUser(answers)).toBe('sll');
  });

  it('green wins when both thresholds are met', () => {
    const answers = { ...NO_ANSWERS, tracksEnvMetrics: true, measuresEmissions: true, hasSustainabilityGoals: true };
    expect(classifyUser(answers)).toBe('green');
  });

  it('green score of exactly 3 is enough', () => {
    expect(classifyUser({ ...NO_ANSWERS, isManufacturing: true, tracksEnvMetrics: true })).toBe('green');
  });

  it('manufacturing + energy (green 2) stays below the green threshold', () => {
    expect(classifyUser({ ...NO_ANSWERS, isManufacturing: true, consumesSignificantEnergy: true })).toBe('other');
  });

  it('energy + ESG loan + employee policies reaches sll 2.5', () => {
    const answers = { ...NO_ANSWERS, consumesSignificantEnergy: true, appliedForEsgLoan: true, hasEmployeePolicies: true };
    expect(scoreOnboarding(answers).sllScore).toBe(2.5);
    expect(classifyUser(answers)).toBe('sll');
  });

  it('energy + ESG loan alone (sll 1.5) → other', () => {
    expect(classifyUser({ ...NO_ANSWERS, consumesSignificantEnergy: true, appliedForEsgLoan: true })).toBe('other');
  });

  it('every combination maps to exactly one known category, deterministically', () => {
    const combos = allAnswerCombinations();
    expect(combos).toHaveLength(128);
    for (const answers of combos) {
      const category = classifyUser(answers);
      expect(['green', 'sll', 'other']).toContain(category);
      expect(classifyUser({ ...answers })).toBe(category);
    }
  });

  it('every combination agrees with the threshold rule', () => {
    for (const answers of allAnswerCombinations()) {
      const { greenScore, sllScore } = scoreOnboarding(answers);
      const expected = greenScore >= 3 ? 'green' : sllScore >= 2 ? 'sll' : 'other';
      expect(classifyUser(answers)).toBe(expected);
    }
  });
});
