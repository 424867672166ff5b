import { z } from 'zod';
import type { OnboardingAnswers, OnboardingQuestionId, RawIntake } from '../../contracts/AssessmentInputV1';

export const ONBOARDING_QUESTION_IDS = [
  'isManufacturing',
  'consumesSignificantEnergy',
  'tracksEnvMetrics',
  'measuresEmissions',
  'hasSustainabilityGoals',
  'appliedForEsgLoan',
  'hasEmployeePolicies',
] as const satisfies ReadonlyArray<OnboardingQuestionId>;

const TRUTHY_FORM_VALUES: ReadonlySet<string> = new Set(['true', 'on', 'yes', '1']);

/** HTML checkbox semantics: an unchecked box is simply absent. */
const formBoolean = z.unknown().transform(value => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value === 1;
  if (typeof value === 'string') return TRUTHY_FORM_VALUES.has(value.trim().toLowerCase());
  return false;
});

const OnboardingAnswersSchema = z.object({
  isManufacturing: formBoolean,
  consumesSignificantEnergy: formBoolean,
  tracksEnvMetrics: formBoolean,
  measuresEmissions: formBoolean,
  hasSustainabilityGoals: formBoolean,
  appliedForEsgLoan: formBoolean,
  hasEmployeePolicies: formBoolean,
});

export function parseOnboardingAnswers(raw: RawIntake): OnboardingAnswers {
  return OnboardingAnswersSchema.parse(raw);
}

export const NO_ANSWERS: OnboardingAnswers = {
  isManufacturing: false,
  consumesSignificantEnergy: false,
  tracksEnvMetrics: false,
  measuresEmissions: false,
  hasSustainabilityGoals: false,
  appliedForEsgLoan: false,
  hasEmployeePolicies: false,
};
