import type { OnboardingQuestionId } from '../contracts/AssessmentInputV1';

export interface OnboardingQuestion {
  id: OnboardingQuestionId;
  icon: string;
  prompt: string;
  hint: string;
}

/** Asked one per step, in this order. */
export const ONBOARDING_QUESTIONS: readonly OnboardingQuestion[] = [
  {
    id: 'isManufacturing',
    icon: '🏭',
    prompt: 'Is your business involved in manufacturing or production?',
    hint: 'Fabrication, processing, assembly or any physical production line.',
  },
  {
    id: 'consumesSignificantEnergy',
    icon: '⚡',
    prompt: 'Does your business consume significant energy (electricity or fuel)?',
    hint: 'For example furnaces, boilers, cold storage or a vehicle fleet.',
  },
  {
    id: 'tracksEnvMetrics',
    icon: '📈',
    prompt: 'Do you track environmental metrics such as energy, water or waste?',
    hint: 'Monthly bills or meter readings count.',
  },
  {
    id: 'measuresEmissions',
    icon: '🌫️',
    prompt: 'Do you measure your carbon emissions?',
    hint: 'Any estimate of your CO₂ footprint, however rough.',
  },
  {
    id: 'hasSustainabilityGoals',
    icon: '🎯',
    prompt: 'Do you have written sustainability or social impact goals?',
    hint: 'Targets for safety, diversity, energy or emissions.',
  },
  {
    id: 'appliedForEsgLoan',
    icon: '🏦',
    prompt: 'Have you applied for, or considered, an ESG-linked loan?',
    hint: 'Green loans, sustainability-linked loans or similar credit lines.',
  },
  {
    id: 'hasEmployeePolicies',
    icon: '👥',
    prompt: 'Do you have formal employee welfare or HR policies?',
    hint: 'Safety procedures, grievance redressal, equal opportunity and so on.',
  },
];
