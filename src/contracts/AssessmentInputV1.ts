/**
 * AssessmentInputV1 – what the user tells us.
 *
 * Onboarding answers drive the classifier; the intake record is the
 * category-specific form submitted afterwards. The intake is a tagged union
 * so each rubric only ever sees the fields it was written for.
 */

export type Category = 'green' | 'sll' | 'other';

export const CATEGORIES: readonly Category[] = ['green', 'sll', 'other'];

// ─── Onboarding ───────────────────────────────────────────────────────────────

export interface OnboardingAnswers {
  isManufacturing: boolean;
  consumesSignificantEnergy: boolean;
  tracksEnvMetrics: boolean;
  measuresEmissions: boolean;
  hasSustainabilityGoals: boolean;
  appliedForEsgLoan: boolean;
  hasEmployeePolicies: boolean;
}

export type OnboardingQuestionId = keyof OnboardingAnswers;

// ─── Intake variants ──────────────────────────────────────────────────────────

/** Green loan intake: annual consumption figures plus optional context. */
export interface GreenIntake {
  annualElectricityKwh: number;
  annualFuelLitres: number;
  waterConsumptionLitres: number;
  wasteGeneratedKgMonth: number;
  /** Share of energy from renewable sources, 0–100. */
  renewableEnergyPct: number;
  efficiencyEquipment?: string;
  /** NIC / ISIC style sector code, e.g. "3510". */
  industryCode?: string;
}

/** Sustainability-linked loan intake: social and governance evidence. */
export interface SllIntake {
  turnoverLast3Years: string;
  targetImprovementGoals: string;
  numEmployees: number;
  workforceDiversityStats?: string;
  safetyIncidentCount: number;
  trainingPrograms?: string;
  governancePolicies?: string;
}

/** ESG readiness intake for businesses that fit neither loan track yet. */
export interface OtherIntake {
  businessInfo: string;
  existingDocs?: string;
  interestAreas?: string;
}

export type IntakeData =
  | { category: 'green'; data: GreenIntake }
  | { category: 'sll'; data: SllIntake }
  | { category: 'other'; data: OtherIntake };

/** Flat field-name → value mapping as it arrives from a form or JSON body. */
export type RawIntake = Readonly<Record<string, unknown>>;
