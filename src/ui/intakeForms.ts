import type { Category, GreenIntake, OtherIntake, SllIntake } from '../contracts/AssessmentInputV1';

export type IntakeFieldKind = 'number' | 'integer' | 'text' | 'textarea';

export interface IntakeFieldDef {
  id: string;
  label: string;
  kind: IntakeFieldKind;
  unit?: string;
  placeholder?: string;
  required?: boolean;
}

export interface IntakeFormView {
  icon: string;
  title: string;
  description: string;
  fields: readonly IntakeFieldDef[];
}

interface IntakeFormDef<T> extends IntakeFormView {
  fields: ReadonlyArray<IntakeFieldDef & { id: keyof T & string }>;
}

export const INTAKE_FORMS: {
  green: IntakeFormDef<GreenIntake>;
  sll: IntakeFormDef<SllIntake>;
  other: IntakeFormDef<OtherIntake>;
} = {
  green: {
    icon: '🌿',
    title: 'Green Loan Assessment',
    description: 'Tell us about your annual resource use. Figures from last year\'s bills are fine.',
    fields: [
      { id: 'annualElectricityKwh', label: 'Annual electricity use', kind: 'number', unit: 'kWh', placeholder: 'e.g. 25000', required: true },
      { id: 'annualFuelLitres', label: 'Annual fuel use (diesel/petrol)', kind: 'number', unit: 'litres', placeholder: 'e.g. 2000', required: true },
      { id: 'waterConsumptionLitres', label: 'Annual water consumption', kind: 'number', unit: 'litres', placeholder: 'e.g. 80000', required: true },
      { id: 'wasteGeneratedKgMonth', label: 'Waste generated', kind: 'number', unit: 'kg/month', placeholder: 'e.g. 300', required: true },
      { id: 'renewableEnergyPct', label: 'Share of renewable energy', kind: 'number', unit: '%', placeholder: 'e.g. 20', required: true },
      { id: 'efficiencyEquipment', label: 'Energy-efficient equipment in use', kind: 'textarea', placeholder: 'e.g. LED lighting, VFD motors, solar water heater' },
      { id: 'industryCode', label: 'NIC industry code', kind: 'text', placeholder: 'e.g. 3510' },
    ],
  },
  sll: {
    icon: '🤝',
    title: 'Sustainability-Linked Loan Assessment',
    description: 'Share your social and governance practices and the targets you want to link to a loan.',
    fields: [
      { id: 'turnoverLast3Years', label: 'Turnover, last 3 years', kind: 'text', placeholder: 'e.g. 2.1 Cr, 2.6 Cr, 3.0 Cr', required: true },
      { id: 'targetImprovementGoals', label: 'Improvement targets', kind: 'textarea', placeholder: 'e.g. Reduce energy use by 15% within three years', required: true },
      { id: 'numEmployees', label: 'Number of employees', kind: 'integer', required: true },
      { id: 'safetyIncidentCount', label: 'Safety incidents last year', kind: 'integer', required: true },
      { id: 'workforceDiversityStats', label: 'Workforce diversity', kind: 'textarea', placeholder: 'e.g. 30% women, 10% from local communities' },
      { id: 'trainingPrograms', label: 'Training programmes', kind: 'textarea', placeholder: 'e.g. Quarterly fire-safety drills' },
      { id: 'governancePolicies', label: 'Governance policies', kind: 'textarea', placeholder: 'e.g. Anti-corruption policy, whistleblower hotline' },
    ],
  },
  other: {
    icon: '🌱',
    title: 'ESG Readiness Check',
    description: 'A short profile to find your first steps towards sustainable finance.',
    fields: [
      { id: 'businessInfo', label: 'Describe your business', kind: 'textarea', placeholder: 'What you make or sell, where, and for whom', required: true },
      { id: 'existingDocs', label: 'Certifications and records you hold', kind: 'textarea', placeholder: 'e.g. ISO 9001, FSSAI licence, utility bills' },
      { id: 'interestAreas', label: 'Sustainability areas of interest', kind: 'textarea', placeholder: 'e.g. solar, water recycling, waste' },
    ],
  },
};

export function intakeForm(category: Category): IntakeFormView {
  return INTAKE_FORMS[category];
}

export const CATEGORY_LABELS: Record<Category, string> = {
  green: 'Green Loan',
  sll: 'Sustainability-Linked Loan',
  other: 'ESG Readiness',
};
