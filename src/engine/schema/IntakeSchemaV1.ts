/**
 * Intake validation.
 *
 * Raw form data is accepted leniently (blank numbers read as 0, blank text as
 * absent) but must belong to the declared category: a field owned by another
 * category's intake is a caller error, reported per field.
 */

import { z } from 'zod';
import { CATEGORIES } from '../../contracts/AssessmentInputV1';
import type {
  Category,
  GreenIntake,
  IntakeData,
  OtherIntake,
  RawIntake,
  SllIntake,
} from '../../contracts/AssessmentInputV1';
import { toNumber, toText } from '../utils/fields';

export const GREEN_INTAKE_FIELDS = [
  'annualElectricityKwh',
  'annualFuelLitres',
  'waterConsumptionLitres',
  'wasteGeneratedKgMonth',
  'renewableEnergyPct',
  'efficiencyEquipment',
  'industryCode',
] as const satisfies ReadonlyArray<keyof GreenIntake>;

export const SLL_INTAKE_FIELDS = [
  'turnoverLast3Years',
  'targetImprovementGoals',
  'numEmployees',
  'workforceDiversityStats',
  'safetyIncidentCount',
  'trainingPrograms',
  'governancePolicies',
] as const satisfies ReadonlyArray<keyof SllIntake>;

export const OTHER_INTAKE_FIELDS = [
  'businessInfo',
  'existingDocs',
  'interestAreas',
] as const satisfies ReadonlyArray<keyof OtherIntake>;

export const INTAKE_FIELDS: Record<Category, readonly string[]> = {
  green: GREEN_INTAKE_FIELDS,
  sll: SLL_INTAKE_FIELDS,
  other: OTHER_INTAKE_FIELDS,
};

export class IntakeValidationError extends Error {
  readonly category: Category;
  /** Offending field names, in submission order. */
  readonly fields: string[];

  constructor(category: Category, fields: string[]) {
    super(`Intake does not match category '${category}': unexpected field(s) ${fields.join(', ')}`);
    this.name = 'IntakeValidationError';
    this.category = category;
    this.fields = fields;
  }
}

// ─── Tolerant field schemas ───────────────────────────────────────────────────

// Counts and quantities are floored at 0.
const lenientNumber = z.unknown().transform(v => Math.max(0, toNumber(v)));
const lenientInteger = z.unknown().transform(v => Math.max(0, Math.trunc(toNumber(v))));
const lenientText = z.unknown().transform(toText);
const optionalText = z.unknown().transform(v => {
  const text = toText(v);
  return text === '' ? undefined : text;
});

const GreenIntakeSchema = z.object({
  annualElectricityKwh: lenientNumber,
  annualFuelLitres: lenientNumber,
  waterConsumptionLitres: lenientNumber,
  wasteGeneratedKgMonth: lenientNumber,
  renewableEnergyPct: lenientNumber,
  efficiencyEquipment: optionalText,
  industryCode: optionalText,
});

const SllIntakeSchema = z.object({
  turnoverLast3Years: lenientText,
  targetImprovementGoals: lenientText,
  numEmployees: lenientInteger,
  workforceDiversityStats: optionalText,
  safetyIncidentCount: lenientInteger,
  trainingPrograms: optionalText,
  governancePolicies: optionalText,
});

const OtherIntakeSchema = z.object({
  businessInfo: lenientText,
  existingDocs: optionalText,
  interestAreas: optionalText,
});

/** Record-level check: reject keys that another category's intake owns. */
function ownedFieldsOnly(category: Category) {
  const foreign = new Map<string, Category>();
  for (const owner of CATEGORIES) {
    if (owner === category) continue;
    for (const field of INTAKE_FIELDS[owner]) foreign.set(field, owner);
  }
  return z.record(z.unknown()).superRefine((raw, ctx) => {
    for (const key of Object.keys(raw)) {
      const owner = foreign.get(key);
      if (owner) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `'${key}' belongs to the ${owner} intake`,
        });
      }
    }
  });
}

const INTAKE_SCHEMAS = {
  green: ownedFieldsOnly('green').pipe(GreenIntakeSchema),
  sll: ownedFieldsOnly('sll').pipe(SllIntakeSchema),
  other: ownedFieldsOnly('other').pipe(OtherIntakeSchema),
};

function unwrap<I, T>(category: Category, result: z.SafeParseReturnType<I, T>): T {
  if (result.success) return result.data;
  const fields = result.error.issues.map(issue => issue.path.join('.') || '(root)');
  throw new IntakeValidationError(category, fields);
}

/**
 * Validate and normalise a raw intake mapping for `category`.
 * @throws IntakeValidationError when the mapping carries another category's fields.
 */
export function parseIntake(category: Category, raw: RawIntake): IntakeData {
  switch (category) {
    case 'green':
      return { category, data: unwrap(category, INTAKE_SCHEMAS.green.safeParse(raw)) };
    case 'sll':
      return { category, data: unwrap(category, INTAKE_SCHEMAS.sll.safeParse(raw)) };
    case 'other':
      return { category, data: unwrap(category, INTAKE_SCHEMAS.other.safeParse(raw)) };
  }
}

/** Flatten a typed intake back to a field → value mapping. */
export function intakeEntries(intake: IntakeData): Array<[string, string | number]> {
  const entries: Array<[string, string | number]> = [];
  for (const field of INTAKE_FIELDS[intake.category]) {
    const value: unknown = Reflect.get(intake.data, field);
    if (typeof value === 'string' || typeof value === 'number') entries.push([field, value]);
  }
  return entries;
}
