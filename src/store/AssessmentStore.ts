import { z } from 'zod';
import type { Category, OnboardingAnswers } from '../contracts/AssessmentInputV1';
import type { AssessmentResultV1, Rating } from '../contracts/AssessmentOutputV1';
import { intakeEntries } from '../engine/schema/IntakeSchemaV1';

/** The user's latest assessment. Resubmission replaces it; no history is kept. */
export interface StoredAssessment {
  userId: string;
  category: Category;
  onboardingAnswers?: OnboardingAnswers;
  intake: Record<string, string | number>;
  score: number;
  rating: Rating;
  carbonEstimate: number;
  /** ISO-8601 timestamp of the last save. */
  updatedAt: string;
}

export interface AssessmentStore {
  getLatest(userId: string): Promise<StoredAssessment | null>;
  saveLatest(record: StoredAssessment): Promise<void>;
  clear(userId: string): Promise<void>;
}

export function toStoredAssessment(
  userId: string,
  result: AssessmentResultV1,
  onboardingAnswers?: OnboardingAnswers,
  now: Date = new Date(),
): StoredAssessment {
  return {
    userId,
    category: result.category,
    onboardingAnswers,
    intake: Object.fromEntries(intakeEntries(result.intake)),
    score: result.scorecard.score,
    rating: result.scorecard.rating,
    carbonEstimate: result.carbonEstimate.estimatedCarbon,
    updatedAt: now.toISOString(),
  };
}

export class InMemoryAssessmentStore implements AssessmentStore {
  private readonly records = new Map<string, StoredAssessment>();

  async getLatest(userId: string): Promise<StoredAssessment | null> {
    return this.records.get(userId) ?? null;
  }

  async saveLatest(record: StoredAssessment): Promise<void> {
    this.records.set(record.userId, record);
  }

  async clear(userId: string): Promise<void> {
    this.records.delete(userId);
  }
}

// ─── Browser storage ──────────────────────────────────────────────────────────

/** The subset of the Web Storage API this store needs. */
export type KeyValueStorage = Pick<Storage, 'getItem' | 'setItem' | 'removeItem'>;

const StoredAssessmentSchema = z.object({
  userId: z.string(),
  category: z.enum(['green', 'sll', 'other']),
  onboardingAnswers: z.object({
    isManufacturing: z.boolean(),
    consumesSignificantEnergy: z.boolean(),
    tracksEnvMetrics: z.boolean(),
    measuresEmissions: z.boolean(),
    hasSustainabilityGoals: z.boolean(),
    appliedForEsgLoan: z.boolean(),
    hasEmployeePolicies: z.boolean(),
  }).optional(),
  intake: z.record(z.union([z.string(), z.number()])),
  score: z.number().int().min(0).max(100),
  rating: z.enum(['A', 'B', 'C', 'D']),
  carbonEstimate: z.number().nonnegative(),
  updatedAt: z.string(),
});

export const STORAGE_KEY_PREFIX = 'greenbridge.assessment.';

/**
 * Persists one JSON record per user in Web Storage. A record that fails to
 * parse or validate reads as absent.
 */
export class BrowserAssessmentStore implements AssessmentStore {
  constructor(private readonly storage: KeyValueStorage) {}

  private key(userId: string): string {
    return `${STORAGE_KEY_PREFIX}${userId}`;
  }

  async getLatest(userId: string): Promise<StoredAssessment | null> {
    const raw = this.storage.getItem(this.key(userId));
    if (raw === null) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return null;
    }
    const parsed = StoredAssessmentSchema.safeParse(json);
    if (!parsed.success || parsed.data.userId !== userId) return null;
    return parsed.data;
  }

  async saveLatest(record: StoredAssessment): Promise<void> {
    this.storage.setItem(this.key(record.userId), JSON.stringify(record));
  }

  async clear(userId: string): Promise<void> {
    this.storage.removeItem(this.key(userId));
  }
}
