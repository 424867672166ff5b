import { describe, it, expect } from 'vitest';
import {
  BrowserAssessmentStore,
  InMemoryAssessmentStore,
  STORAGE_KEY_PREFIX,
  toStoredAssessment,
  type KeyValueStorage,
  type StoredAssessment,
} from '../AssessmentStore';
import { runIntakeAssessment } from '../../engine/Engine';
import { NO_ANSWERS } from '../../engine/schema/OnboardingSchemaV1';

class MapStorage implements KeyValueStorage {
  readonly items = new Map<string, string>();

  getItem(key: string): string | null {
    return this.items.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.items.set(key, value);
  }

  removeItem(key: string): void {
    this.items.delete(key);
  }
}

const savedAt = new Date('2024-05-01T10:00:00.000Z');

function record(userId: string, businessInfo: string): StoredAssessment {
  return toStoredAssessment(userId, runIntakeAssessment('other', { businessInfo }), NO_ANSWERS, savedAt);
}

describe('toStoredAssessment', () => {
  it('flattens the result into a storable record', () => {
    expect(record('user-1', 'Bakery')).toEqual({
      userId: 'user-1',
      category: 'other',
      onboardingAnswers: NO_ANSWERS,
      intake: { businessInfo: 'Bakery' },
      score: 15,
      rating: 'D',
      carbonEstimate: 0,
      updatedAt: '2024-05-01T10:00:00.000Z',
    });
  });
});

describe('InMemoryAssessmentStore', () => {
  it('keeps only the latest record per user', async () => {
    const store = new InMemoryAssessmentStore();
    await store.saveLatest(record('user-1', 'Bakery'));
    await store.saveLatest(record('user-1', 'Dairy'));
    await store.saveLatest(record('user-2', 'Tannery'));

    expect((await store.getLatest('user-1'))?.intake).toEqual({ businessInfo: 'Dairy' });
    expect((await store.getLatest('user-2'))?.intake).toEqual({ businessInfo: 'Tannery' });
  });

  it('clear removes the record', async () => {
    const store = new InMemoryAssessmentStore();
    await store.saveLatest(record('user-1', 'Bakery'));
    await store.clear('user-1');
    expect(await store.getLatest('user-1')).toBeNull();
  });
});

describe('BrowserAssessmentStore', () => {
  it('round-trips a record through storage', async () => {
    const storage = new MapStorage();
    const store = new BrowserAssessmentStore(storage);
    const saved = record('user-1', 'Bakery');
    await store.saveLatest(saved);

    expect(storage.items.has(`${STORAGE_KEY_PREFIX}user-1`)).toBe(true);
    expect(await store.getLatest('user-1')).toEqual(saved);
  });

  it('round-trips an assessment entered with negative consumption', async () => {
    const store = new BrowserAssessmentStore(new MapStorage());
    const result = runIntakeAssessment('green', {
      annualElectricityKwh: '-100',
      annualFuelLitres: '-5',
      waterConsumptionLitres: '2000',
    });
    const saved = toStoredAssessment('local', result, NO_ANSWERS, savedAt);
    await store.saveLatest(saved);

    const restored = await store.getLatest('local');
    expect(restored).not.toBeNull();
    expect(restored?.carbonEstimate).toBe(0.75);
  });

  it('overwrites on resubmission', async () => {
    const storage = new MapStorage();
    const store = new BrowserAssessmentStore(storage);
    await store.saveLatest(record('user-1', 'Bakery'));
    await store.saveLatest(record('user-1', 'Dairy'));

    expect(storage.items.size).toBe(1);
    expect((await store.getLatest('user-1'))?.intake).toEqual({ businessInfo: 'Dairy' });
  });

  it('absent record reads as null', async () => {
    expect(await new BrowserAssessmentStore(new MapStorage()).getLatest('nobody')).toBeNull();
  });

  it('corrupt JSON reads as null', async () => {
    const storage = new MapStorage();
    storage.setItem(`${STORAGE_KEY_PREFIX}user-1`, '{not json');
    expect(await new BrowserAssessmentStore(storage).getLatest('user-1')).toBeNull();
  });

  it('a record failing validation reads as null', async () => {
    const storage = new MapStorage();
    storage.setItem(`${STORAGE_KEY_PREFIX}user-1`, JSON.stringify({ ...record('user-1', 'Bakery'), score: 140 }));
    expect(await new BrowserAssessmentStore(storage).getLatest('user-1')).toBeNull();
  });

  it('a record stored for another user reads as null', async () => {
    const storage = new MapStorage();
    storage.setItem(`${STORAGE_KEY_PREFIX}user-1`, JSON.stringify(record('user-2', 'Bakery')));
    expect(await new BrowserAssessmentStore(storage).getLatest('user-1')).toBeNull();
  });

  it('clear removes the stored item', async () => {
    const storage = new MapStorage();
    const store = new BrowserAssessmentStore(storage);
    await store.saveLatest(record('user-1', 'Bakery'));
    await store.clear('user-1');
    expect(storage.items.size).toBe(0);
  });
});
