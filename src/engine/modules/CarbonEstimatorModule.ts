import type { CarbonEstimateV1 } from '../../contracts/AssessmentOutputV1';
import { readNumber, round2, type FieldSource } from '../utils/fields';

/**
 * Emission factors (India averages).
 *   Electricity: grid average, kgCO2/kWh.
 *   Fuel:        diesel proxy, kgCO2/litre.
 *   Water:       pumping & treatment, 0.376 kgCO2 per 1000 L.
 */
export const EMISSION_FACTORS = {
  electricityKgPerKwh: 0.82,
  fuelKgPerLitre: 2.68,
  waterKgPerLitre: 0.000376,
} as const;

export const CARBON_UNIT = 'kgCO2e/year' as const;

/**
 * Annual carbon proxy from consumption figures.
 *
 * Accepts any flat record (raw form data or a typed intake). Only the three
 * consumption fields are read; a missing, non-numeric or negative value
 * counts as zero. Each contribution and the total are rounded separately, so
 * the parts can differ from the total by ±0.01.
 */
export function estimateCarbonV1(data: FieldSource): CarbonEstimateV1 {
  const electricityKwh = Math.max(0, readNumber(data, 'annualElectricityKwh'));
  const fuelLitres = Math.max(0, readNumber(data, 'annualFuelLitres'));
  const waterLitres = Math.max(0, readNumber(data, 'waterConsumptionLitres'));

  const electricity = electricityKwh * EMISSION_FACTORS.electricityKgPerKwh;
  const fuel = fuelLitres * EMISSION_FACTORS.fuelKgPerLitre;
  const water = waterLitres * EMISSION_FACTORS.waterKgPerLitre;

  return {
    estimatedCarbon: round2(electricity + fuel + water),
    breakdown: {
      electricity: round2(electricity),
      fuel: round2(fuel),
      water: round2(water),
    },
    unit: CARBON_UNIT,
  };
}
