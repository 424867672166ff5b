import type { GreenIntake } from '../../contracts/AssessmentInputV1';
import { CRITERION_IDS, SUGGESTION_IDS } from '../../contracts/scoring.criterionIds';
import { RubricTally } from './RubricTally';

/** NIC divisions: 35 electricity, 38 waste collection/recovery, 39 remediation. */
export const GREEN_SECTOR_PREFIXES: readonly string[] = ['35', '38', '39'];

/** Free-text answers at or below this length are treated as not provided. */
const MIN_DESCRIPTION_LENGTH = 5;

/**
 * Green loan rubric (environmental focus), max 100.
 * Consumption criteria are inverse-scaled: lower usage earns more points.
 */
export function scoreGreenRubric(data: GreenIntake): RubricTally {
  const tally = new RubricTally();

  // Renewable energy share (25)
  const renewablePct = data.renewableEnergyPct;
  if (renewablePct > 50) {
    tally.award(CRITERION_IDS.RENEWABLE_ENERGY, 'Renewable Energy', 25, 25);
  } else if (renewablePct >= 25) {
    tally.award(CRITERION_IDS.RENEWABLE_ENERGY, 'Renewable Energy', 18, 25);
  } else if (renewablePct >= 10) {
    tally.award(CRITERION_IDS.RENEWABLE_ENERGY, 'Renewable Energy', 10, 25);
  } else if (renewablePct > 0) {
    tally.award(CRITERION_IDS.RENEWABLE_ENERGY, 'Renewable Energy', 5, 25);
  } else {
    tally.award(CRITERION_IDS.RENEWABLE_ENERGY, 'Renewable Energy', 0, 25, SUGGESTION_IDS.INSTALL_SOLAR);
  }

  // Electricity use, kWh/year (15)
  const kwh = data.annualElectricityKwh;
  if (kwh < 10_000) {
    tally.award(CRITERION_IDS.ENERGY_EFFICIENCY, 'Energy Efficiency', 15, 15);
  } else if (kwh < 50_000) {
    tally.award(CRITERION_IDS.ENERGY_EFFICIENCY, 'Energy Efficiency', 10, 15);
  } else if (kwh < 100_000) {
    tally.award(CRITERION_IDS.ENERGY_EFFICIENCY, 'Energy Efficiency', 5, 15);
  } else {
    tally.award(CRITERION_IDS.ENERGY_EFFICIENCY, 'Energy Efficiency', 0, 15, SUGGESTION_IDS.ENERGY_AUDIT);
  }

  // Fuel dependency, litres/year (15)
  const fuel = data.annualFuelLitres;
  if (fuel < 1_000) {
    tally.award(CRITERION_IDS.FUEL_EFFICIENCY, 'Fuel Efficiency', 15, 15);
  } else if (fuel < 5_000) {
    tally.award(CRITERION_IDS.FUEL_EFFICIENCY, 'Fuel Efficiency', 10, 15);
  } else if (fuel < 10_000) {
    tally.award(CRITERION_IDS.FUEL_EFFICIENCY, 'Fuel Efficiency', 5, 15);
  } else {
    tally.award(CRITERION_IDS.FUEL_EFFICIENCY, 'Fuel Efficiency', 0, 15, SUGGESTION_IDS.FLEET_TRANSITION);
  }

  // Water use, litres/year (10)
  const water = data.waterConsumptionLitres;
  if (water < 50_000) {
    tally.award(CRITERION_IDS.WATER_MANAGEMENT, 'Water Management', 10, 10);
  } else if (water < 100_000) {
    tally.award(CRITERION_IDS.WATER_MANAGEMENT, 'Water Management', 7, 10);
  } else if (water < 500_000) {
    tally.award(CRITERION_IDS.WATER_MANAGEMENT, 'Water Management', 3, 10);
  } else {
    tally.award(CRITERION_IDS.WATER_MANAGEMENT, 'Water Management', 0, 10, SUGGESTION_IDS.WATER_HARVESTING);
  }

  // Waste, kg/month (15)
  const waste = data.wasteGeneratedKgMonth;
  if (waste < 100) {
    tally.award(CRITERION_IDS.WASTE_REDUCTION, 'Waste Reduction', 15, 15);
  } else if (waste < 500) {
    tally.award(CRITERION_IDS.WASTE_REDUCTION, 'Waste Reduction', 10, 15);
  } else if (waste < 1_000) {
    tally.award(CRITERION_IDS.WASTE_REDUCTION, 'Waste Reduction', 5, 15);
  } else {
    tally.award(CRITERION_IDS.WASTE_REDUCTION, 'Waste Reduction', 0, 15, SUGGESTION_IDS.WASTE_SEGREGATION);
  }

  // Efficiency equipment named (15)
  const equipment = data.efficiencyEquipment ?? '';
  if (equipment.length > MIN_DESCRIPTION_LENGTH) {
    tally.award(CRITERION_IDS.GREEN_TECHNOLOGY, 'Green Technology', 15, 15);
  } else {
    tally.award(CRITERION_IDS.GREEN_TECHNOLOGY, 'Green Technology', 0, 15, SUGGESTION_IDS.EFFICIENT_EQUIPMENT);
  }

  // Sector bonus (5): bonus only, never a suggestion
  const industryCode = data.industryCode ?? '';
  const inGreenSector = industryCode !== '' && GREEN_SECTOR_PREFIXES.some(p => industryCode.startsWith(p));
  tally.award(CRITERION_IDS.SECTOR_BONUS, 'Sector Bonus', inGreenSector ? 5 : 0, 5);

  return tally;
}
