export const CRITERION_IDS = {
  // Green loan (environmental)
  RENEWABLE_ENERGY: 'green.renewable_energy',
  ENERGY_EFFICIENCY: 'green.energy_efficiency',
  FUEL_EFFICIENCY: 'green.fuel_efficiency',
  WATER_MANAGEMENT: 'green.water_management',
  WASTE_REDUCTION: 'green.waste_reduction',
  GREEN_TECHNOLOGY: 'green.green_technology',
  SECTOR_BONUS: 'green.sector_bonus',

  // Sustainability-linked loan (social & governance)
  GOAL_CLARITY: 'sll.goal_clarity',
  SAFETY_RECORD: 'sll.safety_record',
  DIVERSITY_TRACKING: 'sll.diversity_tracking',
  GOVERNANCE: 'sll.governance',
  EMPLOYEE_TRAINING: 'sll.employee_training',
  ORGANIZATION_SCALE: 'sll.organization_scale',

  // ESG readiness
  BUSINESS_CLARITY: 'other.business_clarity',
  DOCUMENTATION: 'other.documentation',
  SUSTAINABILITY_INTEREST: 'other.sustainability_interest',
} as const;

export type CriterionId = typeof CRITERION_IDS[keyof typeof CRITERION_IDS];

export const SUGGESTION_IDS = {
  INSTALL_SOLAR: 'suggest.install_solar',
  ENERGY_AUDIT: 'suggest.energy_audit',
  FLEET_TRANSITION: 'suggest.fleet_transition',
  WATER_HARVESTING: 'suggest.water_harvesting',
  WASTE_SEGREGATION: 'suggest.waste_segregation',
  EFFICIENT_EQUIPMENT: 'suggest.efficient_equipment',
  QUANTIFY_TARGETS: 'suggest.quantify_targets',
  SAFETY_PROTOCOLS: 'suggest.safety_protocols',
  DIVERSITY_METRICS: 'suggest.diversity_metrics',
  GOVERNANCE_POLICIES: 'suggest.governance_policies',
  TRAINING_PROGRAMS: 'suggest.training_programs',
  DOCUMENT_PROCESSES: 'suggest.document_processes',
  QUICK_WINS: 'suggest.quick_wins',
  TRACK_BILLS: 'suggest.track_bills',
  MSME_SCHEMES: 'suggest.msme_schemes',
} as const;

export type SuggestionId = typeof SUGGESTION_IDS[keyof typeof SUGGESTION_IDS];
