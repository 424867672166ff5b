import type { SuggestionId } from '../../contracts/scoring.criterionIds';
import type { SuggestionV1 } from '../../contracts/AssessmentOutputV1';

/**
 * Improvement suggestions surfaced when a criterion lands in its failing tier.
 * Text is shown verbatim on the dashboard and fed to the verdict prompt.
 */
export const SUGGESTIONS: Record<SuggestionId, Omit<SuggestionV1, 'id'>> = {
  // Green
  'suggest.install_solar': { text: 'Install rooftop solar to start your renewable energy journey.', icon: '☀️' },
  'suggest.energy_audit': { text: 'Consider an energy audit to identify reduction opportunities.', icon: '⚡' },
  'suggest.fleet_transition': { text: 'Explore EV fleet transition or fuel-efficient logistics.', icon: '🚗' },
  'suggest.water_harvesting': { text: 'Implement rainwater harvesting and water recycling.', icon: '💧' },
  'suggest.waste_segregation': { text: 'Implement waste segregation and partner with recyclers.', icon: '♻️' },
  'suggest.efficient_equipment': { text: 'Invest in BEE-rated equipment and LED lighting.', icon: '💡' },

  // SLL
  'suggest.quantify_targets': { text: "Define quantifiable targets (e.g., 'Reduce energy by 15% in 3 years').", icon: '🎯' },
  'suggest.safety_protocols': { text: 'Strengthen ISO 45001 safety protocols to reach zero incidents.', icon: '⛑️' },
  'suggest.diversity_metrics': { text: 'Track and report workforce diversity metrics.', icon: '👥' },
  'suggest.governance_policies': { text: 'Formalize Anti-Corruption and Whistleblower policies.', icon: '📜' },
  'suggest.training_programs': { text: 'Implement regular skill development and safety training.', icon: '📚' },

  // ESG readiness
  'suggest.document_processes': { text: "Start documenting your processes - it's the foundation of ESG.", icon: '📋' },
  'suggest.quick_wins': { text: 'Explore quick wins: LED lighting, waste segregation, water metering.', icon: '🌱' },
  'suggest.track_bills': { text: 'Start tracking monthly electricity and fuel bills.', icon: '📊' },
  'suggest.msme_schemes': { text: 'Check if your industry is eligible for MSME green schemes.', icon: '🏭' },
};

/** Appended to an ESG readiness scorecard that triggered no suggestion of its own. */
export const DEFAULT_READINESS_SUGGESTIONS: readonly SuggestionId[] = [
  'suggest.track_bills',
  'suggest.msme_schemes',
];

export function suggestion(id: SuggestionId): SuggestionV1 {
  return { id, ...SUGGESTIONS[id] };
}
