import type { Category, RawIntake } from '../contracts/AssessmentInputV1';
import type { PipelineOutputV1 } from '../contracts/AssessmentOutputV1';

const CLOSING_RULE = 'DO NOT STOP MID-SENTENCE. COMPLETE YOUR ANALYSIS.';

export const SYSTEM_PROMPTS: Record<Category, string> = {
  green: `You are an ESG expert for GreenBridge, helping Indian SMEs with Green Loans.
Based on the user's environmental assessment data, provide a structured, detailed verdict.

Your response MUST follow this structure:
1. **Assessment Summary**: A clear statement on their Green Loan eligibility based on the score.
2. **Key Strengths**: Identify 2 specific areas where they are performing well.
3. **Improvement Areas**: Identify 2 specific gaps that need attention.
4. **Actionable Roadmap**: Provide 3 concrete steps to improve their score.
5. **Funding Opportunities**: Mention 1-2 relevant Indian schemes (e.g., SIDBI, IREDA).

Keep the tone professional and encouraging. Total length should be around 200 words.
${CLOSING_RULE}`,

  sll: `You are an ESG expert for GreenBridge, helping Indian SMEs with Sustainability-Linked Loans (SLL).
Based on the user's social and governance data, provide a structured, detailed verdict.

Your response MUST follow this structure:
1. **Assessment Summary**: Evaluate their trajectory for SLL eligibility.
2. **Social & Governance Highlights**: Comment on their safety/diversity/policy data.
3. **Gaps & Risks**: Identify missing policies or high-risk areas.
4. **KPI Recommendations**: Suggest 2-3 specific KPIs for loan linkage.
5. **Next Steps**: Recommend certifications (ISO/SA8000) or policy drafts.

Keep the tone professional and expert. Total length should be around 200 words.
${CLOSING_RULE}`,

  other: `You are an ESG expert for GreenBridge, guiding Indian SMEs on ESG Readiness.
Based on their initial input, provide a structured, encouraging verdict.

Your response MUST follow this structure:
1. **Welcome & Context**: Welcome them to the sustainability journey.
2. **Quick Wins**: Identify 2 low-hanging fruits based on their sector/interest.
3. **Business Case**: Briefly explain why ESG matters for them (funding/market access).
4. **Relevant Schemes**: Suggest 1 government scheme or certification to explore.
5. **Next Steps**: Encourage them to take the full Green Loan or SLL assessment.

Keep the tone motivating and simple. Total length should be around 150 words.
${CLOSING_RULE}`,
};

const carbonFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** Submitted values worth mentioning: blanks, zeros and absent values are skipped. */
function summariseIntake(intake: RawIntake): string {
  return Object.entries(intake)
    .filter(([, value]) => value !== undefined && value !== null && value !== '' && value !== 0 && value !== false)
    .map(([key, value]) => `- ${key}: ${String(value)}`)
    .join('\n');
}

export function buildUserMessage(output: PipelineOutputV1, intake: RawIntake): string {
  const { scorecard } = output;
  const suggestions = scorecard.suggestions.length > 0
    ? scorecard.suggestions.map(s => `- ${s.text}`).join('\n')
    : 'None';

  return `
USER ASSESSMENT RESULTS:
Category: ${output.category.toUpperCase()}
Score: ${scorecard.score}/100
Rating: ${scorecard.rating}
Estimated Carbon Footprint: ${carbonFormat.format(output.carbon_estimate.value)} kgCO2e/year

USER'S SUBMITTED DATA:
${summariseIntake(intake)}

SYSTEM-GENERATED SUGGESTIONS:
${suggestions}

Based on the above, provide your expert verdict and personalized recommendations.
`;
}

/** System prompt for the category followed by the user's results. */
export function buildVerdictPrompt(output: PipelineOutputV1, intake: RawIntake): string {
  return `${SYSTEM_PROMPTS[output.category]}\n\n${buildUserMessage(output, intake)}`;
}
