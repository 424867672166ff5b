import { EMISSION_FACTORS } from '../../engine/modules/CarbonEstimatorModule';
import { GREEN_THRESHOLD, SLL_THRESHOLD } from '../../engine/modules/ClassifierModule';
import { RATING_BANDS } from '../../engine/scoring/ratingBands';
import { GOVERNANCE_KEYWORDS } from '../../engine/scoring/sllRubric';
import { CERTIFICATION_KEYWORDS, INTEREST_KEYWORDS } from '../../engine/scoring/otherRubric';
import { RUBRIC_VERSION } from '../../contracts/versions';

export default function MethodologyPage({ onBack }: { onBack: () => void }) {
  return (
    <div className="governance-page">
      <div className="stepper-header">
        <button className="back-btn" onClick={onBack}>← Back</button>
        <span className="step-label">Methodology</span>
      </div>

      <div className="governance-content">
        <h1>How the assessment works</h1>
        <p className="governance-lead">Rubric {RUBRIC_VERSION}. Scores are indicative and do not replace a lender's own due diligence.</p>

        <h2>1. Track selection</h2>
        <ul>
          <li>Manufacturing +1, significant energy use +1, tracking environmental metrics +2 and measuring emissions +2 count towards the Green Loan track.</li>
          <li>Significant energy use +0.5, written sustainability goals +2, an ESG loan application +1 and employee policies +1 count towards the Sustainability-Linked Loan track.</li>
          <li>Green Loan when its signals reach {GREEN_THRESHOLD}; otherwise Sustainability-Linked Loan when its signals reach {SLL_THRESHOLD}; otherwise ESG Readiness.</li>
        </ul>

        <h2>2. Carbon estimate</h2>
        <ul>
          <li>Electricity: {EMISSION_FACTORS.electricityKgPerKwh} kgCO₂e per kWh (grid average)</li>
          <li>Fuel: {EMISSION_FACTORS.fuelKgPerLitre} kgCO₂e per litre (diesel)</li>
          <li>Water: {EMISSION_FACTORS.waterKgPerLitre} kgCO₂e per litre (supply and treatment)</li>
          <li>Each source and the total are rounded to two decimals separately.</li>
        </ul>

        <h2>3. Green Loan rubric (100 points)</h2>
        <ul>
          <li>Renewable energy share: 25</li>
          <li>Electricity use: 15 · Fuel use: 15 · Waste generated: 15</li>
          <li>Water use: 10</li>
          <li>Energy-efficient equipment: 15</li>
          <li>Sector bonus (NIC 35, 38, 39): 5</li>
        </ul>

        <h2>4. Sustainability-Linked Loan rubric (100 points)</h2>
        <ul>
          <li>Safety record: 25</li>
          <li>Quantified improvement goals: 20</li>
          <li>Governance policies ({GOVERNANCE_KEYWORDS.join(', ')}): 20</li>
          <li>Diversity tracking: 15</li>
          <li>Employee training: 10 · Organisation scale: 10</li>
        </ul>

        <h2>5. ESG Readiness rubric (100 points)</h2>
        <ul>
          <li>Business description: 20</li>
          <li>Certifications and records ({CERTIFICATION_KEYWORDS.join(', ')}): 40</li>
          <li>Sustainability interests ({INTEREST_KEYWORDS.join(', ')}): 40</li>
        </ul>

        <h2>6. Rating bands</h2>
        <ul>
          {RATING_BANDS.map(band => (
            <li key={band.rating}>{band.rating}: {band.minScore}+ · {band.label}</li>
          ))}
        </ul>

        <h2>7. Known limitations</h2>
        <ul>
          <li>Free-text answers are matched on keywords, not read for meaning.</li>
          <li>Emission factors are national averages, not site-specific.</li>
          <li>The AI verdict is generated text and may contain mistakes.</li>
        </ul>
      </div>
    </div>
  );
}
