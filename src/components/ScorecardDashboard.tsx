import { useMemo } from 'react';
import type { RawIntake } from '../contracts/AssessmentInputV1';
import type { AssessmentResultV1 } from '../contracts/AssessmentOutputV1';
import { toPipelineOutput } from '../engine/Engine';
import { RATING_BANDS } from '../engine/scoring/ratingBands';
import { CATEGORY_LABELS } from '../ui/intakeForms';
import type { VerdictComposer } from '../verdict/VerdictComposer';
import RatingBandLadder from './RatingBandLadder';
import VerdictPanel from './VerdictPanel';
import ScoreBreakdownChart from './visualizers/ScoreBreakdownChart';
import CarbonBreakdownChart from './visualizers/CarbonBreakdownChart';

interface Props {
  result: AssessmentResultV1;
  intake: RawIntake;
  composer: VerdictComposer;
  onEditIntake: () => void;
  onRestart: () => void;
}

const carbonFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 2 });

export default function ScorecardDashboard({ result, intake, composer, onEditIntake, onRestart }: Props) {
  const output = useMemo(() => toPipelineOutput(result), [result]);
  const { scorecard, carbonEstimate } = result;
  const bandLabel = RATING_BANDS.find(b => b.rating === scorecard.rating)?.label ?? '';

  return (
    <div className="cockpit-page">
      <div className="stepper-header">
        <button className="back-btn" onClick={onRestart}>← Start Over</button>
        <button className="prev-btn" onClick={onEditIntake}>Edit Answers</button>
        <span className="step-label">{CATEGORY_LABELS[result.category]} Scorecard</span>
      </div>

      <div className="results-cockpit-layout">
        <aside className="step-card score-card">
          <h2>Your Score</h2>
          <p className={`score-value rating--${scorecard.rating}`}>{scorecard.score}<span>/100</span></p>
          <p className="score-rating">Rating {scorecard.rating} · {bandLabel}</p>
          <RatingBandLadder score={scorecard.score} rating={scorecard.rating} />
        </aside>

        <section className="dashboard-panel">
          <div className="dashboard-block">
            <h4>Score breakdown</h4>
            <div className="chart-frame">
              <ScoreBreakdownChart criteria={scorecard.criteria} />
            </div>
          </div>

          <div className="dashboard-block">
            <h4>Estimated carbon footprint</h4>
            <p className="carbon-total">
              {carbonFormat.format(carbonEstimate.estimatedCarbon)} <span>{carbonEstimate.unit}</span>
            </p>
            <div className="chart-frame chart-frame--small">
              <CarbonBreakdownChart estimate={carbonEstimate} />
            </div>
          </div>

          <div className="dashboard-block">
            <h4>Suggestions</h4>
            {scorecard.suggestions.length > 0 ? (
              <ul className="suggestion-list">
                {scorecard.suggestions.map(s => (
                  <li key={s.id}><span className="suggestion-icon">{s.icon}</span> {s.text}</li>
                ))}
              </ul>
            ) : (
              <p>No gaps found. Keep your records current for lender review.</p>
            )}
          </div>
        </section>
      </div>

      <VerdictPanel composer={composer} output={output} intake={intake} />
    </div>
  );
}
