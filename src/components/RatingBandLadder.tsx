/**
 * RatingBandLadder
 *
 * Loan-readiness band ladder (A–D) with a marker at the assessed score.
 *
 * Hover a band   → tooltip: score range + 1-line description
 * Hover a marker → tooltip: score + borderline label
 *
 * Band thresholds:
 *   A ≥ 80
 *   B 60–79
 *   C 40–59
 *   D  < 40
 */
import { useState } from 'react';
import type { Rating } from '../contracts/AssessmentOutputV1';
import { RATING_BANDS } from '../engine/scoring/ratingBands';

// ── Band presentation ──────────────────────────────────────────────────────────

interface BandStyle {
  color: string;
  description: string;
}

const BAND_STYLES: Record<Rating, BandStyle> = {
  A: { color: '#276749', description: 'Ready to approach lenders for green or sustainability-linked credit.' },
  B: { color: '#68d391', description: 'Solid practices in place; a few targeted improvements close the gap.' },
  C: { color: '#f6ad55', description: 'Some practices in place; documentation and targets need work.' },
  D: { color: '#e53e3e', description: 'Early in the journey; start by measuring and recording the basics.' },
};

const BORDERLINE_TOLERANCE = 2; // points: show "borderline X/Y" when this close to a fence

// ── Helpers ───────────────────────────────────────────────────────────────────

interface LadderBand {
  rating: Rating;
  label: string;
  minScore: number;
  maxScore: number;
}

const LADDER: LadderBand[] = RATING_BANDS.map((band, i) => ({
  rating: band.rating,
  label: band.label,
  minScore: band.minScore,
  maxScore: i === 0 ? 100 : (RATING_BANDS[i - 1]?.minScore ?? 101) - 1,
}));

/**
 * Returns "borderline X/Y" if the score sits within BORDERLINE_TOLERANCE of a
 * band fence, null otherwise.
 */
// eslint-disable-next-line react-refresh/only-export-components
export function borderlineLabel(score: number): string | null {
  for (let i = 0; i < LADDER.length - 1; i++) {
    const above = LADDER[i];
    const below = LADDER[i + 1];
    if (above && below && Math.abs(score - above.minScore) <= BORDERLINE_TOLERANCE) {
      return `borderline ${above.rating}/${below.rating}`;
    }
  }
  return null;
}

/** Map a score to a vertical position (0 = top = 100, 1 = bottom = 0). */
function scoreToPosition(score: number): number {
  const clamped = Math.min(100, Math.max(0, score));
  return 1 - clamped / 100;
}

// ── Component ─────────────────────────────────────────────────────────────────

export interface RatingBandLadderProps {
  score: number;
  rating: Rating;
}

export default function RatingBandLadder({ score, rating }: RatingBandLadderProps) {
  const [hoveredBand, setHoveredBand] = useState<Rating | null>(null);
  const [markerHovered, setMarkerHovered] = useState(false);

  const CHART_HEIGHT = 240;
  const markerY = scoreToPosition(score) * CHART_HEIGHT;
  const markerColor = BAND_STYLES[rating].color;
  const bl = borderlineLabel(score);

  return (
    <div style={{ position: 'relative', userSelect: 'none' }}>
      <div style={{ display: 'flex', alignItems: 'flex-start' }}>

        {/* Band column */}
        <div style={{ width: 36, position: 'relative', height: CHART_HEIGHT, flexShrink: 0 }}>
          {LADDER.map(band => {
            const top = scoreToPosition(band.maxScore + (band.rating === 'A' ? 0 : 1)) * CHART_HEIGHT;
            const bottom = scoreToPosition(band.minScore) * CHART_HEIGHT;
            return (
              <div
                key={band.rating}
                onMouseEnter={() => setHoveredBand(band.rating)}
                onMouseLeave={() => setHoveredBand(null)}
                style={{
                  position: 'absolute',
                  top,
                  left: 0,
                  width: 36,
                  height: bottom - top,
                  background: BAND_STYLES[band.rating].color,
                  display: 'flex',
                  alignItems: 'center',
                  justifyContent: 'center',
                  borderBottom: band.rating !== 'D' ? '1px solid rgba(255,255,255,0.3)' : 'none',
                  filter: hoveredBand === band.rating ? 'brightness(1.15)' : 'none',
                  outline: band.rating === rating ? '2px solid #1a202c' : 'none',
                }}
              >
                <span style={{ color: band.rating === 'A' || band.rating === 'D' ? '#fff' : '#1a202c', fontSize: '0.75rem', fontWeight: 700 }}>
                  {band.rating}
                </span>
              </div>
            );
          })}
        </div>

        {/* Marker track */}
        <div style={{ position: 'relative', flex: 1, height: CHART_HEIGHT, borderLeft: '2px solid #e2e8f0' }}>
          {[100, 80, 60, 40, 20, 0].map(tick => (
            <div key={tick} style={{
              position: 'absolute', top: scoreToPosition(tick) * CHART_HEIGHT - 6, left: 0,
              width: '100%', pointerEvents: 'none',
            }}>
              <span style={{ fontSize: '0.65rem', color: '#a0aec0', paddingLeft: 4 }}>{tick}</span>
              <div style={{ position: 'absolute', top: 6, left: 24, right: 0, borderTop: '1px dashed #e2e8f0' }} />
            </div>
          ))}

          <div
            onMouseEnter={() => setMarkerHovered(true)}
            onMouseLeave={() => setMarkerHovered(false)}
            style={{ position: 'absolute', top: markerY - 1, left: 0, width: '100%', cursor: 'pointer', zIndex: 10 }}
          >
            <div style={{ height: 2, background: markerColor }} />
            <div style={{
              position: 'absolute', top: -4, left: 4,
              width: 8, height: 8, borderRadius: '50%',
              background: markerColor, border: '2px solid #fff',
              boxShadow: '0 1px 3px rgba(0,0,0,0.25)',
            }} />
            <div style={{ position: 'absolute', top: -14, left: 28, whiteSpace: 'nowrap' }}>
              <span style={{
                fontSize: '0.7rem', fontWeight: markerHovered ? 700 : 500, color: '#1a202c',
                background: 'rgba(255,255,255,0.85)', padding: '0 3px', borderRadius: 2,
              }}>
                Your score · {score}/100
              </span>
              {bl && (
                <span style={{
                  fontSize: '0.62rem', color: '#744210', marginLeft: 4,
                  background: '#fefcbf', padding: '0 3px', borderRadius: 2,
                }}>
                  {bl}
                </span>
              )}
            </div>

            {markerHovered && (
              <div style={{
                position: 'absolute', top: 10, left: '30%',
                background: '#1a202c', color: '#fff',
                fontSize: '0.75rem', padding: '6px 10px',
                borderRadius: 6, zIndex: 20, minWidth: 160, pointerEvents: 'none',
              }}>
                <div style={{ fontWeight: 700, marginBottom: 2 }}>Rating {rating}: {score}/100</div>
                {bl && <div style={{ color: '#fbd38d', fontSize: '0.7rem' }}>{bl}</div>}
              </div>
            )}
          </div>
        </div>
      </div>

      {hoveredBand && (() => {
        const band = LADDER.find(b => b.rating === hoveredBand);
        if (!band) return null;
        return (
          <div style={{
            marginTop: 8, padding: '6px 10px',
            background: '#2d3748', color: '#e2e8f0',
            borderRadius: 6, fontSize: '0.75rem',
          }}>
            <strong>Band {band.rating} · {band.label}</strong>
            {' '}({band.minScore === 0 ? `< ${band.maxScore + 1}` : band.maxScore === 100 ? `≥ ${band.minScore}` : `${band.minScore}–${band.maxScore}`}):{' '}
            {BAND_STYLES[band.rating].description}
          </div>
        );
      })()}
    </div>
  );
}
