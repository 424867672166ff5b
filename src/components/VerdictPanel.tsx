import { useEffect, useState } from 'react';
import type { RawIntake } from '../contracts/AssessmentInputV1';
import type { PipelineOutputV1 } from '../contracts/AssessmentOutputV1';
import { STREAM_ERRORS, type VerdictComposer } from '../verdict/VerdictComposer';
import { createLogger } from '../verdict/logger';

const logger = createLogger('VerdictPanel');

type StreamStatus = 'streaming' | 'done';

interface Props {
  composer: VerdictComposer;
  output: PipelineOutputV1;
  intake: RawIntake;
}

export default function VerdictPanel({ composer, output, intake }: Props) {
  const [text, setText] = useState('');
  const [error, setError] = useState<string | null>(null);
  const [status, setStatus] = useState<StreamStatus>('streaming');
  const [attempt, setAttempt] = useState(0);

  useEffect(() => {
    let cancelled = false;
    setText('');
    setError(null);
    setStatus('streaming');

    const run = async () => {
      for await (const event of composer.stream(output, intake)) {
        if (cancelled) return;
        switch (event.type) {
          case 'text':
            setText(prev => prev + event.text);
            break;
          case 'error':
            setError(event.error);
            break;
          case 'done':
            setStatus('done');
            break;
        }
      }
    };

    run().catch((err: unknown) => {
      logger.error('Verdict stream failed', { error: String(err) });
      if (cancelled) return;
      setError(STREAM_ERRORS.failed);
      setStatus('done');
    });

    return () => { cancelled = true; };
  }, [composer, output, intake, attempt]);

  return (
    <div className="result-section verdict-panel" aria-live="polite">
      <h3>🤖 AI Verdict</h3>
      {text && <div className="verdict-text">{text}{status === 'streaming' && <span className="verdict-cursor">▍</span>}</div>}
      {!text && status === 'streaming' && <p className="verdict-pending">Analysing your assessment…</p>}
      {error && <p className="form-error" role="alert">{error}</p>}
      {status === 'done' && (
        <button className="prev-btn" onClick={() => setAttempt(a => a + 1)}>↻ Regenerate</button>
      )}
    </div>
  );
}
