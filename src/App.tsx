import { useEffect, useState } from 'react';
import OnboardingStepper from './components/stepper/OnboardingStepper';
import IntakeStepper from './components/stepper/IntakeStepper';
import ScorecardDashboard from './components/ScorecardDashboard';
import Footer from './components/Footer';
import MethodologyPage from './components/governance/MethodologyPage';
import type { Category, OnboardingAnswers, RawIntake } from './contracts/AssessmentInputV1';
import type { AssessmentResultV1 } from './contracts/AssessmentOutputV1';
import { classifyUser } from './engine/modules/ClassifierModule';
import { runIntakeAssessment } from './engine/Engine';
import { IntakeValidationError } from './engine/schema/IntakeSchemaV1';
import { BrowserAssessmentStore, toStoredAssessment, type StoredAssessment } from './store/AssessmentStore';
import { VerdictComposer } from './verdict/VerdictComposer';
import { loadVerdictConfig } from './verdict/verdictConfig';
import { createLogger } from './verdict/logger';
import { CATEGORY_LABELS } from './ui/intakeForms';
import './App.css';

type Journey = 'landing' | 'onboarding' | 'intake' | 'dashboard' | 'methodology';

/** The browser app keeps a single local profile. */
const LOCAL_USER_ID = 'local';

const logger = createLogger('App');
const store = new BrowserAssessmentStore(window.localStorage);
const verdictComposer = new VerdictComposer(
  loadVerdictConfig({
    GEMINI_API_KEY: import.meta.env.VITE_GEMINI_API_KEY,
    GEMINI_MODEL: import.meta.env.VITE_GEMINI_MODEL,
  }),
);

interface Assessment {
  result: AssessmentResultV1;
  intake: RawIntake;
}

export default function App() {
  const [journey, setJourney] = useState<Journey>('landing');
  const [answers, setAnswers] = useState<OnboardingAnswers | undefined>();
  const [category, setCategory] = useState<Category>('other');
  const [assessment, setAssessment] = useState<Assessment | null>(null);
  const [saved, setSaved] = useState<StoredAssessment | null>(null);
  const [intakeError, setIntakeError] = useState<string | null>(null);

  useEffect(() => {
    store.getLatest(LOCAL_USER_ID)
      .then(setSaved)
      .catch((err: unknown) => logger.warn('Could not read saved assessment', { error: String(err) }));
  }, []);

  function handleOnboardingComplete(submitted: OnboardingAnswers) {
    setAnswers(submitted);
    setCategory(classifyUser(submitted));
    setIntakeError(null);
    setJourney('intake');
  }

  function handleIntakeSubmit(intake: RawIntake) {
    let result: AssessmentResultV1;
    try {
      result = runIntakeAssessment(category, intake);
    } catch (err) {
      if (err instanceof IntakeValidationError) {
        setIntakeError(err.message);
        return;
      }
      throw err;
    }

    const record = toStoredAssessment(LOCAL_USER_ID, result, answers);
    setAssessment({ result, intake });
    setSaved(record);
    setIntakeError(null);
    setJourney('dashboard');
    store.saveLatest(record)
      .catch((err: unknown) => logger.warn('Could not save assessment', { error: String(err) }));
  }

  function resumeSaved(record: StoredAssessment) {
    try {
      setAssessment({ result: runIntakeAssessment(record.category, record.intake), intake: record.intake });
    } catch (err) {
      if (!(err instanceof IntakeValidationError)) throw err;
      logger.warn('Saved assessment no longer validates', { fields: err.fields });
      setSaved(null);
      return;
    }
    setCategory(record.category);
    setAnswers(record.onboardingAnswers);
    setJourney('dashboard');
  }

  function restart() {
    setAssessment(null);
    setIntakeError(null);
    setJourney('onboarding');
  }

  if (journey === 'onboarding') {
    return <OnboardingStepper onBack={() => setJourney('landing')} onComplete={handleOnboardingComplete} initialAnswers={answers} />;
  }
  if (journey === 'intake') {
    return (
      <IntakeStepper
        key={category}
        category={category}
        onBack={() => setJourney('onboarding')}
        onSubmit={handleIntakeSubmit}
        initialValues={assessment?.result.category === category ? assessment.intake : undefined}
        errorMessage={intakeError}
      />
    );
  }
  if (journey === 'dashboard' && assessment) {
    return (
      <ScorecardDashboard
        result={assessment.result}
        intake={assessment.intake}
        composer={verdictComposer}
        onEditIntake={() => setJourney('intake')}
        onRestart={restart}
      />
    );
  }
  if (journey === 'methodology') return <MethodologyPage onBack={() => setJourney('landing')} />;

  return (
    <div className="landing">
      <div className="hero">
        <h1>🌍 GreenBridge ESG Assessment</h1>
        <p className="subtitle">Sustainable finance readiness for small businesses</p>
        <p className="tagline">
          Answer seven quick questions, share a few figures from your records, and get a
          scorecard, a carbon estimate and a personalised verdict.
        </p>
      </div>
      <div className="journey-cards">
        <div className="journey-card fast" onClick={() => setJourney('onboarding')}>
          <div className="card-icon">📝</div>
          <h2>Start Assessment</h2>
          <p className="card-time">~3 minutes</p>
          <p>We match you to the right track and score your current practices.</p>
          <ul>
            <li>Green Loan: energy, water and waste</li>
            <li>Sustainability-Linked Loan: safety, diversity and governance</li>
            <li>ESG Readiness: first steps and quick wins</li>
          </ul>
          <button className="cta-btn">Begin →</button>
        </div>
        {saved && (
          <div className="journey-card full" onClick={() => resumeSaved(saved)}>
            <div className="card-icon">📊</div>
            <h2>Your Last Scorecard</h2>
            <p className="card-time">{CATEGORY_LABELS[saved.category]}</p>
            <p>
              Score {saved.score}/100 · Rating {saved.rating} · saved {new Date(saved.updatedAt).toLocaleDateString()}
            </p>
            <button className="cta-btn">View Scorecard →</button>
          </div>
        )}
      </div>
      <Footer onNavigate={setJourney} />
    </div>
  );
}
