import { useState } from 'react';
import type { OnboardingAnswers } from '../../contracts/AssessmentInputV1';
import { ONBOARDING_QUESTIONS } from '../../ui/onboardingQuestions';
import { NO_ANSWERS } from '../../engine/schema/OnboardingSchemaV1';
import { scoreOnboarding } from '../../engine/modules/ClassifierModule';

interface Props {
  onBack: () => void;
  onComplete: (answers: OnboardingAnswers) => void;
  /** Previously submitted answers, when the user comes back to edit them. */
  initialAnswers?: OnboardingAnswers;
}

export default function OnboardingStepper({ onBack, onComplete, initialAnswers }: Props) {
  const [answers, setAnswers] = useState<OnboardingAnswers>(initialAnswers ?? NO_ANSWERS);
  const [stepIndex, setStepIndex] = useState(0);

  const total = ONBOARDING_QUESTIONS.length;
  const question = ONBOARDING_QUESTIONS[stepIndex];
  const progress = ((stepIndex + 1) / total) * 100;
  const { greenScore, sllScore } = scoreOnboarding(answers);

  const answer = (value: boolean) => {
    if (!question) return;
    const updated = { ...answers, [question.id]: value };
    setAnswers(updated);
    if (stepIndex + 1 >= total) {
      onComplete(updated);
    } else {
      setStepIndex(stepIndex + 1);
    }
  };

  const prev = () => {
    if (stepIndex === 0) {
      onBack();
    } else {
      setStepIndex(stepIndex - 1);
    }
  };

  if (!question) return null;
  const current = answers[question.id];

  return (
    <div className="stepper-container">
      <div className="stepper-header">
        <button className="back-btn" onClick={prev}>← Back</button>
        <div className="progress-bar">
          <div className="progress-fill" style={{ width: `${progress}%` }} />
        </div>
        <span className="step-label">Question {stepIndex + 1} of {total}</span>
      </div>

      <div className="step-card">
        <div className="card-icon">{question.icon}</div>
        <h2>{question.prompt}</h2>
        <p className="description">{question.hint}</p>

        <div className="choice-grid">
          <button
            className={`choice-btn ${current ? 'choice-btn--active' : ''}`}
            onClick={() => answer(true)}
          >
            Yes
          </button>
          <button
            className={`choice-btn ${!current ? 'choice-btn--active' : ''}`}
            onClick={() => answer(false)}
          >
            No
          </button>
        </div>

        <p className="step-footnote">
          Environmental signals: {greenScore} · Social &amp; governance signals: {sllScore}
        </p>
      </div>
    </div>
  );
}
