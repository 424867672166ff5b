import { useState } from 'react';
import type { Category, RawIntake } from '../../contracts/AssessmentInputV1';
import { intakeForm, type IntakeFieldDef } from '../../ui/intakeForms';

interface Props {
  category: Category;
  onBack: () => void;
  onSubmit: (intake: RawIntake) => void;
  /** Values from an earlier submission of the same category. */
  initialValues?: RawIntake;
  /** Validation message from the last submission, if it was rejected. */
  errorMessage?: string | null;
}

function toFormValues(initial: RawIntake | undefined): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(initial ?? {})) values[key] = String(value);
  return values;
}

export default function IntakeStepper({ category, onBack, onSubmit, initialValues, errorMessage }: Props) {
  const form = intakeForm(category);
  const [values, setValues] = useState<Record<string, string>>(() => toFormValues(initialValues));
  const [missing, setMissing] = useState<string[]>([]);

  const submit = () => {
    const blanks = form.fields
      .filter(field => field.required && (values[field.id] ?? '').trim() === '')
      .map(field => field.label);
    setMissing(blanks);
    if (blanks.length > 0) return;

    const intake: Record<string, string> = {};
    for (const field of form.fields) {
      const value = values[field.id];
      if (value !== undefined) intake[field.id] = value;
    }
    onSubmit(intake);
  };

  return (
    <div className="stepper-container">
      <div className="stepper-header">
        <button className="back-btn" onClick={onBack}>← Back</button>
        <div className="progress-bar">
          <div className="progress-fill" style={{ width: '100%' }} />
        </div>
        <span className="step-label">Intake</span>
      </div>

      <div className="step-card">
        <h2>{form.icon} {form.title}</h2>
        <p className="description">{form.description}</p>

        <div className="form-grid">
          {form.fields.map(field => (
            <IntakeField
              key={field.id}
              field={field}
              value={values[field.id] ?? ''}
              onChange={value => setValues({ ...values, [field.id]: value })}
            />
          ))}
        </div>

        {missing.length > 0 && (
          <p className="form-error" role="alert">Please fill in: {missing.join(', ')}</p>
        )}
        {errorMessage && (
          <p className="form-error" role="alert">{errorMessage}</p>
        )}

        <div className="step-actions">
          <button className="prev-btn" onClick={onBack}>← Back</button>
          <button className="next-btn" onClick={submit}>See My Scorecard →</button>
        </div>
      </div>
    </div>
  );
}

function IntakeField({
  field,
  value,
  onChange,
}: {
  field: IntakeFieldDef;
  value: string;
  onChange: (value: string) => void;
}) {
  const label = field.unit ? `${field.label} (${field.unit})` : field.label;
  const inputId = `intake-${field.id}`;

  if (field.kind === 'textarea') {
    return (
      <div className="form-field form-field--wide">
        <label htmlFor={inputId}>{label}</label>
        <textarea
          id={inputId}
          rows={3}
          value={value}
          placeholder={field.placeholder}
          onChange={e => onChange(e.target.value)}
        />
      </div>
    );
  }

  return (
    <div className="form-field">
      <label htmlFor={inputId}>{label}</label>
      <input
        id={inputId}
        type={field.kind === 'text' ? 'text' : 'number'}
        min={field.kind === 'text' ? undefined : 0}
        step={field.kind === 'integer' ? 1 : 'any'}
        value={value}
        placeholder={field.placeholder}
        onChange={e => onChange(e.target.value)}
      />
    </div>
  );
}
