import {
  BarChart,
  Bar,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  Legend,
  ResponsiveContainer,
} from 'recharts';
import type { CriterionResultV1 } from '../../contracts/AssessmentOutputV1';

export default function ScoreBreakdownChart({ criteria }: { criteria: readonly CriterionResultV1[] }) {
  const data = criteria.map(c => ({
    label: c.label,
    'Points earned': c.points,
    'Points available': c.maxPoints - c.points,
  }));

  return (
    <ResponsiveContainer width="100%" height="100%">
      <BarChart data={data} layout="vertical" margin={{ top: 5, right: 20, left: 20, bottom: 5 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#f0f0f0" />
        <XAxis type="number" tick={{ fontSize: 10 }} allowDecimals={false} />
        <YAxis type="category" dataKey="label" tick={{ fontSize: 11 }} width={130} />
        <Tooltip
          contentStyle={{ fontSize: '0.85rem', borderRadius: '8px' }}
          formatter={(value: number | undefined, name: string | undefined) => [value !== undefined ? `${value} pts` : '', name ?? '']}
        />
        <Legend wrapperStyle={{ fontSize: '0.8rem', paddingTop: '8px' }} />
        <Bar dataKey="Points earned" stackId="score" fill="#38a169" />
        <Bar dataKey="Points available" stackId="score" fill="#e2e8f0" />
      </BarChart>
    </ResponsiveContainer>
  );
}
