import { PieChart, Pie, Cell, Tooltip, Legend, ResponsiveContainer } from 'recharts';
import type { CarbonEstimateV1 } from '../../contracts/AssessmentOutputV1';

const SOURCE_COLOURS = {
  electricity: '#d69e2e',
  fuel: '#c05621',
  water: '#3182ce',
} as const;

const SOURCE_LABELS = {
  electricity: 'Electricity',
  fuel: 'Fuel',
  water: 'Water',
} as const;

export default function CarbonBreakdownChart({ estimate }: { estimate: CarbonEstimateV1 }) {
  const data = (['electricity', 'fuel', 'water'] as const)
    .map(source => ({ source, name: SOURCE_LABELS[source], value: estimate.breakdown[source] }))
    .filter(entry => entry.value > 0);

  if (data.length === 0) {
    return <p className="chart-empty">No consumption figures recorded for this assessment.</p>;
  }

  return (
    <ResponsiveContainer width="100%" height="100%">
      <PieChart>
        <Pie data={data} dataKey="value" nameKey="name" innerRadius="45%" outerRadius="75%" paddingAngle={2}>
          {data.map(entry => <Cell key={entry.source} fill={SOURCE_COLOURS[entry.source]} />)}
        </Pie>
        <Tooltip
          contentStyle={{ fontSize: '0.85rem', borderRadius: '8px' }}
          formatter={(value: number | undefined, name: string | undefined) => [value !== undefined ? `${value.toLocaleString('en-US')} kgCO₂e` : '', name ?? '']}
        />
        <Legend wrapperStyle={{ fontSize: '0.8rem' }} />
      </PieChart>
    </ResponsiveContainer>
  );
}
