/**
 * FanCurveChart
 *
 * Selected inducer's sampled curve against the system curve P = k × Q², with
 * the design point marked. Reads the plot record straight from VentingOutputV1.
 */
import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  Legend,
  ResponsiveContainer,
  ReferenceDot,
} from 'recharts';
import type { FanCurvePlotV1 } from '../../contracts/VentingOutputV1';

interface Props {
  plot: FanCurvePlotV1;
  height?: number;
}

export default function FanCurveChart({ plot, height = 260 }: Props) {
  const { designPoint } = plot;
  const maxPressure = Math.max(
    ...plot.curve.map(p => p.pressureInWc),
    ...plot.systemCurve.map(p => p.pressureInWc),
    designPoint.pressureInWc,
  );

  return (
    <div>
      <div style={{ fontSize: '0.85rem', fontWeight: 600, marginBottom: 4 }}>
        {`${plot.modelId}: ${plot.fanPressureAtDesignInWc.toFixed(3)} in. w.c. at ${designPoint.flowCfm.toFixed(1)} cfm`}
      </div>
      <div style={{ width: '100%', height }}>
        <ResponsiveContainer width="100%" height="100%">
          <LineChart margin={{ top: 5, right: 20, left: 0, bottom: 5 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="#f0f0f0" />
            <XAxis
              type="number"
              dataKey="flowCfm"
              domain={[0, 'dataMax']}
              tick={{ fontSize: 10 }}
              label={{ value: 'Flow (cfm)', position: 'insideBottom', offset: -2, fontSize: 11 }}
            />
            <YAxis
              type="number"
              domain={[0, Math.ceil(maxPressure * 10) / 10]}
              tick={{ fontSize: 10 }}
              label={{ value: 'Pressure (in. w.c.)', angle: -90, position: 'insideLeft', fontSize: 11 }}
            />
            <Tooltip contentStyle={{ fontSize: '0.85rem', borderRadius: '8px' }} />
            <Legend wrapperStyle={{ fontSize: '0.8rem', paddingTop: '8px' }} />
            <Line
              data={plot.curve}
              dataKey="pressureInWc"
              name={`${plot.modelId} fan curve`}
              type="linear"
              stroke="#3182ce"
              strokeWidth={2.5}
            />
            <Line
              data={plot.systemCurve}
              dataKey="pressureInWc"
              name="System curve"
              type="monotone"
              stroke="#ed8936"
              strokeDasharray="4 4"
              strokeWidth={2}
              dot={false}
            />
            <ReferenceDot
              x={designPoint.flowCfm}
              y={designPoint.pressureInWc}
              r={5}
              fill="#e53e3e"
              stroke="none"
              label={{ value: 'Design point', fontSize: 10, fill: '#e53e3e', position: 'top' }}
            />
          </LineChart>
        </ResponsiveContainer>
      </div>
    </div>
  );
}
