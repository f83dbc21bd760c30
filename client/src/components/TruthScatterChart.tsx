/**
 * Truth vs prediction scatter with a dashed 45° reference line.
 */

import { CartesianGrid, ReferenceLine, Scatter, ScatterChart, XAxis, YAxis } from 'recharts';
import type { ScatterData } from '@/lib/chartData';
import { CHART_COLORS, CHART_SIZE } from '@/config/chartConfig';
import { ChartLegend } from './ChartLegend';

interface TruthScatterChartProps {
  data: ScatterData;
  width?: number;
  height?: number;
}

export function TruthScatterChart({
  data,
  width = CHART_SIZE.scatter.width,
  height = CHART_SIZE.scatter.height
}: TruthScatterChartProps) {
  const { points, referenceMax } = data;

  return (
    <>
      <ScatterChart width={width} height={height} margin={{ top: 10, right: 20, bottom: 30, left: 10 }}>
        <CartesianGrid stroke={CHART_COLORS.grid} strokeOpacity={0.3} />
        <XAxis
          type="number"
          dataKey="observed"
          name="Observed cases"
          domain={[0, 'auto']}
          stroke={CHART_COLORS.axis}
          label={{ value: 'Observed cases', position: 'insideBottom', offset: -15 }}
        />
        <YAxis
          type="number"
          dataKey="forecast"
          name="Predicted cases"
          domain={[0, 'auto']}
          stroke={CHART_COLORS.axis}
          label={{ value: 'Predicted cases', angle: -90, position: 'insideLeft' }}
        />
        <ReferenceLine
          segment={[
            { x: 0, y: 0 },
            { x: referenceMax, y: referenceMax }
          ]}
          stroke={CHART_COLORS.reference}
          strokeWidth={2}
          strokeDasharray="4 3"
          ifOverflow="extendDomain"
        />
        <Scatter
          name="Prediction"
          data={points}
          fill={CHART_COLORS.prediction}
          fillOpacity={0.9}
          stroke="#000000"
          isAnimationActive={false}
        />
      </ScatterChart>
      <ChartLegend
        title="Legend"
        items={[
          { label: 'Prediction', color: CHART_COLORS.prediction, variant: 'point' },
          { label: '45° reference', color: CHART_COLORS.reference, variant: 'dashed' }
        ]}
      />
    </>
  );
}
