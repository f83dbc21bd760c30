/**
 * Outbreak & Probability chart
 *
 * - 95% prediction interval (grey band)
 * - Forecast mean (orange line with points)
 * - Threshold = rolling mean + z·SD (purple, dashed)
 * - P(exceed) on the right axis (green), fixed to [0, 1]
 */

import { Area, CartesianGrid, ComposedChart, Line, XAxis, YAxis } from 'recharts';
import type { SignalRow } from '@core/types';
import { buildOutbreakChartRows, computeOutbreakYDomain } from '@/lib/chartData';
import { BAND_OPACITY, CHART_COLORS, CHART_SIZE } from '@/config/chartConfig';
import { ChartLegend } from './ChartLegend';

interface OutbreakChartProps {
  rows: SignalRow[];
  width?: number;
  height?: number;
}

const formatTick = (value: number) => (Number.isInteger(value) ? String(value) : value.toFixed(1));

export function OutbreakChart({
  rows,
  width = CHART_SIZE.outbreak.width,
  height = CHART_SIZE.outbreak.height
}: OutbreakChartProps) {
  const chartRows = buildOutbreakChartRows(rows);
  const yDomain = computeOutbreakYDomain(rows);

  return (
    <>
      <ComposedChart width={width} height={height} data={chartRows} margin={{ top: 10, right: 10, bottom: 30, left: 10 }}>
        <CartesianGrid stroke={CHART_COLORS.grid} strokeOpacity={0.3} />
        <XAxis
          dataKey="label"
          stroke={CHART_COLORS.axis}
          label={{ value: 'Time', position: 'insideBottom', offset: -15 }}
        />
        <YAxis
          yAxisId="cases"
          domain={yDomain}
          allowDataOverflow
          tickFormatter={formatTick}
          stroke={CHART_COLORS.axis}
          label={{ value: 'Prediction / Threshold / PI', angle: -90, position: 'insideLeft' }}
        />
        <YAxis
          yAxisId="probability"
          orientation="right"
          domain={[0, 1]}
          stroke={CHART_COLORS.axis}
          label={{ value: 'P(exceed)', angle: 90, position: 'insideRight' }}
        />
        <Area
          yAxisId="cases"
          name="95% PI"
          dataKey="band"
          stroke="none"
          fill={CHART_COLORS.band}
          fillOpacity={BAND_OPACITY}
          isAnimationActive={false}
        />
        <Line
          yAxisId="cases"
          name="Prediction"
          dataKey="forecastMean"
          stroke={CHART_COLORS.prediction}
          strokeWidth={2}
          dot={{ r: 3, fill: CHART_COLORS.prediction }}
          isAnimationActive={false}
        />
        <Line
          yAxisId="cases"
          name="Threshold"
          dataKey="threshold"
          stroke={CHART_COLORS.threshold}
          strokeDasharray="5 4"
          dot={false}
          isAnimationActive={false}
        />
        <Line
          yAxisId="probability"
          name="P(exceed)"
          dataKey="exceedProbability"
          stroke={CHART_COLORS.probability}
          strokeWidth={2}
          dot={false}
          isAnimationActive={false}
        />
      </ComposedChart>
      <ChartLegend
        items={[
          { label: 'Prediction', color: CHART_COLORS.prediction },
          { label: 'Threshold', color: CHART_COLORS.threshold, variant: 'dashed' },
          { label: '95% PI', color: CHART_COLORS.band, variant: 'band' },
          { label: 'P(exceed)', color: CHART_COLORS.probability }
        ]}
      />
    </>
  );
}
