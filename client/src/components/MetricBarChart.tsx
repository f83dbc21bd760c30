/**
 * Bar chart of an error metric per time period, one bar per location.
 */

import { Bar, BarChart, CartesianGrid, XAxis, YAxis } from 'recharts';
import type { MetricBarData, MetricBarRow } from '@/lib/chartData';
import { CHART_COLORS, CHART_SIZE, locationColor } from '@/config/chartConfig';
import { ChartLegend } from './ChartLegend';

interface MetricBarChartProps {
  data: MetricBarData;
  metricLabel?: string;
  width?: number;
  height?: number;
}

export function MetricBarChart({
  data,
  metricLabel = 'Absolute error',
  width = CHART_SIZE.metric.width,
  height = CHART_SIZE.metric.height
}: MetricBarChartProps) {
  return (
    <>
      <BarChart width={width} height={height} data={data.rows} margin={{ top: 10, right: 10, bottom: 30, left: 10 }}>
        <CartesianGrid stroke={CHART_COLORS.grid} strokeOpacity={0.3} vertical={false} />
        <XAxis
          dataKey="label"
          stroke={CHART_COLORS.axis}
          label={{ value: 'Time period', position: 'insideBottom', offset: -15 }}
        />
        <YAxis
          stroke={CHART_COLORS.axis}
          label={{ value: metricLabel, angle: -90, position: 'insideLeft' }}
        />
        {data.locations.map((location, index) => (
          <Bar
            key={location}
            name={location}
            dataKey={(row: MetricBarRow) => row.values[location] ?? null}
            fill={locationColor(index)}
            isAnimationActive={false}
          />
        ))}
      </BarChart>
      <ChartLegend
        title="Location"
        items={data.locations.map((location, index) => ({
          label: location,
          color: locationColor(index),
          variant: 'band' as const
        }))}
      />
    </>
  );
}
