/**
 * Plotters: a closed set of chart kinds, each rendering one static HTML document.
 */

import type { ReactElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import type { PlotterKind } from '@core/config';
import { toForecastSamples, toObservations } from '@core/ingest/csv';
import { writeDocument, type PlotInput, type Plotter } from '@core/ingest/pipeline';
import { computeAbsoluteError } from '@core/metrics';
import { computeOutbreakSignal } from '@core/outbreak';
import { MetricBarChart } from '@/components/MetricBarChart';
import { OutbreakChart } from '@/components/OutbreakChart';
import { PlotDocument } from '@/components/PlotDocument';
import { TruthScatterChart } from '@/components/TruthScatterChart';
import { buildMetricBars, buildScatterData } from './chartData';

export interface PlotterDefinition {
  kind: PlotterKind;
  /** Output file stem */
  name: string;
  title: string;
  render(input: PlotInput): ReactElement;
}

export const PLOTTER_DEFINITIONS: Record<PlotterKind, PlotterDefinition> = {
  scatter: {
    kind: 'scatter',
    name: 'scatter',
    title: 'Truth vs Prediction',
    render: ({ forecasts, observations }) => (
      <TruthScatterChart data={buildScatterData(forecasts, observations)} />
    )
  },
  metric_abs_error: {
    kind: 'metric_abs_error',
    name: 'metric_abs_error',
    title: 'Absolute Error per Location & Time',
    render: ({ forecasts, observations }) => (
      <MetricBarChart data={buildMetricBars(computeAbsoluteError(forecasts, observations))} />
    )
  },
  outbreak_prob: {
    kind: 'outbreak_prob',
    name: 'outbreak_prob',
    title: 'Outbreak & Probability (95% PI, threshold, P(exceed))',
    render: ({ forecasts, observations, outbreak }) => (
      <OutbreakChart
        rows={computeOutbreakSignal(toObservations(observations), toForecastSamples(forecasts), outbreak)}
      />
    )
  }
};

export function renderPlotDocument(kind: PlotterKind, input: PlotInput): string {
  const definition = PLOTTER_DEFINITIONS[kind];
  const markup = renderToStaticMarkup(
    <PlotDocument title={definition.title}>{definition.render(input)}</PlotDocument>
  );
  return `<!DOCTYPE html>\n${markup}\n`;
}

export function createPlotter(kind: PlotterKind): Plotter {
  const { name } = PLOTTER_DEFINITIONS[kind];
  return {
    kind,
    name,
    renderDocument: (input) => renderPlotDocument(kind, input)
  };
}

export function createPlotters(kinds: PlotterKind[]): Plotter[] {
  return kinds.map(createPlotter);
}

/**
 * Render one plot and write it to `outPath`, creating the directory if needed.
 */
export async function writePlot(kind: PlotterKind, input: PlotInput, outPath: string): Promise<string> {
  return writeDocument(outPath, renderPlotDocument(kind, input));
}
