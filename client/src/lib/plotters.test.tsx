import { afterEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import type { PlotInput } from '@core/ingest/pipeline';
import { createPlotters, renderPlotDocument, writePlot } from './plotters';

const input: PlotInput = {
  forecasts: [
    { location: 'loc1', timePeriod: '2023-W01', horizonDistance: 1, sample: 0, forecast: 10 },
    { location: 'loc1', timePeriod: '2023-W01', horizonDistance: 1, sample: 1, forecast: 21 }
  ],
  observations: [
    { location: 'loc1', timePeriod: '2023-W01', diseaseCases: 15 },
    { location: 'loc1', timePeriod: '2023-W02', diseaseCases: 17 }
  ],
  outbreak: { window: 3, z: 2 }
};

describe('renderPlotDocument', () => {
  it('produces a standalone html document with an escaped title', () => {
    const html = renderPlotDocument('outbreak_prob', input);

    expect(html.startsWith('<!DOCTYPE html>\n<html lang="en">')).toBe(true);
    expect(html).toContain('<title>Outbreak &amp; Probability (95% PI, threshold, P(exceed))</title>');
    expect(html).toContain('recharts-surface');
  });

  it('renders every plotter kind', () => {
    for (const plotter of createPlotters(['scatter', 'metric_abs_error'])) {
      expect(plotter.renderDocument(input)).toContain('<figcaption');
    }
  });
});

describe('createPlotters', () => {
  it('keeps the requested order and names', () => {
    expect(createPlotters(['outbreak_prob', 'scatter']).map((plotter) => plotter.name)).toEqual([
      'outbreak_prob',
      'scatter'
    ]);
  });
});

describe('writePlot', () => {
  let dir = '';

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = '';
  });

  it('writes the document to the given path', async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'plot-test-'));
    const outPath = path.join(dir, 'plots', 'scatter.html');

    await expect(writePlot('scatter', input, outPath)).resolves.toBe(outPath);
    const html = await readFile(outPath, 'utf8');
    expect(html).toContain('<title>Truth vs Prediction</title>');
  });
});
