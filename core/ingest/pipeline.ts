/**
 * Outbreak Signals: Plot Pipeline
 *
 * Loads the flat forecast and observation tables once, then runs each plotter
 * in order and writes one document per plotter to the output directory.
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { OUTBREAK_DEFAULTS, type PlotterKind } from '../config';
import { createLogger } from '../logger';
import type { FlatForecastRow, FlatObservedRow } from '../types';
import { loadForecastsCsv, loadObservationsCsv } from './csv';

const log = createLogger('plot');

// =============================================================================
// Plotter Interface (implemented by the chart layer)
// =============================================================================

export interface PlotInput {
    forecasts: FlatForecastRow[];
    observations: FlatObservedRow[];
    outbreak: {
        window: number;
        z: number;
    };
}

export interface Plotter {
    kind: PlotterKind;

    /** Short name used for the output file name (e.g. "scatter" → scatter.html) */
    name: string;

    /** Render a standalone document for the given input */
    renderDocument(input: PlotInput): string;
}

// =============================================================================
// Runner
// =============================================================================

export interface PlotRunOptions {
    forecastsPath: string;
    observationsPath: string;
    outDir: string;
    plotters: Plotter[];
    outbreak?: Partial<PlotInput['outbreak']>;
}

export interface PlotRunResult {
    kind: PlotterKind;
    outPath: string;
}

/**
 * Write a rendered document, creating the parent directory when needed.
 */
export async function writeDocument(outPath: string, document: string): Promise<string> {
    const outDir = path.dirname(outPath);
    if (outDir) {
        await mkdir(outDir, { recursive: true });
    }
    await writeFile(outPath, document, 'utf8');
    return outPath;
}

export async function runPlotters(options: PlotRunOptions): Promise<PlotRunResult[]> {
    const { forecastsPath, observationsPath, outDir, plotters } = options;

    const forecasts = await loadForecastsCsv(forecastsPath);
    const observations = await loadObservationsCsv(observationsPath);
    log.debug(`Loaded ${forecasts.length} forecast rows, ${observations.length} observation rows`);

    const input: PlotInput = {
        forecasts,
        observations,
        outbreak: {
            window: options.outbreak?.window ?? OUTBREAK_DEFAULTS.window,
            z: options.outbreak?.z ?? OUTBREAK_DEFAULTS.z
        }
    };

    await mkdir(outDir, { recursive: true });

    const results: PlotRunResult[] = [];
    for (const plotter of plotters) {
        const outPath = path.join(outDir, `${plotter.name}.html`);
        log.info(`Running plotter '${plotter.name}' → ${outPath}`);
        await writeDocument(outPath, plotter.renderDocument(input));
        results.push({ kind: plotter.kind, outPath });
    }

    log.info(`Wrote ${results.length} plot(s) to ${outDir}`);
    return results;
}
