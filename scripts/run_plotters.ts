/**
 * Load the example forecasts and observations once, run every configured
 * plotter and write one HTML document per plotter.
 *
 * Environment: PLOT_DATA_DIR, PLOT_OUT_DIR, PLOTTERS, OUTBREAK_WINDOW,
 * OUTBREAK_Z, LOG_LEVEL (see core/config.ts).
 */

import { loadRunConfig } from '../core/config';
import { getErrorMessage } from '../core/errors';
import { runPlotters } from '../core/ingest/pipeline';
import { createLogger, setLogLevel } from '../core/logger';
import { createPlotters } from '../client/src/lib/plotters';

const log = createLogger('main');

async function main(): Promise<void> {
    const config = loadRunConfig();
    setLogLevel(config.logLevel);

    const results = await runPlotters({
        forecastsPath: config.forecastsPath,
        observationsPath: config.observationsPath,
        outDir: config.outDir,
        plotters: createPlotters(config.plotters),
        outbreak: config.outbreak
    });

    for (const { kind, outPath } of results) {
        log.info(`${kind}: ${outPath}`);
    }
}

main().catch((error: unknown) => {
    log.error(getErrorMessage(error));
    process.exitCode = 1;
});
