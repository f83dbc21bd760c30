/**
 * Outbreak Signals: Configuration
 *
 * Defaults for the signal computation and the plot run, plus the
 * environment-driven run configuration used by the CLI.
 */

import path from 'path';
import { z } from 'zod';
import { OUTBREAK_DEFAULTS } from './defaults';
import { ConfigError } from './errors';
import { LOG_LEVELS, type LogLevel } from './logger';

export { OUTBREAK_DEFAULTS };

export const PLOTTER_KINDS = ['scatter', 'metric_abs_error', 'outbreak_prob'] as const;

export type PlotterKind = (typeof PLOTTER_KINDS)[number];

export const DATA_FILES = {
    forecasts: 'forecasts.csv',
    observations: 'observations.csv'
} as const;

/**
 * Check if running in test environment.
 */
export function isTestEnvironment(env: Record<string, string | undefined> = process.env): boolean {
    return env.NODE_ENV === 'test' || env.VITEST === 'true';
}

// =============================================================================
// Run Configuration
// =============================================================================

export interface RunConfig {
    dataDir: string;
    outDir: string;
    forecastsPath: string;
    observationsPath: string;
    plotters: PlotterKind[];
    outbreak: {
        window: number;
        z: number;
    };
    logLevel: LogLevel;
}

const RunEnvSchema = z.object({
    PLOT_DATA_DIR: z.string().default('example_data'),
    PLOT_OUT_DIR: z.string().default('output'),
    PLOTTERS: z.string().optional(),
    OUTBREAK_WINDOW: z.coerce.number().int().nonnegative().default(OUTBREAK_DEFAULTS.window),
    OUTBREAK_Z: z.coerce.number().finite().default(OUTBREAK_DEFAULTS.z),
    LOG_LEVEL: z.enum(LOG_LEVELS).optional()
});

type RunEnvKey = keyof z.infer<typeof RunEnvSchema>;

const RUN_ENV_KEYS = [
    'PLOT_DATA_DIR',
    'PLOT_OUT_DIR',
    'PLOTTERS',
    'OUTBREAK_WINDOW',
    'OUTBREAK_Z',
    'LOG_LEVEL'
] as const satisfies readonly RunEnvKey[];

function isPlotterKind(value: string): value is PlotterKind {
    return PLOTTER_KINDS.some((kind) => kind === value);
}

/**
 * Parse a comma-separated plotter list. Empty selects every plotter.
 */
export function parsePlotterList(raw: string | undefined): PlotterKind[] {
    const names = (raw ?? '')
        .split(',')
        .map((name) => name.trim())
        .filter(Boolean);

    if (names.length === 0) return [...PLOTTER_KINDS];

    const kinds: PlotterKind[] = [];
    for (const name of names) {
        if (!isPlotterKind(name)) {
            throw new ConfigError(
                `Unknown plotter "${name}" (expected one of ${PLOTTER_KINDS.join(', ')})`,
                'PLOTTERS'
            );
        }
        if (!kinds.includes(name)) kinds.push(name);
    }
    return kinds;
}

/**
 * Resolve the run configuration from environment variables.
 * Empty variables count as unset; relative directories resolve against `cwd`.
 */
export function loadRunConfig(
    env: Record<string, string | undefined> = process.env,
    cwd: string = process.cwd()
): RunConfig {
    const raw: Partial<Record<RunEnvKey, string>> = {};
    for (const key of RUN_ENV_KEYS) {
        const value = env[key]?.trim();
        if (value) raw[key] = value;
    }

    const parsed = RunEnvSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const key = String(issue?.path[0] ?? 'env');
        throw new ConfigError(`Invalid ${key}: ${issue?.message ?? 'invalid value'}`, key);
    }

    const values = parsed.data;
    const dataDir = path.resolve(cwd, values.PLOT_DATA_DIR);

    return {
        dataDir,
        outDir: path.resolve(cwd, values.PLOT_OUT_DIR),
        forecastsPath: path.join(dataDir, DATA_FILES.forecasts),
        observationsPath: path.join(dataDir, DATA_FILES.observations),
        plotters: parsePlotterList(values.PLOTTERS),
        outbreak: {
            window: values.OUTBREAK_WINDOW,
            z: values.OUTBREAK_Z
        },
        logLevel: values.LOG_LEVEL ?? (isTestEnvironment(env) ? 'warn' : 'info')
    };
}
