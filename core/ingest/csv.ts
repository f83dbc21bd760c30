/**
 * Outbreak Signals: CSV Ingest
 *
 * Reads flat observation and forecast tables. Cells are parsed as plain text
 * and validated row by row; empty or NaN numeric cells become null.
 */

import { readFile } from 'fs/promises';
import * as XLSX from 'xlsx';
import { z } from 'zod';
import { DataLoadError, getErrorMessage } from '../errors';
import type { FlatForecastRow, FlatObservedRow, ForecastSample, Observation, TimeBucket } from '../types';

// =============================================================================
// Cell Schemas
// =============================================================================

const NUMERIC_LITERAL = /^-?\d+(\.\d+)?$/;

const textCell = z.string({
    required_error: 'value is required',
    invalid_type_error: 'value is required'
});

const numericCell = z.preprocess(
    (value) => {
        if (value === null || value === undefined) return null;
        const text = String(value);
        if (/^nan$/i.test(text)) return null;
        return Number(text);
    },
    z.number({ invalid_type_error: 'expected a number' }).finite('expected a finite number').nullable()
);

const ObservedRowSchema = z.object({
    location: textCell,
    time_period: textCell,
    disease_cases: numericCell
});

const ForecastRowSchema = z.object({
    location: textCell,
    time_period: textCell,
    horizon_distance: numericCell,
    sample: numericCell,
    forecast: numericCell
});

const OBSERVED_COLUMNS = {
    required: ['location', 'time_period', 'disease_cases'],
    optional: []
} as const;

const FORECAST_COLUMNS = {
    required: ['location', 'time_period', 'forecast'],
    optional: ['horizon_distance', 'sample']
} as const;

// =============================================================================
// Table Parsing
// =============================================================================

interface ColumnSet {
    required: readonly string[];
    optional: readonly string[];
}

interface TableRecord {
    line: number;
    cells: Record<string, string | null>;
}

function cellText(value: unknown): string | null {
    if (value === null || value === undefined) return null;
    const text = String(value).trim();
    return text === '' ? null : text;
}

/**
 * Split CSV text into header-keyed records. `line` is 1-based, header included.
 */
function readTable(text: string, source: string, columns: ColumnSet): TableRecord[] {
    if (text.trim() === '') {
        throw new DataLoadError(`${source}: missing header row`, source, 1);
    }

    let rows: unknown[][];
    try {
        const workbook = XLSX.read(text, { type: 'string', raw: true });
        const firstSheetName = workbook.SheetNames[0];
        const sheet = firstSheetName ? workbook.Sheets[firstSheetName] : undefined;
        if (!sheet) throw new Error('no worksheet');
        rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: null, blankrows: true });
    } catch (error) {
        throw new DataLoadError(`${source}: could not parse CSV (${getErrorMessage(error)})`, source);
    }

    const header = (rows[0] ?? []).map((cell) => cellText(cell) ?? '');
    const missing = columns.required.filter((column) => !header.includes(column));
    if (missing.length > 0) {
        throw new DataLoadError(`${source}: missing column(s) ${missing.join(', ')}`, source, 1);
    }

    const wanted = [...columns.required, ...columns.optional];
    const records: TableRecord[] = [];

    rows.slice(1).forEach((row, i) => {
        const cells: Record<string, string | null> = {};
        for (const column of wanted) {
            const index = header.indexOf(column);
            cells[column] = index >= 0 ? cellText(row[index]) : null;
        }
        if (Object.values(cells).every((value) => value === null)) return;
        records.push({ line: i + 2, cells });
    });

    return records;
}

function validateRecord<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, record: TableRecord, source: string): T {
    const parsed = schema.safeParse(record.cells);
    if (parsed.success) return parsed.data;

    const issue = parsed.error.issues[0];
    const column = String(issue?.path[0] ?? 'row');
    throw new DataLoadError(
        `${source}: invalid ${column} on line ${record.line}: ${issue?.message ?? 'invalid value'}`,
        source,
        record.line
    );
}

/**
 * Numeric time periods when every value of the column is a numeric literal,
 * strings otherwise.
 */
function resolveTimePeriods(values: string[]): TimeBucket[] {
    if (values.length > 0 && values.every((value) => NUMERIC_LITERAL.test(value))) {
        return values.map(Number);
    }
    return values;
}

// =============================================================================
// Public API
// =============================================================================

export function parseObservationsCsv(text: string, source: string = 'observations.csv'): FlatObservedRow[] {
    const rows = readTable(text, source, OBSERVED_COLUMNS).map((record) =>
        validateRecord(ObservedRowSchema, record, source)
    );
    const timePeriods = resolveTimePeriods(rows.map((row) => row.time_period));

    return rows.map((row, i) => ({
        location: row.location,
        timePeriod: timePeriods[i],
        diseaseCases: row.disease_cases
    }));
}

export function parseForecastsCsv(text: string, source: string = 'forecasts.csv'): FlatForecastRow[] {
    const rows = readTable(text, source, FORECAST_COLUMNS).map((record) =>
        validateRecord(ForecastRowSchema, record, source)
    );
    const timePeriods = resolveTimePeriods(rows.map((row) => row.time_period));

    return rows.map((row, i) => ({
        location: row.location,
        timePeriod: timePeriods[i],
        horizonDistance: row.horizon_distance,
        sample: row.sample,
        forecast: row.forecast
    }));
}

async function readText(filePath: string): Promise<string> {
    try {
        return await readFile(filePath, 'utf8');
    } catch (error) {
        throw new DataLoadError(`Could not read ${filePath}: ${getErrorMessage(error)}`, filePath);
    }
}

export async function loadObservationsCsv(filePath: string): Promise<FlatObservedRow[]> {
    return parseObservationsCsv(await readText(filePath), filePath);
}

export async function loadForecastsCsv(filePath: string): Promise<FlatForecastRow[]> {
    return parseForecastsCsv(await readText(filePath), filePath);
}

// =============================================================================
// Flat Rows → Core Inputs
// =============================================================================

export function toObservations(rows: FlatObservedRow[]): Observation[] {
    const observations: Observation[] = [];
    for (const row of rows) {
        if (row.diseaseCases === null) continue;
        observations.push({ location: row.location, timeBucket: row.timePeriod, value: row.diseaseCases });
    }
    return observations;
}

export function toForecastSamples(rows: FlatForecastRow[]): ForecastSample[] {
    const samples: ForecastSample[] = [];
    for (const row of rows) {
        if (row.forecast === null) continue;
        samples.push({
            timeBucket: row.timePeriod,
            value: row.forecast,
            location: row.location,
            ...(row.sample !== null ? { sample: row.sample } : {})
        });
    }
    return samples;
}
