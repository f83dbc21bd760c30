/**
 * Outbreak Signals: Error Types
 *
 * Missing data is not an error anywhere in the core; it propagates as `null`.
 */

/**
 * Input that cannot be computed on, such as time-bucket keys without a
 * consistent total order or an invalid smoothing radius.
 */
export class InvalidInputError extends Error {
    constructor(message: string, public field?: string) {
        super(message);
        this.name = 'InvalidInputError';
    }
}

/**
 * A data file that could not be read, or a row that failed validation.
 * `line` is 1-based and counts the header row.
 */
export class DataLoadError extends Error {
    constructor(message: string, public source: string, public line?: number) {
        super(message);
        this.name = 'DataLoadError';
    }
}

export class ConfigError extends Error {
    constructor(message: string, public key: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    return 'An unknown error occurred';
}
