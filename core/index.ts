/**
 * Outbreak Signals: Main Entry Point
 *
 * Re-exports all public APIs.
 */

// Core types
export * from './types';

// Errors
export * from './errors';

// Time bucket ordering
export * from './time';

// Statistics and smoothing
export * from './stats';
export * from './smoothing';

// Outbreak probability
export * from './outbreak';

// Error metrics
export * from './metrics';

// Configuration and logging
export * from './config';
export * from './logger';

// Ingest
export * from './ingest/csv';
export * from './ingest/pipeline';
