/**
 * @stake-converter/utils
 *
 * Shared utility functions and helpers
 */

// Logger
export * from './logger/logger';
export * from './logger/log-config';
export * from './logger/file-transport';
export * from './logger/performance';
export * from './logger/serialize-error';

// Async helpers
export * from './async/timing';

// Math utilities
export * from './math/calculations';

// Validation utilities
export * from './validation/env-validator';
