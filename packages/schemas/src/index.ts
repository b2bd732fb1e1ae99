/**
 * @stake-converter/schemas
 *
 * Single source of truth for all Zod schemas and TypeScript types
 * shared by the converter app and its packages
 */

// Stream frame schemas
export * from './stream/frame.schema';
export * from './stream/supervisor-state.schema';

// Conversion request/reply schemas
export * from './conversion/conversion.schema';

// Rate table schemas
export * from './rates/rate-table.schema';

// Environment and configuration schemas
export * from './env/config.schema';
