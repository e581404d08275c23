/**
 * @currency-mapping/shared
 *
 * Currency-id types, the native token table and the slot codec.
 * Pure and stateless; used by the services package and by any consumer
 * that only needs to read or build slots.
 */

// Export all types
export * from './types/index.js';

// Export all utilities
export * from './utils/index.js';
