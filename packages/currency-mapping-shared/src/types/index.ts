/**
 * Shared types for currency mapping
 */

// Currency id union and native token table
export * from './currency/index.js';
