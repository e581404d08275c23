/**
 * Utility functions for currency mapping
 */

// EVM utilities (address helpers, currency slot codec)
export * from './evm/index.js';
