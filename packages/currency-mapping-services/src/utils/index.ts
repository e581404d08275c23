/**
 * Utility functions for the services layer
 */

// ERC-20 ABI and metadata reads
export * from './evm/index.js';
