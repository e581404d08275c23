/**
 * Configuration exports
 */

export * from './env.js';
export { EvmConfig } from './evm.js';
