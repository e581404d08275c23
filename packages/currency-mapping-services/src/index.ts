/**
 * Currency Mapping - Services
 *
 * ERC-20 registry and the EVM currency-id mapping built on top of
 * @currency-mapping/shared.
 */

// Re-export shared types and the slot codec
export * from '@currency-mapping/shared';

// Export utilities
export * from './utils/index.js';

// Export configuration
export * from './config/index.js';

// Export logging utilities
export * from './logging/index.js';

// Export errors
export * from './errors/index.js';

// Export services
export * from './services/erc20-mapping/index.js';
export * from './services/currency-mapping/index.js';
