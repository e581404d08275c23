export { EvmCurrencyIdMapping } from './evm-currency-id-mapping.js';
export type { EvmCurrencyIdMappingDependencies } from './evm-currency-id-mapping.js';
