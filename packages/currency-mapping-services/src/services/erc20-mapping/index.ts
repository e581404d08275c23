/**
 * ERC-20 mapping exports
 */

export { Erc20MappingService } from './erc20-mapping-service.js';
export type { Erc20MappingServiceDependencies } from './erc20-mapping-service.js';

export { InMemoryErc20MappingStore } from './erc20-mapping-store.js';
export type { Erc20Info, Erc20MappingStore, NewErc20Info } from './erc20-mapping-store.js';

export { ViemErc20MetadataReader } from './erc20-metadata-reader.js';
export type {
  Erc20MetadataReader,
  ViemErc20MetadataReaderDependencies,
} from './erc20-metadata-reader.js';
