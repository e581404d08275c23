/**
 * ERC-20 Metadata Reader
 *
 * Collaborator the registry asks for a contract's name, symbol and decimals.
 */

import type { Address } from 'viem';
import { EvmConfig } from '../../config/evm.js';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import {
  readTokenMetadata,
  type MetadataClient,
  type TokenMetadata,
} from '../../utils/evm/token-metadata.js';

export interface Erc20MetadataReader {
  /**
   * @throws Error if the address does not host a conforming ERC-20 contract
   */
  readMetadata(address: Address): Promise<TokenMetadata>;
}

/**
 * Dependencies for ViemErc20MetadataReader
 * All dependencies are optional and will use defaults if not provided
 */
export interface ViemErc20MetadataReaderDependencies {
  /**
   * EVM configuration for RPC access
   * If not provided, the singleton EvmConfig instance will be used
   */
  evmConfig?: EvmConfig;

  /**
   * Client to read through; takes precedence over evmConfig
   */
  client?: MetadataClient;
}

/**
 * Reads ERC-20 metadata over JSON-RPC with viem
 */
export class ViemErc20MetadataReader implements Erc20MetadataReader {
  private readonly evmConfig?: EvmConfig;
  private readonly client?: MetadataClient;
  private readonly logger: ServiceLogger;

  constructor(dependencies: ViemErc20MetadataReaderDependencies = {}) {
    this.evmConfig = dependencies.evmConfig;
    this.client = dependencies.client;
    this.logger = createServiceLogger('ViemErc20MetadataReader');
  }

  async readMetadata(address: Address): Promise<TokenMetadata> {
    const client = this.client ?? (this.evmConfig ?? EvmConfig.getInstance()).getPublicClient();

    log.externalApiCall(this.logger, 'EVM RPC', 'erc20 metadata', { address });
    return readTokenMetadata(client, address);
  }
}
