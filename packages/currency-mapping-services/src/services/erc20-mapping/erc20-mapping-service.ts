/**
 * Erc20MappingService
 *
 * Registry of externally deployed ERC-20 contracts. Registration reads the
 * contract's metadata once, assigns a permanent currency id and caches
 * name, symbol and decimals. All lookups are synchronous reads.
 */

import type { Address } from 'viem';
import {
  RESERVED_OFFSET,
  compareAddresses,
  isValidAddress,
  normalizeAddress,
  type Erc20CurrencyIdResolver,
} from '@currency-mapping/shared';
import {
  CurrencyIdExistedError,
  InvalidAddressError,
  InvalidErc20ContractError,
} from '../../errors/index.js';
import { createServiceLogger, log } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import type { TokenMetadata } from '../../utils/evm/token-metadata.js';
import {
  InMemoryErc20MappingStore,
  type Erc20Info,
  type Erc20MappingStore,
} from './erc20-mapping-store.js';
import { ViemErc20MetadataReader, type Erc20MetadataReader } from './erc20-metadata-reader.js';

/**
 * Dependencies for Erc20MappingService
 * All dependencies are optional and will use defaults if not provided
 */
export interface Erc20MappingServiceDependencies {
  /**
   * Backing store
   * If not provided, an empty InMemoryErc20MappingStore is used
   */
  store?: Erc20MappingStore;

  /**
   * Metadata collaborator queried on registration
   * If not provided, a ViemErc20MetadataReader over the singleton EvmConfig is used
   */
  metadataReader?: Erc20MetadataReader;
}

export class Erc20MappingService implements Erc20CurrencyIdResolver {
  private readonly store: Erc20MappingStore;
  private readonly metadataReader: Erc20MetadataReader;
  private readonly logger: ServiceLogger;
  private readonly pending = new Map<string, Promise<Erc20Info>>();

  constructor(dependencies: Erc20MappingServiceDependencies = {}) {
    this.store = dependencies.store ?? new InMemoryErc20MappingStore();
    this.metadataReader = dependencies.metadataReader ?? new ViemErc20MetadataReader();
    this.logger = createServiceLogger('Erc20MappingService');
  }

  // ============================================================================
  // REGISTRATION
  // ============================================================================

  /**
   * Register an ERC-20 contract.
   *
   * Registering an address that is already registered returns the existing
   * entry without querying the contract again. Concurrent calls for the same
   * address share one registration.
   *
   * @param address - Contract address, any case
   * @returns The registry entry
   * @throws InvalidAddressError if the address is malformed
   * @throws InvalidErc20ContractError if the metadata query fails
   * @throws CurrencyIdExistedError if another address already holds the contract's symbol
   */
  async register(address: string): Promise<Erc20Info> {
    log.methodEntry(this.logger, 'register', { address });

    if (!isValidAddress(address)) {
      const error = new InvalidAddressError(address);
      log.methodError(this.logger, 'register', error, { address });
      throw error;
    }

    const normalizedAddress = normalizeAddress(address);

    const existing = this.store.findByAddress(normalizedAddress);
    if (existing) {
      this.logger.debug(
        { address: normalizedAddress, currencyId: existing.currencyId },
        'ERC-20 already registered'
      );
      log.methodExit(this.logger, 'register', { currencyId: existing.currencyId, existed: true });
      return existing;
    }

    const key = normalizedAddress.toLowerCase();
    const inFlight = this.pending.get(key);
    if (inFlight) {
      return inFlight;
    }

    const registration = this.registerNew(normalizedAddress).finally(() => {
      this.pending.delete(key);
    });
    this.pending.set(key, registration);
    return registration;
  }

  private async registerNew(address: Address): Promise<Erc20Info> {
    let metadata: TokenMetadata;
    try {
      metadata = await this.metadataReader.readMetadata(address);
    } catch (error) {
      const wrapped = new InvalidErc20ContractError(
        address,
        error instanceof Error ? error.message : String(error),
        error
      );
      log.methodError(this.logger, 'register', wrapped, { address });
      throw wrapped;
    }

    if (!Number.isInteger(metadata.decimals) || metadata.decimals < 0 || metadata.decimals > 255) {
      const error = new InvalidErc20ContractError(address, `decimals out of range: ${metadata.decimals}`);
      log.methodError(this.logger, 'register', error, { address });
      throw error;
    }

    return this.commit(address, metadata);
  }

  /**
   * Check uniqueness and insert. Runs without yielding.
   */
  private commit(address: Address, metadata: TokenMetadata): Erc20Info {
    const existing = this.store.findByAddress(address);
    if (existing) {
      log.methodExit(this.logger, 'register', { currencyId: existing.currencyId, existed: true });
      return existing;
    }

    const holder = this.store.findBySymbol(metadata.symbol);
    if (holder && !compareAddresses(holder.address, address)) {
      const error = new CurrencyIdExistedError(address, holder.address, metadata.symbol);
      log.methodError(this.logger, 'register', error, {
        address,
        symbol: metadata.symbol,
        existingAddress: holder.address,
      });
      throw error;
    }

    const info = this.store.insert({
      address,
      name: metadata.name,
      symbol: metadata.symbol,
      decimals: metadata.decimals,
    });

    this.logger.info(
      {
        address,
        currencyId: info.currencyId,
        symbol: info.symbol,
        decimals: info.decimals,
      },
      'ERC-20 registered'
    );
    log.methodExit(this.logger, 'register', { currencyId: info.currencyId, existed: false });
    return info;
  }

  // ============================================================================
  // LOOKUPS
  // ============================================================================

  /**
   * Reverse lookup of a registry currency id
   *
   * @returns The contract address, or null for unknown ids and ids below RESERVED_OFFSET
   */
  getAddress(currencyId: number): Address | null {
    if (currencyId < RESERVED_OFFSET) {
      return null;
    }
    return this.store.findByCurrencyId(currencyId)?.address ?? null;
  }

  getCurrencyId(address: string): number | null {
    return this.getErc20Info(address)?.currencyId ?? null;
  }

  getDecimals(address: string): number | null {
    return this.getErc20Info(address)?.decimals ?? null;
  }

  getErc20Info(address: string): Erc20Info | null {
    if (!isValidAddress(address)) {
      return null;
    }
    return this.store.findByAddress(address);
  }

  isRegistered(address: string): boolean {
    return this.getErc20Info(address) !== null;
  }

  /** Registered entries in registration order */
  list(): Erc20Info[] {
    return this.store.list();
  }

  get size(): number {
    return this.store.size;
  }
}
