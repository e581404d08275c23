/**
 * EvmCurrencyIdMapping
 *
 * Single entry point for the EVM side: decimals, names and symbols of any
 * currency id, slot encoding and decoding, and address lookups. Native tokens
 * resolve against the static token table, ERC-20 contracts against the
 * registry.
 */

import type { Address, Hex } from 'viem';
import {
  decodeCurrencyId,
  encodeCurrencyId,
  formatCurrencyId,
  getTokenDecimals,
  getTokenName,
  type CurrencyId,
  type DexShare,
} from '@currency-mapping/shared';
import { createServiceLogger } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { Erc20MappingService } from '../erc20-mapping/erc20-mapping-service.js';
import type { Erc20Info } from '../erc20-mapping/erc20-mapping-store.js';

/**
 * Dependencies for EvmCurrencyIdMapping
 */
export interface EvmCurrencyIdMappingDependencies {
  /**
   * ERC-20 registry
   * If not provided, a new Erc20MappingService with default dependencies is created
   */
  erc20MappingService?: Erc20MappingService;
}

export class EvmCurrencyIdMapping {
  private readonly erc20Mapping: Erc20MappingService;
  private readonly logger: ServiceLogger;

  constructor(dependencies: EvmCurrencyIdMappingDependencies = {}) {
    this.erc20Mapping = dependencies.erc20MappingService ?? new Erc20MappingService();
    this.logger = createServiceLogger('EvmCurrencyIdMapping');
  }

  /**
   * Register an ERC-20 contract. See {@link Erc20MappingService.register}.
   */
  register(address: string): Promise<Erc20Info> {
    return this.erc20Mapping.register(address);
  }

  // ============================================================================
  // METADATA
  // ============================================================================

  /**
   * Decimal precision of a currency
   *
   * @returns Token decimals, registered ERC-20 decimals, or null for
   * unregistered contracts and dex shares
   */
  decimals(currencyId: CurrencyId): number | null {
    switch (currencyId.type) {
      case 'token':
        return getTokenDecimals(currencyId.symbol);
      case 'erc20':
        return this.erc20Mapping.getDecimals(currencyId.address);
      case 'dex-share':
        return null;
    }
  }

  /**
   * Display name. Dex shares read "LP <left> - <right>".
   */
  name(currencyId: CurrencyId): string | null {
    switch (currencyId.type) {
      case 'token':
      case 'erc20':
        return this.legName(currencyId);
      case 'dex-share': {
        const left = this.legName(currencyId.left);
        const right = this.legName(currencyId.right);
        return left === null || right === null ? null : `LP ${left} - ${right}`;
      }
    }
  }

  /**
   * Ticker symbol. Dex shares read "LP_<left>_<right>".
   */
  symbol(currencyId: CurrencyId): string | null {
    switch (currencyId.type) {
      case 'token':
      case 'erc20':
        return this.legSymbol(currencyId);
      case 'dex-share': {
        const left = this.legSymbol(currencyId.left);
        const right = this.legSymbol(currencyId.right);
        return left === null || right === null ? null : `LP_${left}_${right}`;
      }
    }
  }

  private legName(leg: DexShare): string | null {
    return leg.type === 'token'
      ? getTokenName(leg.symbol)
      : (this.erc20Mapping.getErc20Info(leg.address)?.name ?? null);
  }

  private legSymbol(leg: DexShare): string | null {
    return leg.type === 'token'
      ? leg.symbol
      : (this.erc20Mapping.getErc20Info(leg.address)?.symbol ?? null);
  }

  // ============================================================================
  // SLOT CODEC
  // ============================================================================

  /**
   * Encode a currency id into its 32-byte slot
   *
   * @returns The slot, or null if a dex share leg is an unregistered contract
   */
  encodeCurrencyId(currencyId: CurrencyId): Uint8Array | null {
    const slot = encodeCurrencyId(currencyId, this.erc20Mapping);
    if (slot === null) {
      this.logger.debug(
        { currencyId: formatCurrencyId(currencyId) },
        'Currency id not encodable: unregistered dex share leg'
      );
    }
    return slot;
  }

  /**
   * Decode a 32-byte slot
   *
   * @returns The currency id, or null for malformed slots
   */
  decodeCurrencyId(slot: Uint8Array | Hex): CurrencyId | null {
    return decodeCurrencyId(slot);
  }

  // ============================================================================
  // ADDRESSES
  // ============================================================================

  /**
   * 20-byte address of a currency
   *
   * @returns The registered contract address for a registered ERC-20, null otherwise
   */
  getEvmAddress(currencyId: CurrencyId): Address | null {
    switch (currencyId.type) {
      case 'erc20':
        return this.erc20Mapping.getErc20Info(currencyId.address)?.address ?? null;
      case 'token':
      case 'dex-share':
        return null;
    }
  }

  /**
   * Contract address behind a registry currency id
   */
  getAddress(currencyId: number): Address | null {
    return this.erc20Mapping.getAddress(currencyId);
  }
}
