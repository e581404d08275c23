/**
 * ERC-20 Mapping Store
 *
 * Append-only table of registered ERC-20 contracts. Each entry gets a
 * currency id of RESERVED_OFFSET + sequence, the sequence starting at 1.
 * Entries are never updated or removed and ids are never reused.
 */

import type { Address } from 'viem';
import { RESERVED_OFFSET } from '@currency-mapping/shared';

export const MAX_CURRENCY_ID = 0xffff_ffff;

/**
 * A registered ERC-20 contract
 */
export interface Erc20Info {
  /** Contract address (EIP-55 checksummed) */
  readonly address: Address;

  /** Assigned currency id, always >= RESERVED_OFFSET */
  readonly currencyId: number;

  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;

  /** When the entry was committed */
  readonly registeredAt: Date;
}

/**
 * Input for a new entry; the store assigns currencyId and registeredAt
 */
export type NewErc20Info = Omit<Erc20Info, 'currencyId' | 'registeredAt'>;

/**
 * Storage seam for the ERC-20 registry.
 *
 * Reads and the insert are synchronous so a caller can check and commit
 * without yielding in between.
 */
export interface Erc20MappingStore {
  readonly size: number;

  findByAddress(address: string): Erc20Info | null;
  findByCurrencyId(currencyId: number): Erc20Info | null;

  /** Case-insensitive symbol lookup */
  findBySymbol(symbol: string): Erc20Info | null;

  /** Currency id the next insert will receive */
  peekNextCurrencyId(): number;

  /**
   * Append an entry
   *
   * @throws Error if the address or symbol is already present
   */
  insert(info: NewErc20Info): Erc20Info;

  /** All entries in registration order */
  list(): Erc20Info[];
}

/**
 * In-process store: an ordered entry list plus three indexes.
 */
export class InMemoryErc20MappingStore implements Erc20MappingStore {
  private readonly entries: Erc20Info[] = [];
  private readonly byAddress = new Map<string, Erc20Info>();
  private readonly byCurrencyId = new Map<number, Erc20Info>();
  private readonly bySymbol = new Map<string, Erc20Info>();
  private nextSequence: number;

  constructor(
    private readonly now: () => Date = () => new Date(),
    firstSequence = 1
  ) {
    this.nextSequence = firstSequence;
  }

  get size(): number {
    return this.entries.length;
  }

  findByAddress(address: string): Erc20Info | null {
    return this.byAddress.get(address.toLowerCase()) ?? null;
  }

  findByCurrencyId(currencyId: number): Erc20Info | null {
    return this.byCurrencyId.get(currencyId) ?? null;
  }

  findBySymbol(symbol: string): Erc20Info | null {
    return this.bySymbol.get(symbol.toUpperCase()) ?? null;
  }

  peekNextCurrencyId(): number {
    return RESERVED_OFFSET + this.nextSequence;
  }

  insert(info: NewErc20Info): Erc20Info {
    const addressKey = info.address.toLowerCase();
    const symbolKey = info.symbol.toUpperCase();

    if (this.byAddress.has(addressKey)) {
      throw new Error(`ERC-20 mapping for ${info.address} already exists`);
    }
    if (this.bySymbol.has(symbolKey)) {
      throw new Error(`ERC-20 mapping for symbol ${info.symbol} already exists`);
    }
    if (this.peekNextCurrencyId() > MAX_CURRENCY_ID) {
      throw new Error('ERC-20 currency id space exhausted');
    }

    const entry: Erc20Info = {
      address: info.address,
      currencyId: this.peekNextCurrencyId(),
      name: info.name,
      symbol: info.symbol,
      decimals: info.decimals,
      registeredAt: this.now(),
    };

    this.entries.push(entry);
    this.byAddress.set(addressKey, entry);
    this.byCurrencyId.set(entry.currencyId, entry);
    this.bySymbol.set(symbolKey, entry);
    this.nextSequence += 1;

    return entry;
  }

  list(): Erc20Info[] {
    return [...this.entries];
  }
}
