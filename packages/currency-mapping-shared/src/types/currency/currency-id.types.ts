import { getAddress, type Address } from 'viem';
import type { TokenSymbol } from './token-table.js';

// ============================================================================
// Currency Identity
// ============================================================================

/**
 * Currency id discriminator.
 *
 * - 'token': native multi-currency token from the token table
 * - 'erc20': externally deployed ERC-20 contract
 * - 'dex-share': trading-pair identity built from two legs
 */
export type CurrencyIdType = 'token' | 'erc20' | 'dex-share';

export interface TokenCurrencyId {
  readonly type: 'token';
  readonly symbol: TokenSymbol;
}

export interface Erc20CurrencyId {
  readonly type: 'erc20';
  /** Contract address (EIP-55 checksummed) */
  readonly address: Address;
}

/**
 * One leg of a dex share. A leg is never itself a dex share.
 */
export type DexShare = TokenCurrencyId | Erc20CurrencyId;

export interface DexShareCurrencyId {
  readonly type: 'dex-share';
  readonly left: DexShare;
  readonly right: DexShare;
}

export type CurrencyId = TokenCurrencyId | Erc20CurrencyId | DexShareCurrencyId;

// ============================================================================
// Constructors
// ============================================================================

export function tokenCurrencyId(symbol: TokenSymbol): TokenCurrencyId {
  return { type: 'token', symbol };
}

/**
 * Build an ERC-20 currency id. The address is normalized to EIP-55.
 *
 * @throws Error if the address is not a valid 20-byte hex address
 */
export function erc20CurrencyId(address: string): Erc20CurrencyId {
  return { type: 'erc20', address: getAddress(address) };
}

export function dexShareCurrencyId(left: DexShare, right: DexShare): DexShareCurrencyId {
  return { type: 'dex-share', left, right };
}

// ============================================================================
// Comparison
// ============================================================================

function isSameLeg(a: DexShare, b: DexShare): boolean {
  switch (a.type) {
    case 'token':
      return b.type === 'token' && a.symbol === b.symbol;
    case 'erc20':
      return b.type === 'erc20' && a.address.toLowerCase() === b.address.toLowerCase();
  }
}

/**
 * Structural equality of two currency ids. Addresses compare case-insensitively.
 */
export function isSameCurrencyId(a: CurrencyId, b: CurrencyId): boolean {
  switch (a.type) {
    case 'token':
    case 'erc20':
      return b.type !== 'dex-share' && isSameLeg(a, b);
    case 'dex-share':
      return b.type === 'dex-share' && isSameLeg(a.left, b.left) && isSameLeg(a.right, b.right);
  }
}

/**
 * Human-readable form, e.g. "token:ACA", "erc20:0x…", "dex-share:ACA/AUSD"
 */
export function formatCurrencyId(currencyId: CurrencyId): string {
  switch (currencyId.type) {
    case 'token':
      return `token:${currencyId.symbol}`;
    case 'erc20':
      return `erc20:${currencyId.address}`;
    case 'dex-share':
      return `dex-share:${formatLeg(currencyId.left)}/${formatLeg(currencyId.right)}`;
  }
}

function formatLeg(leg: DexShare): string {
  return leg.type === 'token' ? leg.symbol : leg.address;
}
