// ============================================================================
// Native Token Table
// ============================================================================

/**
 * Boundary of the 32-bit currency id space.
 *
 * Native tokens use ids strictly below this value. ERC-20 contracts registered
 * at runtime receive ids at or above it.
 */
export const RESERVED_OFFSET = 0x2000_0000;

/**
 * Native token symbols
 */
export const TokenSymbol = {
  ACA: 'ACA',
  AUSD: 'AUSD',
  DOT: 'DOT',
  LDOT: 'LDOT',
  XBTC: 'XBTC',
  RENBTC: 'RENBTC',
  POLKABTC: 'POLKABTC',
  PLM: 'PLM',
  PHA: 'PHA',
  HDT: 'HDT',
  KAR: 'KAR',
  KUSD: 'KUSD',
  KSM: 'KSM',
  LKSM: 'LKSM',
  SDN: 'SDN',
  KILT: 'KILT',
} as const;

export type TokenSymbol = (typeof TokenSymbol)[keyof typeof TokenSymbol];

/**
 * Static metadata of a native token
 */
export interface TokenTableEntry {
  readonly symbol: TokenSymbol;
  readonly id: number;
  readonly decimals: number;
  readonly name: string;
}

/**
 * The native token catalog, keyed by symbol.
 *
 * Fixed at build time. Ids are unique and below RESERVED_OFFSET.
 */
const TOKEN_ENTRIES: Record<TokenSymbol, TokenTableEntry> = {
  ACA: { symbol: 'ACA', id: 0, decimals: 12, name: 'Acala' },
  AUSD: { symbol: 'AUSD', id: 1, decimals: 12, name: 'Acala Dollar' },
  DOT: { symbol: 'DOT', id: 2, decimals: 10, name: 'Polkadot' },
  LDOT: { symbol: 'LDOT', id: 3, decimals: 10, name: 'Liquid DOT' },
  XBTC: { symbol: 'XBTC', id: 4, decimals: 8, name: 'ChainX BTC' },
  RENBTC: { symbol: 'RENBTC', id: 5, decimals: 8, name: 'Ren Protocol BTC' },
  POLKABTC: { symbol: 'POLKABTC', id: 6, decimals: 8, name: 'PolkaBTC' },
  PLM: { symbol: 'PLM', id: 7, decimals: 18, name: 'Plasm' },
  PHA: { symbol: 'PHA', id: 8, decimals: 18, name: 'Phala Native Token' },
  HDT: { symbol: 'HDT', id: 9, decimals: 18, name: 'HydraDX' },
  KAR: { symbol: 'KAR', id: 128, decimals: 12, name: 'Karura' },
  KUSD: { symbol: 'KUSD', id: 129, decimals: 12, name: 'Karura Dollar' },
  KSM: { symbol: 'KSM', id: 130, decimals: 12, name: 'Kusama' },
  LKSM: { symbol: 'LKSM', id: 131, decimals: 12, name: 'Liquid KSM' },
  SDN: { symbol: 'SDN', id: 132, decimals: 18, name: 'Shiden' },
  KILT: { symbol: 'KILT', id: 133, decimals: 15, name: 'Kilt' },
};

export const TOKEN_TABLE: Readonly<Record<TokenSymbol, TokenTableEntry>> =
  Object.freeze(TOKEN_ENTRIES);

const SYMBOL_BY_ID: ReadonlyMap<number, TokenSymbol> = new Map(
  Object.values(TOKEN_TABLE).map((entry): [number, TokenSymbol] => [entry.id, entry.symbol])
);

/**
 * Type guard for native token symbols
 */
export function isTokenSymbol(value: string): value is TokenSymbol {
  return Object.prototype.hasOwnProperty.call(TOKEN_TABLE, value);
}

export function getTokenId(symbol: TokenSymbol): number {
  return TOKEN_TABLE[symbol].id;
}

/**
 * Reverse lookup from a numeric id to a native token symbol.
 *
 * @returns The symbol, or null for unknown ids and ids at or above RESERVED_OFFSET
 */
export function getTokenSymbol(id: number): TokenSymbol | null {
  if (id >= RESERVED_OFFSET) {
    return null;
  }
  return SYMBOL_BY_ID.get(id) ?? null;
}

export function getTokenDecimals(symbol: TokenSymbol): number {
  return TOKEN_TABLE[symbol].decimals;
}

export function getTokenName(symbol: TokenSymbol): string {
  return TOKEN_TABLE[symbol].name;
}

/**
 * All native tokens in ascending id order
 */
export function listTokens(): TokenTableEntry[] {
  return Object.values(TOKEN_TABLE).sort((a, b) => a.id - b.id);
}
