/**
 * ERC-20 metadata reads
 */

import { erc20Abi, type Address, type PublicClient } from 'viem';

export interface TokenMetadata {
  name: string;
  symbol: string;
  decimals: number;
}

/**
 * Error thrown when a contract does not answer the ERC-20 metadata calls
 */
export class TokenMetadataError extends Error {
  constructor(
    message: string,
    public readonly address: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'TokenMetadataError';
  }
}

/** Subset of the viem client used for metadata reads */
export type MetadataClient = Pick<PublicClient, 'readContract'>;

/**
 * Read name, symbol and decimals from an ERC-20 contract
 *
 * @throws TokenMetadataError if any call reverts or returns an unusable value
 */
export async function readTokenMetadata(
  client: MetadataClient,
  address: Address
): Promise<TokenMetadata> {
  let name: string;
  let symbol: string;
  let decimals: number;

  try {
    [name, symbol, decimals] = await Promise.all([
      client.readContract({ address, abi: erc20Abi, functionName: 'name' }),
      client.readContract({ address, abi: erc20Abi, functionName: 'symbol' }),
      client.readContract({ address, abi: erc20Abi, functionName: 'decimals' }),
    ]);
  } catch (error) {
    throw new TokenMetadataError(
      `Contract at ${address} does not implement ERC-20 metadata: ${
        error instanceof Error ? error.message : String(error)
      }`,
      address,
      error
    );
  }

  if (symbol.length === 0) {
    throw new TokenMetadataError(`Contract at ${address} returned an empty symbol`, address);
  }

  if (!Number.isInteger(decimals) || decimals < 0 || decimals > 255) {
    throw new TokenMetadataError(
      `Contract at ${address} returned invalid decimals: ${decimals}`,
      address
    );
  }

  return { name, symbol, decimals };
}
