/**
 * EVM address helpers
 */

import { getAddress, isAddress, type Address } from 'viem';

/**
 * Check whether a string is a 20-byte hex address.
 * Mixed-case input is not required to carry a valid checksum.
 */
export function isValidAddress(address: string): boolean {
  return isAddress(address, { strict: false });
}

/**
 * Normalize an address to EIP-55 checksum format
 *
 * @throws Error if the address is invalid
 */
export function normalizeAddress(address: string): Address {
  if (!isValidAddress(address)) {
    throw new Error(`Invalid Ethereum address format: ${address}`);
  }
  return getAddress(address);
}

/**
 * Case-insensitive address equality
 */
export function compareAddresses(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
