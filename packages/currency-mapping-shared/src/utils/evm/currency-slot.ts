/**
 * Currency slot codec
 *
 * Converts a CurrencyId to and from the 32-byte slot the EVM side uses
 * wherever a currency travels as an address-shaped value.
 *
 * Layout (big-endian):
 * - bytes 0-10: zero
 * - byte 11: kind (0 = single currency, 1 = dex share)
 * - bytes 12-31: payload
 *
 * Single currency payload:
 * - token: u32 token id in bytes 12-15, bytes 16-31 zero
 * - erc20: the contract address verbatim in bytes 12-31
 *
 * Dex share payload:
 * - left leg u32 id in bytes 12-15, right leg u32 id in bytes 16-19, rest zero
 *
 * A token slot and an erc20 slot share bytes 12-31. A zero tail (bytes 16-31)
 * marks a token id. A real contract address whose last 16 bytes are zero and
 * whose first 4 bytes read below RESERVED_OFFSET therefore decodes as a token.
 */

import { bytesToHex, getAddress, hexToBytes, isHex, type Address, type Hex } from 'viem';
import {
  dexShareCurrencyId,
  type CurrencyId,
  type DexShare,
} from '../../types/currency/currency-id.types.js';
import {
  RESERVED_OFFSET,
  getTokenId,
  getTokenSymbol,
} from '../../types/currency/token-table.js';

export const CURRENCY_SLOT_SIZE = 32;

export const CurrencySlotKind = {
  SINGLE: 0,
  DEX_SHARE: 1,
} as const;

export type CurrencySlotKind = (typeof CurrencySlotKind)[keyof typeof CurrencySlotKind];

const KIND_INDEX = 11;
const PAYLOAD_OFFSET = 12;
const LEFT_LEG_OFFSET = 12;
const RIGHT_LEG_OFFSET = 16;
const TOKEN_TAIL_OFFSET = 16;
const DEX_SHARE_TAIL_OFFSET = 20;

/** High byte of a synthetic erc20 address rebuilt from a dex share leg */
export const SYNTHETIC_ADDRESS_MARKER = 0x20;

/**
 * Read access to registered ERC-20 currency ids.
 * Needed to encode erc20 legs of a dex share.
 */
export interface Erc20CurrencyIdResolver {
  getCurrencyId(address: Address): number | null;
}

// ============================================================================
// Encoding
// ============================================================================

/**
 * Encode a currency id into its 32-byte slot
 *
 * @returns The slot, or null if a dex share leg names an unregistered contract
 */
export function encodeCurrencyId(
  currencyId: CurrencyId,
  resolver: Erc20CurrencyIdResolver
): Uint8Array | null {
  const slot = new Uint8Array(CURRENCY_SLOT_SIZE);
  const view = new DataView(slot.buffer);

  switch (currencyId.type) {
    case 'token':
      view.setUint32(PAYLOAD_OFFSET, getTokenId(currencyId.symbol));
      return slot;

    case 'erc20':
      slot.set(hexToBytes(currencyId.address), PAYLOAD_OFFSET);
      return slot;

    case 'dex-share': {
      const left = resolveLegId(currencyId.left, resolver);
      const right = resolveLegId(currencyId.right, resolver);
      if (left === null || right === null) {
        return null;
      }
      slot[KIND_INDEX] = CurrencySlotKind.DEX_SHARE;
      view.setUint32(LEFT_LEG_OFFSET, left);
      view.setUint32(RIGHT_LEG_OFFSET, right);
      return slot;
    }
  }
}

/**
 * Numeric id of a dex share leg: the token id, or the registry id of the contract
 */
export function resolveLegId(leg: DexShare, resolver: Erc20CurrencyIdResolver): number | null {
  switch (leg.type) {
    case 'token':
      return getTokenId(leg.symbol);
    case 'erc20':
      return resolver.getCurrencyId(leg.address);
  }
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Decode a 32-byte slot back into a currency id.
 *
 * Never consults the registry. Dex share legs with registry ids come back as
 * synthetic addresses (see {@link syntheticErc20Address}).
 *
 * @param input - Slot bytes or 0x-prefixed hex
 * @returns The currency id, or null for malformed slots and unknown token ids
 */
export function decodeCurrencyId(input: Uint8Array | Hex): CurrencyId | null {
  const slot = toSlotBytes(input);
  if (slot === null) {
    return null;
  }

  for (let i = 0; i < KIND_INDEX; i++) {
    if (slot[i] !== 0) {
      return null;
    }
  }

  const view = new DataView(slot.buffer, slot.byteOffset, slot.byteLength);

  switch (slot[KIND_INDEX]) {
    case CurrencySlotKind.SINGLE: {
      if (isZero(slot, TOKEN_TAIL_OFFSET)) {
        const id = view.getUint32(PAYLOAD_OFFSET);
        if (id < RESERVED_OFFSET) {
          return decodeLeg(id);
        }
      }
      return {
        type: 'erc20',
        address: getAddress(bytesToHex(slot.subarray(PAYLOAD_OFFSET))),
      };
    }

    case CurrencySlotKind.DEX_SHARE: {
      if (!isZero(slot, DEX_SHARE_TAIL_OFFSET)) {
        return null;
      }
      const left = decodeLeg(view.getUint32(LEFT_LEG_OFFSET));
      const right = decodeLeg(view.getUint32(RIGHT_LEG_OFFSET));
      if (left === null || right === null) {
        return null;
      }
      return dexShareCurrencyId(left, right);
    }

    default:
      return null;
  }
}

function decodeLeg(id: number): DexShare | null {
  if (id < RESERVED_OFFSET) {
    const symbol = getTokenSymbol(id);
    return symbol === null ? null : { type: 'token', symbol };
  }
  return { type: 'erc20', address: syntheticErc20Address(id) };
}

/**
 * Placeholder address for a registry id that had to travel without its
 * contract address: 0x20, fifteen zero bytes, then u32(id - RESERVED_OFFSET).
 *
 * Stable for a given id. Not the deployed address of the contract.
 */
export function syntheticErc20Address(currencyId: number): Address {
  const bytes = new Uint8Array(20);
  bytes[0] = SYNTHETIC_ADDRESS_MARKER;
  new DataView(bytes.buffer).setUint32(16, currencyId - RESERVED_OFFSET);
  return getAddress(bytesToHex(bytes));
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Render a slot as 0x-prefixed hex
 */
export function currencySlotToHex(slot: Uint8Array): Hex {
  return bytesToHex(slot);
}

function toSlotBytes(input: Uint8Array | Hex): Uint8Array | null {
  if (typeof input === 'string') {
    if (!isHex(input, { strict: true }) || input.length !== 2 + CURRENCY_SLOT_SIZE * 2) {
      return null;
    }
    return hexToBytes(input);
  }
  return input.length === CURRENCY_SLOT_SIZE ? input : null;
}

function isZero(bytes: Uint8Array, from: number): boolean {
  for (let i = from; i < bytes.length; i++) {
    if (bytes[i] !== 0) {
      return false;
    }
  }
  return true;
}
