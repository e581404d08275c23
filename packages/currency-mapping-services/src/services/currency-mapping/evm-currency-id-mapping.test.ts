import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Address } from 'viem';
import {
  CURRENCY_SLOT_SIZE,
  RESERVED_OFFSET,
  dexShareCurrencyId,
  erc20CurrencyId,
  tokenCurrencyId,
} from '@currency-mapping/shared';
import { EvmCurrencyIdMapping } from './evm-currency-id-mapping.js';
import { Erc20MappingService } from '../erc20-mapping/erc20-mapping-service.js';
import type { Erc20MetadataReader } from '../erc20-mapping/erc20-metadata-reader.js';
import type { TokenMetadata } from '../../utils/evm/token-metadata.js';

/**
 * Tests for EvmCurrencyIdMapping
 *
 * ERC20_ADDRESS is registered before each test and receives RESERVED_OFFSET + 1.
 * UNREGISTERED_ADDRESS hosts a contract but is never registered up front.
 */
describe('EvmCurrencyIdMapping', () => {
  const ERC20_ADDRESS: Address = '0x1111222233334444555566667777888899990000';
  const UNREGISTERED_ADDRESS: Address = '0x9999888877776666555544443333222211110000';
  const ERC20_ID = RESERVED_OFFSET + 1;

  const metadata: Record<string, TokenMetadata> = {
    [ERC20_ADDRESS]: { name: 'Test Token', symbol: 'TEST', decimals: 17 },
    [UNREGISTERED_ADDRESS]: { name: 'Late Token', symbol: 'LATE', decimals: 8 },
  };

  const metadataReader: Erc20MetadataReader = {
    readMetadata: vi.fn(async (address: Address): Promise<TokenMetadata> => {
      const found = metadata[address.toLowerCase()];
      if (!found) {
        throw new Error('execution reverted');
      }
      return found;
    }),
  };

  const ACA = tokenCurrencyId('ACA');
  const AUSD = tokenCurrencyId('AUSD');
  const ERC20 = erc20CurrencyId(ERC20_ADDRESS);
  const UNREGISTERED = erc20CurrencyId(UNREGISTERED_ADDRESS);

  const slotWith = (entries: Array<[number, number]>): Uint8Array => {
    const slot = new Uint8Array(CURRENCY_SLOT_SIZE);
    for (const [index, value] of entries) {
      slot[index] = value;
    }
    return slot;
  };

  let mapping: EvmCurrencyIdMapping;

  beforeEach(async () => {
    mapping = new EvmCurrencyIdMapping({
      erc20MappingService: new Erc20MappingService({ metadataReader }),
    });
    await mapping.register(ERC20_ADDRESS);
  });

  describe('register', () => {
    it('should accept a repeated registration', async () => {
      const again = await mapping.register(ERC20_ADDRESS);

      expect(again.currencyId).toBe(ERC20_ID);
    });
  });

  describe('getEvmAddress', () => {
    it('should return the registered address of an erc20', () => {
      expect(mapping.getEvmAddress(ERC20)).toBe(ERC20_ADDRESS);
    });

    it('should return null for an unregistered erc20', () => {
      expect(mapping.getEvmAddress(UNREGISTERED)).toBeNull();
    });

    it('should return null for tokens and dex shares', () => {
      expect(mapping.getEvmAddress(ACA)).toBeNull();
      expect(mapping.getEvmAddress(dexShareCurrencyId(ACA, ERC20))).toBeNull();
    });

    it('should resolve registry ids to addresses', () => {
      expect(mapping.getAddress(ERC20_ID)).toBe(ERC20_ADDRESS);
      expect(mapping.getAddress(0)).toBeNull();
    });
  });

  describe('decimals', () => {
    it('should read token decimals from the table', () => {
      expect(mapping.decimals(ACA)).toBe(12);
    });

    it('should read erc20 decimals from the registry', () => {
      expect(mapping.decimals(ERC20)).toBe(17);
    });

    it('should return null for unregistered contracts and dex shares', () => {
      expect(mapping.decimals(UNREGISTERED)).toBeNull();
      expect(mapping.decimals(dexShareCurrencyId(ACA, AUSD))).toBeNull();
    });
  });

  describe('name and symbol', () => {
    it('should describe tokens and registered contracts', () => {
      expect(mapping.name(ACA)).toBe('Acala');
      expect(mapping.symbol(ACA)).toBe('ACA');
      expect(mapping.name(ERC20)).toBe('Test Token');
      expect(mapping.symbol(ERC20)).toBe('TEST');
    });

    it('should build dex share labels from both legs', () => {
      const pair = dexShareCurrencyId(ACA, ERC20);

      expect(mapping.name(pair)).toBe('LP Acala - Test Token');
      expect(mapping.symbol(pair)).toBe('LP_ACA_TEST');
    });

    it('should return null when a leg is not registered', () => {
      expect(mapping.name(UNREGISTERED)).toBeNull();
      expect(mapping.symbol(dexShareCurrencyId(ACA, UNREGISTERED))).toBeNull();
    });
  });

  describe('encodeCurrencyId', () => {
    it('should encode the fixed vectors', () => {
      expect(mapping.encodeCurrencyId(ACA)).toEqual(new Uint8Array(32));
      expect(mapping.encodeCurrencyId(AUSD)).toEqual(slotWith([[15, 1]]));
      expect(mapping.encodeCurrencyId(dexShareCurrencyId(ACA, AUSD))).toEqual(
        slotWith([[11, 1], [19, 1]])
      );
    });

    it('should embed the erc20 address', () => {
      const slot = mapping.encodeCurrencyId(ERC20);

      expect(slot?.subarray(0, 12)).toEqual(new Uint8Array(12));
      expect(slot?.subarray(12)).toEqual(
        new Uint8Array([
          0x11, 0x11, 0x22, 0x22, 0x33, 0x33, 0x44, 0x44, 0x55, 0x55,
          0x66, 0x66, 0x77, 0x77, 0x88, 0x88, 0x99, 0x99, 0x00, 0x00,
        ])
      );
    });

    it('should encode registered erc20 legs with their ids', () => {
      expect(mapping.encodeCurrencyId(dexShareCurrencyId(ERC20, ERC20))).toEqual(
        slotWith([
          [11, 1],
          [12, 0x20],
          [15, 0x01],
          [16, 0x20],
          [19, 0x01],
        ])
      );
    });

    it('should require registration of dex share legs', async () => {
      const pair = dexShareCurrencyId(UNREGISTERED, ACA);

      expect(mapping.encodeCurrencyId(pair)).toBeNull();

      await mapping.register(UNREGISTERED_ADDRESS);

      expect(mapping.encodeCurrencyId(pair)).toEqual(
        slotWith([
          [11, 1],
          [12, 0x20],
          [15, 0x02],
        ])
      );
    });
  });

  describe('decodeCurrencyId', () => {
    it('should decode 32 zero bytes as ACA', () => {
      expect(mapping.decodeCurrencyId(new Uint8Array(32))).toEqual(ACA);
    });

    it('should reject 32 bytes of 0xff', () => {
      expect(mapping.decodeCurrencyId(new Uint8Array(32).fill(0xff))).toBeNull();
    });

    it('should decode a registered leg as its synthetic address', () => {
      const slot = slotWith([
        [11, 1],
        [12, 0x20],
        [15, 0x01],
      ]);

      expect(mapping.decodeCurrencyId(slot)).toEqual(
        dexShareCurrencyId(
          { type: 'erc20', address: '0x2000000000000000000000000000000000000001' },
          ACA
        )
      );
    });

    it('should round trip a registered erc20', () => {
      const slot = mapping.encodeCurrencyId(ERC20);

      expect(slot).not.toBeNull();
      expect(mapping.decodeCurrencyId(slot ?? new Uint8Array())).toEqual(ERC20);
    });
  });
});
