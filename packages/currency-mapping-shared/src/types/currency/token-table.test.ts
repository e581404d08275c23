import { describe, it, expect } from 'vitest';
import {
  RESERVED_OFFSET,
  TOKEN_TABLE,
  getTokenDecimals,
  getTokenId,
  getTokenName,
  getTokenSymbol,
  isTokenSymbol,
  listTokens,
} from './token-table.js';

describe('Native token table', () => {
  describe('getTokenId', () => {
    it('should return the fixed ids of ACA and AUSD', () => {
      expect(getTokenId('ACA')).toBe(0);
      expect(getTokenId('AUSD')).toBe(1);
    });

    it('should return ids above the first block for Kusama-side tokens', () => {
      expect(getTokenId('KAR')).toBe(128);
      expect(getTokenId('KILT')).toBe(133);
    });
  });

  describe('getTokenSymbol', () => {
    it('should map known ids back to their symbol', () => {
      expect(getTokenSymbol(0)).toBe('ACA');
      expect(getTokenSymbol(3)).toBe('LDOT');
      expect(getTokenSymbol(130)).toBe('KSM');
    });

    it('should return null for ids without a token', () => {
      expect(getTokenSymbol(10)).toBeNull();
      expect(getTokenSymbol(127)).toBeNull();
    });

    it('should return null for ids in the registry range', () => {
      expect(getTokenSymbol(RESERVED_OFFSET)).toBeNull();
      expect(getTokenSymbol(RESERVED_OFFSET + 1)).toBeNull();
    });
  });

  describe('decimals and names', () => {
    it('should return fixed decimals', () => {
      expect(getTokenDecimals('ACA')).toBe(12);
      expect(getTokenDecimals('DOT')).toBe(10);
      expect(getTokenDecimals('XBTC')).toBe(8);
      expect(getTokenDecimals('KILT')).toBe(15);
    });

    it('should return display names', () => {
      expect(getTokenName('AUSD')).toBe('Acala Dollar');
      expect(getTokenName('LKSM')).toBe('Liquid KSM');
    });
  });

  describe('isTokenSymbol', () => {
    it('should accept table symbols only', () => {
      expect(isTokenSymbol('DOT')).toBe(true);
      expect(isTokenSymbol('ETH')).toBe(false);
      expect(isTokenSymbol('dot')).toBe(false);
    });

    it('should not accept inherited object keys', () => {
      expect(isTokenSymbol('toString')).toBe(false);
    });
  });

  describe('table invariants', () => {
    it('should keep every id unique and below the reserved offset', () => {
      const ids = Object.values(TOKEN_TABLE).map((entry) => entry.id);

      expect(new Set(ids).size).toBe(ids.length);
      for (const id of ids) {
        expect(id).toBeLessThan(RESERVED_OFFSET);
      }
    });

    it('should key every entry by its own symbol', () => {
      for (const [key, entry] of Object.entries(TOKEN_TABLE)) {
        expect(entry.symbol).toBe(key);
      }
    });

    it('should be frozen', () => {
      expect(Object.isFrozen(TOKEN_TABLE)).toBe(true);
    });

    it('should list tokens in ascending id order', () => {
      const tokens = listTokens();

      expect(tokens).toHaveLength(16);
      expect(tokens[0]?.symbol).toBe('ACA');
      expect(tokens[tokens.length - 1]?.symbol).toBe('KILT');
    });
  });
});
