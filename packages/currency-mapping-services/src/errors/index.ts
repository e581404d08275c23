/**
 * Currency mapping errors
 *
 * Registration failures surface as typed errors. Lookups and slot decoding
 * never throw; they return null.
 */

export type CurrencyMappingErrorCode =
  | 'CURRENCY_ID_EXISTED'
  | 'INVALID_ERC20_CONTRACT'
  | 'INVALID_ADDRESS';

/**
 * Base class of all errors raised by the currency mapping services
 */
export class CurrencyMappingError extends Error {
  constructor(
    message: string,
    public readonly code: CurrencyMappingErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'CurrencyMappingError';
  }
}

/**
 * The contract's identity label already belongs to a different registered address
 */
export class CurrencyIdExistedError extends CurrencyMappingError {
  constructor(
    public readonly address: string,
    public readonly existingAddress: string,
    public readonly label: string
  ) {
    super(
      `Currency id "${label}" of ${address} is already registered for ${existingAddress}`,
      'CURRENCY_ID_EXISTED'
    );
    this.name = 'CurrencyIdExistedError';
  }
}

/**
 * The address does not host a conforming ERC-20 contract
 */
export class InvalidErc20ContractError extends CurrencyMappingError {
  constructor(
    public readonly address: string,
    reason: string,
    cause?: unknown
  ) {
    super(`Invalid ERC-20 contract at ${address}: ${reason}`, 'INVALID_ERC20_CONTRACT', cause);
    this.name = 'InvalidErc20ContractError';
  }
}

export class InvalidAddressError extends CurrencyMappingError {
  constructor(public readonly address: string) {
    super(`Invalid Ethereum address format: ${address}`, 'INVALID_ADDRESS');
    this.name = 'InvalidAddressError';
  }
}
