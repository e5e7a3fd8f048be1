export type ErrorDomain = 'INPUT' | 'BALANCE' | 'EXTERNAL' | 'CONFIG' | 'AUTH' | 'SYSTEM';

export interface ErrorCodeEntry {
  code: string;
  domain: ErrorDomain;
  httpStatus: number;
  retryable: boolean;
  message: string;
}

/**
 * Unified error code matrix for the issuer engine.
 *
 * INPUT and BALANCE errors are raised before any state mutation.
 * EXTERNAL errors leave local state as it was before the call attempt.
 */
export const ERROR_CODES = {
  // --- INPUT domain (6) ---
  INVALID_AMOUNT: {
    code: 'INVALID_AMOUNT',
    domain: 'INPUT',
    httpStatus: 400,
    retryable: false,
    message: 'Amount must be greater than zero',
  },
  AMOUNT_TOO_SMALL: {
    code: 'AMOUNT_TOO_SMALL',
    domain: 'INPUT',
    httpStatus: 400,
    retryable: false,
    message: 'Amount does not exceed the fee',
  },
  INVALID_PRICE: {
    code: 'INVALID_PRICE',
    domain: 'INPUT',
    httpStatus: 400,
    retryable: false,
    message: 'Oracle price must be positive',
  },
  INVALID_ADDRESS: {
    code: 'INVALID_ADDRESS',
    domain: 'INPUT',
    httpStatus: 400,
    retryable: false,
    message: 'Account address is empty or malformed',
  },
  INVALID_BATCH_SIZE: {
    code: 'INVALID_BATCH_SIZE',
    domain: 'INPUT',
    httpStatus: 400,
    retryable: false,
    message: 'Batch size must be a positive integer',
  },
  INVALID_RECORD: {
    code: 'INVALID_RECORD',
    domain: 'INPUT',
    httpStatus: 400,
    retryable: false,
    message: 'Settlement record payload is malformed',
  },

  // --- BALANCE domain (2) ---
  INSUFFICIENT_TOKEN_BALANCE: {
    code: 'INSUFFICIENT_TOKEN_BALANCE',
    domain: 'BALANCE',
    httpStatus: 400,
    retryable: false,
    message: 'Synthetic token balance is insufficient',
  },
  INSUFFICIENT_BUFFER: {
    code: 'INSUFFICIENT_BUFFER',
    domain: 'BALANCE',
    httpStatus: 400,
    retryable: false,
    message: 'Local reserve buffer is insufficient',
  },

  // --- EXTERNAL domain (5) ---
  ORACLE_UNAVAILABLE: {
    code: 'ORACLE_UNAVAILABLE',
    domain: 'EXTERNAL',
    httpStatus: 503,
    retryable: true,
    message: 'Price oracle is unavailable',
  },
  BRIDGE_TRANSFER_FAILED: {
    code: 'BRIDGE_TRANSFER_FAILED',
    domain: 'EXTERNAL',
    httpStatus: 502,
    retryable: true,
    message: 'Bridge rejected the reserve transfer',
  },
  RESERVE_TRANSFER_FAILED: {
    code: 'RESERVE_TRANSFER_FAILED',
    domain: 'EXTERNAL',
    httpStatus: 502,
    retryable: true,
    message: 'Reserve asset transfer failed',
  },
  SHORT_TRANSFER: {
    code: 'SHORT_TRANSFER',
    domain: 'EXTERNAL',
    httpStatus: 502,
    retryable: false,
    message: 'Reserve asset delivered less than the requested amount',
  },
  PAYOUT_FAILED: {
    code: 'PAYOUT_FAILED',
    domain: 'EXTERNAL',
    httpStatus: 502,
    retryable: true,
    message: 'Redemption payout transfer failed',
  },

  // --- CONFIG domain (2) ---
  INVALID_SPREAD: {
    code: 'INVALID_SPREAD',
    domain: 'CONFIG',
    httpStatus: 400,
    retryable: false,
    message: 'Spread drives the execution price to zero or below',
  },
  INVALID_CONFIG: {
    code: 'INVALID_CONFIG',
    domain: 'CONFIG',
    httpStatus: 400,
    retryable: false,
    message: 'Issuer configuration is invalid',
  },

  // --- AUTH domain (1) ---
  UNAUTHORIZED: {
    code: 'UNAUTHORIZED',
    domain: 'AUTH',
    httpStatus: 403,
    retryable: false,
    message: 'Caller is not authorized for this operation',
  },

  // --- SYSTEM domain (1) ---
  ENGINE_SHUT_DOWN: {
    code: 'ENGINE_SHUT_DOWN',
    domain: 'SYSTEM',
    httpStatus: 503,
    retryable: false,
    message: 'Settlement engine is shutting down',
  },
} as const satisfies Record<string, ErrorCodeEntry>;

export type ErrorCode = keyof typeof ERROR_CODES;
