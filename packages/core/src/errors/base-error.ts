import { ERROR_CODES, type ErrorCode, type ErrorDomain } from './error-codes.js';

export class ReserveMintError extends Error {
  readonly code: ErrorCode;
  readonly domain: ErrorDomain;
  readonly httpStatus: number;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    options?: {
      message?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    const entry = ERROR_CODES[code];
    super(options?.message ?? entry.message);
    this.name = 'ReserveMintError';
    this.code = code;
    this.domain = entry.domain;
    this.httpStatus = entry.httpStatus;
    this.retryable = entry.retryable;
    this.details = options?.details;
    if (options?.cause !== undefined) this.cause = options.cause;
  }

  toJSON() {
    return {
      code: this.code,
      domain: this.domain,
      message: this.message,
      details: this.details,
      retryable: this.retryable,
    };
  }
}

/** Narrow an unknown thrown value to a ReserveMintError with the given code. */
export function isReserveMintError(err: unknown, code?: ErrorCode): err is ReserveMintError {
  if (!(err instanceof ReserveMintError)) return false;
  return code === undefined || err.code === code;
}
