export { ERROR_CODES, type ErrorCode, type ErrorDomain, type ErrorCodeEntry } from './error-codes.js';
export { ReserveMintError, isReserveMintError } from './base-error.js';
