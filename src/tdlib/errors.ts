/**
 * Error taxonomy for TDLib calls.
 *
 * Every error raised by this package extends {@link TdError} and carries a `kind` discriminant, so
 * callers can switch over kinds instead of chains of `instanceof`. Errors that come from a TDLib
 * error envelope also keep the remote `code` and `remoteMessage`.
 */

export type TdErrorKind =
  | 'ProtocolError'
  | 'Validation'
  | 'InvalidPhoneNumber'
  | 'PasswordError'
  | 'TwoFactorPasswordNeeded'
  | 'PhoneCodeInvalid'
  | 'NoPermission'
  | 'ObjectNotFound'
  | 'AlreadyAuthorized'
  | 'AlreadyLoggingOut'
  | 'AuthError'
  | 'TooManyRequests'
  | 'UnknownError'
  | 'Timeout';

export interface RemoteErrorDetails {
  code?: number;
  message?: string;
}

export class TdError extends Error {
  readonly code?: number;
  readonly remoteMessage?: string;

  constructor(
    message: string,
    public readonly kind: TdErrorKind = 'ProtocolError',
    details: RemoteErrorDetails = {},
  ) {
    super(message);
    this.name = 'TdError';
    this.code = details.code;
    this.remoteMessage = details.message;
  }
}

export class ValidationError extends TdError {
  constructor(
    message: string,
    public readonly issues: { path: string; message: string }[] = [],
  ) {
    super(message, 'Validation');
    this.name = 'ValidationError';
  }
}

export class TwoFactorPasswordNeededError extends TdError {
  constructor(message = 'Two-factor password is required') {
    super(message, 'TwoFactorPasswordNeeded');
    this.name = 'TwoFactorPasswordNeededError';
  }
}

// ---- Remote errors ----

export class InvalidPhoneNumberError extends TdError {
  constructor(message: string, details?: RemoteErrorDetails) {
    super(message, 'InvalidPhoneNumber', details);
    this.name = 'InvalidPhoneNumberError';
  }
}

export class PasswordError extends TdError {
  constructor(message: string, details?: RemoteErrorDetails) {
    super(message, 'PasswordError', details);
    this.name = 'PasswordError';
  }
}

export class PhoneCodeInvalidError extends TdError {
  constructor(message: string, details?: RemoteErrorDetails) {
    super(message, 'PhoneCodeInvalid', details);
    this.name = 'PhoneCodeInvalidError';
  }
}

export class NoPermissionError extends TdError {
  constructor(message: string, details?: RemoteErrorDetails) {
    super(message, 'NoPermission', details);
    this.name = 'NoPermissionError';
  }
}

export class ObjectNotFoundError extends TdError {
  constructor(message: string, details?: RemoteErrorDetails) {
    super(message, 'ObjectNotFound', details);
    this.name = 'ObjectNotFoundError';
  }
}

export class AlreadyAuthorizedError extends TdError {
  constructor(message: string, details?: RemoteErrorDetails) {
    super(message, 'AlreadyAuthorized', details);
    this.name = 'AlreadyAuthorizedError';
  }
}

export class AlreadyLoggingOutError extends TdError {
  constructor(message: string, details?: RemoteErrorDetails) {
    super(message, 'AlreadyLoggingOut', details);
    this.name = 'AlreadyLoggingOutError';
  }
}

export class AuthError extends TdError {
  constructor(message: string, details?: RemoteErrorDetails) {
    super(message, 'AuthError', details);
    this.name = 'AuthError';
  }
}

export class TooManyRequestsError extends TdError {
  constructor(message: string, details?: RemoteErrorDetails) {
    super(message, 'TooManyRequests', details);
    this.name = 'TooManyRequestsError';
  }
}

export class UnknownError extends TdError {
  constructor(message: string, details?: RemoteErrorDetails, kind: 'UnknownError' | 'Timeout' = 'UnknownError') {
    super(message, kind, details);
    this.name = 'UnknownError';
  }
}

/** No matching response arrived in time. A sub-kind of {@link UnknownError}. */
export class TimeoutError extends UnknownError {
  constructor(
    public readonly method: string,
    public readonly timeoutMs: number,
  ) {
    super(`Request timed out after ${timeoutMs}ms: ${method}`, {}, 'Timeout');
    this.name = 'TimeoutError';
  }
}

export type RemoteErrorClass = new (message: string, details?: RemoteErrorDetails) => TdError;
