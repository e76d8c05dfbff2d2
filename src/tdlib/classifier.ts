import {
  AlreadyAuthorizedError,
  AlreadyLoggingOutError,
  AuthError,
  InvalidPhoneNumberError,
  NoPermissionError,
  ObjectNotFoundError,
  PasswordError,
  PhoneCodeInvalidError,
  TdError,
  TooManyRequestsError,
  UnknownError,
  type RemoteErrorClass,
} from './errors';
import { isErrorObject, type TdObject } from './types';

export interface RemoteFailure {
  code?: number;
  message: string;
}

export interface ErrorRule {
  matches: (failure: RemoteFailure) => boolean;
  error: RemoteErrorClass;
}

const messageIs = (text: string) => (failure: RemoteFailure) => failure.message === text;

/**
 * Evaluated top to bottom, first match wins. Message rules come before code rules: a 401 can carry
 * a message that deserves a more specific kind.
 */
export const ERROR_RULES: readonly ErrorRule[] = [
  { matches: messageIs('PHONE_NUMBER_INVALID'), error: InvalidPhoneNumberError },
  { matches: messageIs('PASSWORD_HASH_INVALID'), error: PasswordError },
  { matches: messageIs('PHONE_CODE_INVALID'), error: PhoneCodeInvalidError },
  { matches: messageIs('Supergroup members are unavailable'), error: NoPermissionError },
  { matches: messageIs('Chat not found'), error: ObjectNotFoundError },
  { matches: messageIs('setAuthenticationPhoneNumber unexpected'), error: AlreadyAuthorizedError },
  { matches: messageIs('Already logging out'), error: AlreadyLoggingOutError },
  { matches: ({ code, message }) => code === 401 || message === 'Unauthorized', error: AuthError },
  { matches: ({ code }) => code === 429 || code === 420, error: TooManyRequestsError },
];

export function classifyError(envelope: TdObject, rules: readonly ErrorRule[] = ERROR_RULES): TdError | null {
  if (!isErrorObject(envelope)) return null;

  const failure: RemoteFailure = {
    code: typeof envelope.code === 'number' ? envelope.code : undefined,
    message: typeof envelope.message === 'string' ? envelope.message : 'Empty error message',
  };
  const text = `TDLib error ${failure.code ?? 'unknown'}: ${failure.message}`;

  const rule = rules.find((r) => r.matches(failure));
  const ErrorClass: RemoteErrorClass = rule ? rule.error : UnknownError;
  return new ErrorClass(text, failure);
}

export function raiseForError(envelope: TdObject): void {
  const error = classifyError(envelope);
  if (error) throw error;
}
