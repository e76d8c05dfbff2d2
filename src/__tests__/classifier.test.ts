import { describe, it, expect } from 'vitest';
import { classifyError, raiseForError, ERROR_RULES } from '../tdlib/classifier';
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
} from '../tdlib/errors';

function errorEnvelope(code: number | undefined, message?: string) {
  return { '@type': 'error', code, message };
}

describe('classifyError', () => {
  it('ignores envelopes that are not errors', () => {
    expect(classifyError({ '@type': 'ok' })).toBeNull();
    expect(classifyError({ '@type': 'user', id: 1, message: 'PHONE_NUMBER_INVALID' })).toBeNull();
  });

  it.each([
    ['PHONE_NUMBER_INVALID', InvalidPhoneNumberError, 'InvalidPhoneNumber'],
    ['PASSWORD_HASH_INVALID', PasswordError, 'PasswordError'],
    ['PHONE_CODE_INVALID', PhoneCodeInvalidError, 'PhoneCodeInvalid'],
    ['Supergroup members are unavailable', NoPermissionError, 'NoPermission'],
    ['Chat not found', ObjectNotFoundError, 'ObjectNotFound'],
    ['setAuthenticationPhoneNumber unexpected', AlreadyAuthorizedError, 'AlreadyAuthorized'],
    ['Already logging out', AlreadyLoggingOutError, 'AlreadyLoggingOut'],
    ['Unauthorized', AuthError, 'AuthError'],
  ])('maps message %s', (message, ErrorClass, kind) => {
    const error = classifyError(errorEnvelope(400, message));
    expect(error).toBeInstanceOf(ErrorClass);
    expect(error?.kind).toBe(kind);
  });

  it('matches message text before status code', () => {
    const error = classifyError(errorEnvelope(401, 'PHONE_NUMBER_INVALID'));
    expect(error).toBeInstanceOf(InvalidPhoneNumberError);

    const throttled = classifyError(errorEnvelope(429, 'Chat not found'));
    expect(throttled).toBeInstanceOf(ObjectNotFoundError);
  });

  it('maps code 401 to AuthError', () => {
    expect(classifyError(errorEnvelope(401, 'SESSION_REVOKED'))).toBeInstanceOf(AuthError);
  });

  it.each([429, 420])('maps code %i to TooManyRequests', (code) => {
    const error = classifyError(errorEnvelope(code, 'Too Many Requests: retry after 7'));
    expect(error).toBeInstanceOf(TooManyRequestsError);
    expect(error?.kind).toBe('TooManyRequests');
  });

  it('falls back to UnknownError carrying the remote code and message', () => {
    const error = classifyError(errorEnvelope(500, 'INTERNAL_SERVER_ERROR'));
    expect(error).toBeInstanceOf(UnknownError);
    expect(error).toMatchObject({
      kind: 'UnknownError',
      code: 500,
      remoteMessage: 'INTERNAL_SERVER_ERROR',
      message: 'TDLib error 500: INTERNAL_SERVER_ERROR',
    });
  });

  it('fills in a missing message and code', () => {
    const error = classifyError({ '@type': 'error' });
    expect(error).toBeInstanceOf(UnknownError);
    expect(error?.message).toBe('TDLib error unknown: Empty error message');
    expect(error?.code).toBeUndefined();
  });

  it('every classified error is a TdError', () => {
    for (const rule of ERROR_RULES) {
      expect(new rule.error('x')).toBeInstanceOf(TdError);
    }
  });
});

describe('raiseForError', () => {
  it('throws the classified error', () => {
    expect(() => raiseForError(errorEnvelope(6, 'PHONE_CODE_INVALID'))).toThrow(PhoneCodeInvalidError);
  });

  it('returns quietly for normal envelopes', () => {
    expect(() => raiseForError({ '@type': 'chats', chat_ids: [] })).not.toThrow();
  });
});
