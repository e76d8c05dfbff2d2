/**
 * TDLib JSON envelope types.
 *
 * Requests and responses are plain objects tagged by `@type`. The `@extra` field is echoed back
 * verbatim by TDLib on the response to a request, which is what correlation is built on.
 */

// ---- Envelopes ----

export interface TdExtra {
  request_id?: string;
}

export interface TdObject {
  '@type': string;
  '@extra'?: TdExtra;
  [key: string]: unknown;
}

export interface TdRequest extends TdObject {
  '@extra': { request_id: string };
}

export interface TdErrorObject extends TdObject {
  '@type': 'error';
  code?: number;
  message?: string;
}

export const ERROR_TYPE = 'error';

export function isErrorObject(envelope: TdObject): envelope is TdErrorObject {
  return envelope['@type'] === ERROR_TYPE;
}

export function requestIdOf(envelope: TdObject): string | undefined {
  return envelope['@extra']?.request_id;
}

// ---- Authorization states ----

export const AuthState = {
  WaitTdlibParameters: 'authorizationStateWaitTdlibParameters',
  WaitEncryptionKey: 'authorizationStateWaitEncryptionKey',
  WaitPhoneNumber: 'authorizationStateWaitPhoneNumber',
  WaitCode: 'authorizationStateWaitCode',
  WaitOtherDeviceConfirmation: 'authorizationStateWaitOtherDeviceConfirmation',
  WaitRegistration: 'authorizationStateWaitRegistration',
  WaitPassword: 'authorizationStateWaitPassword',
  Ready: 'authorizationStateReady',
  LoggingOut: 'authorizationStateLoggingOut',
  Closing: 'authorizationStateClosing',
  Closed: 'authorizationStateClosed',
} as const;

export type AuthState = (typeof AuthState)[keyof typeof AuthState];

const AUTH_STATES: ReadonlySet<string> = new Set(Object.values(AuthState));

export function isAuthState(value: string): value is AuthState {
  return AUTH_STATES.has(value);
}

// ---- Methods ----

export interface TdlibParameters {
  use_test_dc: boolean;
  api_id: number;
  api_hash: string;
  device_model: string;
  system_version: string;
  application_version: string;
  system_language_code: string;
  use_message_database: boolean;
  database_directory: string;
  files_directory: string;
}

type NoParams = Record<string, never>;

/** Parameters of every method the client issues, keyed by method name. */
export type TdMethods = {
  getAuthorizationState: NoParams;
  setAuthenticationPhoneNumber: {
    phone_number: string;
    allow_flash_call: boolean;
    is_current_phone_number: boolean;
  };
  checkAuthenticationCode: { code: string };
  checkAuthenticationPassword: { password: string };
  logOut: NoParams;
  getMe: NoParams;
  getChats: { offset_order: string; offset_chat_id: number; limit: number };
  getChat: { chat_id: number };
  getBasicGroupFullInfo: { basic_group_id: number };
  getSupergroupMembers: { supergroup_id: number; offset: number; limit: number };
  getUser: { user_id: number };
  setTdlibParameters: { parameters: TdlibParameters };
  checkDatabaseEncryptionKey: { encryption_key: string };
  addProxy: { server: string; port: number; enable: boolean; type: { '@type': 'proxyTypeSocks5' } };
};

export type TdMethodName = keyof TdMethods;

export interface CallOptions {
  /** Overrides the client's default request timeout when positive. */
  timeoutMs?: number;
}

/** Anything that can issue a typed TDLib call; the pagination engines only need this. */
export interface TdCaller {
  call<M extends TdMethodName>(method: M, params: TdMethods[M], options?: CallOptions): Promise<TdObject>;
}
