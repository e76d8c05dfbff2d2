import * as path from 'path';
import { createLogger, type Logger } from '../logger';
import type { ChannelFactory, TdChannel } from './channel';
import { RequestCorrelator } from './correlator';
import { TdError, TwoFactorPasswordNeededError } from './errors';
import { listAllChats, listGroupMembers, type PaginationOptions } from './pagination';
import { resolveClientOptions, type TdClientOptions, type TdClientSettings } from './options';
import { UserSchema, expectShape, type Chat, type User } from './schemas';
import {
  AuthState,
  isAuthState,
  type CallOptions,
  type TdCaller,
  type TdMethodName,
  type TdMethods,
  type TdObject,
} from './types';

const BOOTSTRAP_TIMEOUT_MS = 5_000;

export interface OpenOptions {
  createChannel: ChannelFactory;
  logger?: Logger;
  /** Replaces the wait between pages; tests pass a stub. */
  sleep?: PaginationOptions['sleep'];
}

export class TdClient implements TdCaller {
  private readonly correlator: RequestCorrelator;
  private closed = false;

  private constructor(
    private readonly channel: TdChannel,
    readonly settings: TdClientSettings,
    private readonly logger: Logger,
    private readonly sleep?: PaginationOptions['sleep'],
  ) {
    this.correlator = new RequestCorrelator(channel, {
      requestTimeoutMs: settings.requestTimeoutMs,
      pollIntervalMs: settings.pollIntervalMs,
    });
  }

  /**
   * Validates options, acquires the TDLib channel and runs the bootstrap sequence. If bootstrap
   * fails the channel is released before the error is rethrown.
   */
  static async open(options: TdClientOptions, { createChannel, logger, sleep }: OpenOptions): Promise<TdClient> {
    const settings = resolveClientOptions(options);
    const channel = createChannel({
      libraryPath: settings.libraryPath,
      tdlibLogLevel: settings.tdlibLogLevel,
    });

    const client = new TdClient(channel, settings, logger ?? createLogger('tdlib'), sleep);
    try {
      await client.bootstrap();
    } catch (err) {
      await client.close();
      throw err;
    }
    return client;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Releases the TDLib handle. Safe to call more than once. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.channel.close();
  }

  // --- Calls ---

  call<M extends TdMethodName>(method: M, params: TdMethods[M], options?: CallOptions): Promise<TdObject> {
    return this.callRaw(method, params, options);
  }

  /** Any TDLib method, including ones without a typed entry in {@link TdMethods}. */
  async callRaw(method: string, params: object = {}, options?: CallOptions): Promise<TdObject> {
    if (this.closed) throw new TdError('Client is closed');
    this.logger.debug(`Calling ${method}`);
    return this.correlator.call(method, params, options);
  }

  // --- Auth ---

  async getAuthState(): Promise<AuthState> {
    const result = await this.call('getAuthorizationState', {});
    const state = result['@type'];
    if (!isAuthState(state)) {
      throw new TdError(`Unknown authorization state: ${state}`);
    }
    return state;
  }

  async isAuthorized(): Promise<boolean> {
    return (await this.getAuthState()) === AuthState.Ready;
  }

  async requestAuthCode(): Promise<void> {
    this.logger.info(`Sending code request for phone number (${this.settings.phone})`);
    const response = await this.call('setAuthenticationPhoneNumber', {
      phone_number: this.settings.phone,
      allow_flash_call: false,
      is_current_phone_number: true,
    });
    this.logger.info(`Sending code response: ${JSON.stringify(response)}`);
  }

  /**
   * Submits the login code, and the 2FA password when the account asks for one. Returns the state
   * reached afterwards.
   */
  async submitCode(code: string, password?: string): Promise<AuthState> {
    let state = await this.getAuthState();

    if (state === AuthState.WaitCode) {
      const result = await this.call('checkAuthenticationCode', { code });
      this.logger.info(`checkAuthenticationCode response: ${JSON.stringify(result)}`);
      state = await this.getAuthState();
    }

    if (state === AuthState.WaitPassword) {
      if (!password) throw new TwoFactorPasswordNeededError();
      const result = await this.call('checkAuthenticationPassword', { password });
      this.logger.info(`checkAuthenticationPassword response: ${JSON.stringify(result)}`);
    }

    // TDLib persists auth data before it reports the new state.
    return this.getAuthState();
  }

  async logOut(): Promise<void> {
    try {
      await this.call('logOut', {});
    } catch (err) {
      if (!(err instanceof TdError) || (err.kind !== 'AuthError' && err.kind !== 'AlreadyLoggingOut')) {
        throw err;
      }
    }
    this.logger.info(`Logged out ${this.settings.phone}. Current state: "${await this.getAuthState()}"`);
  }

  // --- Users & chats ---

  async getMe(): Promise<User> {
    return expectShape(UserSchema, await this.call('getMe', {}));
  }

  /** Offline lookup unless the account is a bot. */
  async getUser(userId: number): Promise<User> {
    return expectShape(UserSchema, await this.call('getUser', { user_id: userId }));
  }

  listAllChats(pageSize = this.settings.chatsPageSize): Promise<Chat[]> {
    return listAllChats(this, pageSize, this.paginationOptions());
  }

  /** Members of a basic group or supergroup, resolved to users. */
  listGroupMembers(groupId: number, pageSize = this.settings.membersPageSize): Promise<User[]> {
    return listGroupMembers(this, groupId, pageSize, this.paginationOptions());
  }

  private paginationOptions(): PaginationOptions {
    return { delayMs: this.settings.requestDelayMs, logger: this.logger, sleep: this.sleep };
  }

  // --- Bootstrap ---

  private async bootstrap(): Promise<void> {
    const s = this.settings;
    const sessionDir = path.join(s.sessionsDirectory, s.phone);

    await this.call('setTdlibParameters', {
      parameters: {
        use_test_dc: s.useTestDataCenter,
        api_id: s.apiId,
        api_hash: s.apiHash,
        device_model: s.deviceModel,
        system_version: s.systemVersion,
        application_version: s.applicationVersion,
        system_language_code: s.systemLanguageCode,
        use_message_database: s.useMessageDatabase,
        database_directory: path.join(sessionDir, 'database'),
        files_directory: path.join(sessionDir, 'files'),
      },
    }, { timeoutMs: BOOTSTRAP_TIMEOUT_MS });

    await this.call('checkDatabaseEncryptionKey', {
      encryption_key: s.encryptionKey,
    }, { timeoutMs: BOOTSTRAP_TIMEOUT_MS });

    if (s.proxy) {
      await this.call('addProxy', {
        server: s.proxy.host,
        port: s.proxy.port,
        enable: true,
        type: { '@type': 'proxyTypeSocks5' },
      }, { timeoutMs: BOOTSTRAP_TIMEOUT_MS });
    }
  }
}
