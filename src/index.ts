import type { Logger } from './logger';
import { TdClient } from './tdlib/client';
import type { TdClientOptions } from './tdlib/options';
import { createTdJsonChannel } from './tdlib/tdjson';

/** Opens a client backed by the native libtdjson library. */
export function openClient(options: TdClientOptions, logger?: Logger): Promise<TdClient> {
  return TdClient.open(options, { createChannel: createTdJsonChannel, logger });
}

export { TdClient } from './tdlib/client';
export type { OpenOptions } from './tdlib/client';
export type { TdChannel, ChannelFactory, ChannelOptions } from './tdlib/channel';
export { RequestCorrelator } from './tdlib/correlator';
export { classifyError, raiseForError, ERROR_RULES } from './tdlib/classifier';
export type { ErrorRule, RemoteFailure } from './tdlib/classifier';
export * from './tdlib/errors';
export { listAllChats, listGroupMembers, listSupergroupMembers } from './tdlib/pagination';
export { resolveClientOptions } from './tdlib/options';
export type { TdClientOptions, TdClientSettings } from './tdlib/options';
export type { Chat, ChatMember, User } from './tdlib/schemas';
export { AuthState } from './tdlib/types';
export type { CallOptions, TdCaller, TdMethods, TdMethodName, TdObject, TdRequest } from './tdlib/types';
export { buildServer } from './server';
export { createLogger } from './logger';
export type { Logger } from './logger';
