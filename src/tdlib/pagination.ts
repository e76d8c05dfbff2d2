/**
 * Listing loops built from single calls: fetch a page, skip ids already seen, stop at the end of
 * data, otherwise wait `delayMs` and fetch the next page. The wait is never taken after the last
 * page.
 */
import { setTimeout as sleepMs } from 'timers/promises';
import type { Logger } from '../logger';
import { TdError, ValidationError } from './errors';
import {
  BasicGroupChatTypeSchema,
  BasicGroupFullInfoSchema,
  ChatMembersSchema,
  ChatSchema,
  ChatsSchema,
  SupergroupChatTypeSchema,
  UserSchema,
  expectShape,
  type Chat,
  type ChatMember,
  type User,
} from './schemas';
import type { TdCaller } from './types';

export const DEFAULT_CHATS_PAGE_SIZE = 100;
export const DEFAULT_MEMBERS_PAGE_SIZE = 200;
export const DEFAULT_REQUEST_DELAY_MS = 500;

/** int64 max: the chat list starts above every real order key. */
export const MAX_CHAT_ORDER = '9223372036854775807';

export interface PaginationOptions {
  delayMs: number;
  logger: Logger;
  sleep?: (ms: number) => Promise<unknown>;
}

function assertPageSize(pageSize: number): void {
  if (!Number.isInteger(pageSize) || pageSize <= 1) {
    throw new ValidationError(`Invalid page size: ${pageSize}`, [
      { path: 'pageSize', message: 'must be an integer greater than 1' },
    ]);
  }
}

export async function listAllChats(
  caller: TdCaller,
  pageSize: number,
  { delayMs, logger, sleep = sleepMs }: PaginationOptions,
): Promise<Chat[]> {
  assertPageSize(pageSize);

  const chats: Chat[] = [];
  const seen = new Set<number>();
  let offsetOrder = MAX_CHAT_ORDER;
  let offsetChatId = 0;

  for (;;) {
    const page = expectShape(ChatsSchema, await caller.call('getChats', {
      offset_order: offsetOrder,
      offset_chat_id: offsetChatId,
      limit: pageSize,
    }));

    let added = 0;
    for (const chatId of page.chat_ids) {
      if (seen.has(chatId)) continue;
      chats.push(expectShape(ChatSchema, await caller.call('getChat', { chat_id: chatId })));
      seen.add(chatId);
      added++;
    }

    if (page.chat_ids.length < pageSize) break;
    if (added === 0) {
      logger.warn(`getChats returned a full page of known chats at order ${offsetOrder}; stopping`);
      break;
    }

    const last = chats[chats.length - 1];
    offsetOrder = last.order;
    offsetChatId = last.id;
    await sleep(delayMs);
  }

  logger.info(`Listed ${chats.length} chats`);
  return chats;
}

export async function listGroupMembers(
  caller: TdCaller,
  groupId: number,
  pageSize: number,
  options: PaginationOptions,
): Promise<User[]> {
  assertPageSize(pageSize);

  const chat = expectShape(ChatSchema, await caller.call('getChat', { chat_id: groupId }));
  const kind = chat.type['@type'];

  let members: ChatMember[];
  if (kind === 'chatTypeBasicGroup') {
    const { basic_group_id } = expectShape(BasicGroupChatTypeSchema, chat.type);
    const info = await caller.call('getBasicGroupFullInfo', { basic_group_id });
    members = expectShape(BasicGroupFullInfoSchema, info).members;
  } else if (kind === 'chatTypeSupergroup') {
    const { supergroup_id } = expectShape(SupergroupChatTypeSchema, chat.type);
    members = await listSupergroupMembers(caller, supergroup_id, pageSize, options);
  } else {
    throw new TdError(`Unknown group type: ${kind}`);
  }

  const users: User[] = [];
  for (const member of members) {
    users.push(expectShape(UserSchema, await caller.call('getUser', { user_id: member.user_id })));
  }
  return users;
}

export async function listSupergroupMembers(
  caller: TdCaller,
  supergroupId: number,
  pageSize: number,
  { delayMs, logger, sleep = sleepMs }: PaginationOptions,
): Promise<ChatMember[]> {
  assertPageSize(pageSize);

  const members: ChatMember[] = [];
  const seen = new Set<number>();
  let offset = 0;
  let totalCount: number | undefined;

  for (;;) {
    const response = expectShape(ChatMembersSchema, await caller.call('getSupergroupMembers', {
      supergroup_id: supergroupId,
      offset,
      limit: pageSize,
    }));
    const page = response.members;
    // Servers may report a different total on each page; the last one is kept.
    totalCount = response.total_count;

    for (const member of page) {
      if (seen.has(member.user_id)) continue;
      members.push(member);
      seen.add(member.user_id);
    }

    logger.info(`Got ${page.length} members. Total: ${members.length}`);
    if (page.length === 0) break;

    offset += page.length;
    await sleep(delayMs);
  }

  if (totalCount !== members.length) {
    logger.warn(`total_count != members: ${totalCount}/${members.length}`);
  }
  return members;
}
