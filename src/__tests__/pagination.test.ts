import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Logger } from '../logger';
import { TdError, ValidationError } from '../tdlib/errors';
import {
  MAX_CHAT_ORDER,
  listAllChats,
  listGroupMembers,
  listSupergroupMembers,
} from '../tdlib/pagination';
import type { TdCaller, TdObject } from '../tdlib/types';

type Handler = (params: Record<string, unknown>) => TdObject;

interface RecordedCall {
  method: string;
  params: Record<string, unknown>;
}

/** TdCaller that answers from per-method handlers and records every call. */
function fakeCaller(handlers: Record<string, Handler>): TdCaller & { calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  return {
    calls,
    call: async (method: string, params: object) => {
      const record = { method, params: { ...params } };
      calls.push(record);
      const handler = handlers[method];
      if (!handler) throw new Error(`unexpected call ${method}`);
      return handler(record.params);
    },
  };
}

/** Hands out one scripted response per call, in order. */
function pages(...responses: TdObject[]): Handler {
  let i = 0;
  return () => {
    const response = responses[i++];
    if (!response) throw new Error('no more pages scripted');
    return response;
  };
}

function chat(id: number, type: TdObject = { '@type': 'chatTypePrivate', user_id: id }): TdObject {
  return { '@type': 'chat', id, title: `Chat ${id}`, order: String(1000 - id), type };
}

function chatIds(...ids: number[]): TdObject {
  return { '@type': 'chats', chat_ids: ids };
}

function member(userId: number): TdObject {
  return { '@type': 'chatMember', user_id: userId, status: { '@type': 'chatMemberStatusMember' } };
}

function memberPage(totalCount: number, ...userIds: number[]): TdObject {
  return { '@type': 'chatMembers', total_count: totalCount, members: userIds.map(member) };
}

const getChat: Handler = (params) => chat(Number(params.chat_id));
const getUser: Handler = (params) => ({ '@type': 'user', id: params.user_id, first_name: `User ${params.user_id}` });

describe('pagination', () => {
  let logger: Logger;
  let sleep: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    sleep = vi.fn().mockResolvedValue(undefined);
  });

  describe('listAllChats', () => {
    it.each([1, 0, -5, 2.5])('rejects page size %s before sending anything', async (pageSize) => {
      const caller = fakeCaller({});
      await expect(listAllChats(caller, pageSize, { delayMs: 500, logger, sleep }))
        .rejects.toBeInstanceOf(ValidationError);
      expect(caller.calls).toHaveLength(0);
    });

    it('starts from the top of the list', async () => {
      const caller = fakeCaller({ getChats: pages(chatIds()), getChat });

      const chats = await listAllChats(caller, 100, { delayMs: 500, logger, sleep });

      expect(chats).toEqual([]);
      expect(caller.calls).toEqual([
        { method: 'getChats', params: { offset_order: MAX_CHAT_ORDER, offset_chat_id: 0, limit: 100 } },
      ]);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('deduplicates overlapping pages and keeps first-seen order', async () => {
      const caller = fakeCaller({
        getChats: pages(chatIds(1, 2), chatIds(2, 3), chatIds(4)),
        getChat,
      });

      const chats = await listAllChats(caller, 2, { delayMs: 500, logger, sleep });

      expect(chats.map((c) => c.id)).toEqual([1, 2, 3, 4]);
      expect(caller.calls.filter((c) => c.method === 'getChat').map((c) => c.params.chat_id))
        .toEqual([1, 2, 3, 4]);
    });

    it('advances the cursor from the last chat collected', async () => {
      const caller = fakeCaller({
        getChats: pages(chatIds(1, 2), chatIds(2, 3), chatIds(4)),
        getChat,
      });

      await listAllChats(caller, 2, { delayMs: 500, logger, sleep });

      const cursors = caller.calls
        .filter((c) => c.method === 'getChats')
        .map((c) => [c.params.offset_order, c.params.offset_chat_id]);
      expect(cursors).toEqual([[MAX_CHAT_ORDER, 0], ['998', 2], ['997', 3]]);
    });

    it('sleeps between pages but not after the last one', async () => {
      const caller = fakeCaller({
        getChats: pages(chatIds(1, 2), chatIds(2, 3), chatIds(4)),
        getChat,
      });

      await listAllChats(caller, 2, { delayMs: 500, logger, sleep });

      expect(sleep).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledWith(500);
    });

    it('stops on an empty page after a full one', async () => {
      const caller = fakeCaller({ getChats: pages(chatIds(1, 2), chatIds()), getChat });

      const chats = await listAllChats(caller, 2, { delayMs: 500, logger, sleep });

      expect(chats.map((c) => c.id)).toEqual([1, 2]);
      expect(sleep).toHaveBeenCalledTimes(1);
    });

    it('stops when a full page brings nothing new', async () => {
      const caller = fakeCaller({ getChats: pages(chatIds(1, 2), chatIds(1, 2)), getChat });

      const chats = await listAllChats(caller, 2, { delayMs: 500, logger, sleep });

      expect(chats.map((c) => c.id)).toEqual([1, 2]);
      expect(logger.warn).toHaveBeenCalledWith('getChats returned a full page of known chats at order 998; stopping');
    });

    it('treats a malformed page as a protocol error', async () => {
      const caller = fakeCaller({ getChats: () => ({ '@type': 'chats', chat_ids: 'nope' }) });

      const error = await listAllChats(caller, 2, { delayMs: 0, logger, sleep }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TdError);
      expect(error).toMatchObject({ kind: 'ProtocolError' });
    });
  });

  describe('listGroupMembers', () => {
    it('reads a basic group in one call', async () => {
      const caller = fakeCaller({
        getChat: () => chat(-10, { '@type': 'chatTypeBasicGroup', basic_group_id: 10 }),
        getBasicGroupFullInfo: () => ({ '@type': 'basicGroupFullInfo', members: [member(1), member(2)] }),
        getUser,
      });

      const users = await listGroupMembers(caller, -10, 200, { delayMs: 500, logger, sleep });

      expect(users).toEqual([
        { '@type': 'user', id: 1, first_name: 'User 1' },
        { '@type': 'user', id: 2, first_name: 'User 2' },
      ]);
      expect(caller.calls.map((c) => c.method)).toEqual(['getChat', 'getBasicGroupFullInfo', 'getUser', 'getUser']);
      expect(caller.calls[1].params).toEqual({ basic_group_id: 10 });
      expect(sleep).not.toHaveBeenCalled();
    });

    it('pages a supergroup until an empty page', async () => {
      const caller = fakeCaller({
        getChat: () => chat(-1001, { '@type': 'chatTypeSupergroup', supergroup_id: 1001, is_channel: false }),
        getSupergroupMembers: pages(memberPage(4, 1, 2, 3), memberPage(4, 3, 4), memberPage(4)),
        getUser,
      });

      const users = await listGroupMembers(caller, -1001, 3, { delayMs: 500, logger, sleep });

      expect(users.map((u) => u.id)).toEqual([1, 2, 3, 4]);
      const pageRequests = caller.calls.filter((c) => c.method === 'getSupergroupMembers').map((c) => c.params);
      expect(pageRequests).toEqual([
        { supergroup_id: 1001, offset: 0, limit: 3 },
        { supergroup_id: 1001, offset: 3, limit: 3 },
        { supergroup_id: 1001, offset: 5, limit: 3 },
      ]);
      expect(sleep).toHaveBeenCalledTimes(2);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('rejects an unknown group type', async () => {
      const caller = fakeCaller({ getChat: () => chat(5) });

      const error = await listGroupMembers(caller, 5, 200, { delayMs: 0, logger, sleep }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TdError);
      expect(error).toMatchObject({ kind: 'ProtocolError', message: 'Unknown group type: chatTypePrivate' });
    });

    it('validates the page size before looking up the chat', async () => {
      const caller = fakeCaller({});
      await expect(listGroupMembers(caller, -10, 1, { delayMs: 0, logger, sleep }))
        .rejects.toBeInstanceOf(ValidationError);
      expect(caller.calls).toHaveLength(0);
    });
  });

  describe('listSupergroupMembers', () => {
    it('logs a total count mismatch without failing', async () => {
      const caller = fakeCaller({
        getSupergroupMembers: pages(memberPage(10, 1, 2), memberPage(10)),
      });

      const members = await listSupergroupMembers(caller, 7, 200, { delayMs: 0, logger, sleep });

      expect(members.map((m) => m.user_id)).toEqual([1, 2]);
      expect(logger.warn).toHaveBeenCalledWith('total_count != members: 10/2');
    });

    it('logs each page', async () => {
      const caller = fakeCaller({
        getSupergroupMembers: pages(memberPage(2, 1, 2), memberPage(2)),
      });

      await listSupergroupMembers(caller, 7, 200, { delayMs: 0, logger, sleep });

      expect(logger.info).toHaveBeenNthCalledWith(1, 'Got 2 members. Total: 2');
      expect(logger.info).toHaveBeenNthCalledWith(2, 'Got 0 members. Total: 2');
    });
  });
});
