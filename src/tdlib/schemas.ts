import { z } from 'zod';
import { TdError } from './errors';

// TDLib renders int64 fields as decimal strings; older builds sent some as numbers.
const int64 = z.union([z.string(), z.number()]).transform((v) => String(v));

export const BasicGroupChatTypeSchema = z.object({
  '@type': z.literal('chatTypeBasicGroup'),
  basic_group_id: z.number(),
}).passthrough();

export const SupergroupChatTypeSchema = z.object({
  '@type': z.literal('chatTypeSupergroup'),
  supergroup_id: z.number(),
  is_channel: z.boolean(),
}).passthrough();

export const ChatSchema = z.object({
  '@type': z.literal('chat'),
  id: z.number(),
  title: z.string(),
  order: int64,
  // Left loose here so an unfamiliar chat type reaches the caller instead of failing the parse.
  type: z.object({ '@type': z.string() }).passthrough(),
}).passthrough();

export const ChatsSchema = z.object({
  '@type': z.literal('chats'),
  chat_ids: z.array(z.number()),
}).passthrough();

export const ChatMemberSchema = z.object({
  '@type': z.literal('chatMember'),
  user_id: z.number(),
}).passthrough();

export const BasicGroupFullInfoSchema = z.object({
  '@type': z.literal('basicGroupFullInfo'),
  members: z.array(ChatMemberSchema),
}).passthrough();

export const ChatMembersSchema = z.object({
  '@type': z.literal('chatMembers'),
  total_count: z.number(),
  members: z.array(ChatMemberSchema),
}).passthrough();

export const UserSchema = z.object({
  '@type': z.literal('user'),
  id: z.number(),
}).passthrough();

export type Chat = z.infer<typeof ChatSchema>;
export type ChatMember = z.infer<typeof ChatMemberSchema>;
export type User = z.infer<typeof UserSchema>;

/** Checks a response against its expected shape; a mismatch is a protocol error. */
export function expectShape<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length ? ` at ${issue.path.join('.')}` : '';
    throw new TdError(`Unexpected response shape${where}: ${issue?.message ?? 'invalid'}`);
  }
  return result.data;
}
