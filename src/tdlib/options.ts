import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ValidationError } from './errors';
import { DEFAULT_POLL_INTERVAL_MS, DEFAULT_REQUEST_TIMEOUT_MS } from './correlator';
import { DEFAULT_CHATS_PAGE_SIZE, DEFAULT_MEMBERS_PAGE_SIZE, DEFAULT_REQUEST_DELAY_MS } from './pagination';

export const ENCRYPTION_KEY_LENGTH = 12;
export const DEFAULT_LIBRARY_PATH = 'libtdjson.so';
export const DEFAULT_SESSIONS_DIRECTORY = path.join(os.homedir(), '.tdgate', 'sessions');

const pageSize = z.number().int().gt(1);
const duration = z.number().nonnegative();

export const ProxySchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
});

export const ClientOptionsSchema = z.object({
  apiId: z.number().int().positive(),
  apiHash: z.string().min(1),
  phone: z.string().min(1),
  encryptionKey: z.string().length(ENCRYPTION_KEY_LENGTH, {
    message: `must be exactly ${ENCRYPTION_KEY_LENGTH} characters`,
  }),
  libraryPath: z.string().min(1).default(DEFAULT_LIBRARY_PATH),
  tdlibLogLevel: z.number().int().min(0).max(1024).default(2),
  requestTimeoutMs: duration.default(DEFAULT_REQUEST_TIMEOUT_MS),
  requestDelayMs: duration.default(DEFAULT_REQUEST_DELAY_MS),
  pollIntervalMs: z.number().positive().default(DEFAULT_POLL_INTERVAL_MS),
  sessionsDirectory: z.string().min(1).default(DEFAULT_SESSIONS_DIRECTORY),
  useTestDataCenter: z.boolean().default(false),
  useMessageDatabase: z.boolean().default(true),
  proxy: ProxySchema.optional(),
  deviceModel: z.string().default('tdgate'),
  applicationVersion: z.string().default('1.0.0'),
  systemVersion: z.string().default('node'),
  systemLanguageCode: z.string().default('en'),
  chatsPageSize: pageSize.default(DEFAULT_CHATS_PAGE_SIZE),
  membersPageSize: pageSize.default(DEFAULT_MEMBERS_PAGE_SIZE),
});

/** What callers pass: required credentials, everything else optional. */
export type TdClientOptions = z.input<typeof ClientOptionsSchema>;
/** After defaults are applied. */
export type TdClientSettings = z.output<typeof ClientOptionsSchema>;

/** Applies defaults and checks every field; accepts loosely typed input such as a config file. */
export function resolveClientOptions(options: unknown): TdClientSettings {
  const result = ClientOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues.map((i) => `${i.path}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid client options: ${summary}`, issues);
  }
  return result.data;
}
