import Fastify, { type FastifyError, type FastifyReply, type FastifyRequest } from 'fastify';
import fastifyCors from '@fastify/cors';
import { z } from 'zod';
import type { TdClient } from './tdlib/client';
import { TdError, ValidationError, type TdErrorKind } from './tdlib/errors';
import { AuthState } from './tdlib/types';

export interface ServerOptions {
  authToken?: string;
  /** Fastify request logging; on for the daemon, off in tests. */
  logger?: boolean;
}

export const STATUS_BY_KIND: Record<TdErrorKind, number> = {
  Validation: 400,
  InvalidPhoneNumber: 400,
  PasswordError: 400,
  PhoneCodeInvalid: 400,
  AuthError: 401,
  TwoFactorPasswordNeeded: 401,
  NoPermission: 403,
  ObjectNotFound: 404,
  AlreadyAuthorized: 409,
  AlreadyLoggingOut: 409,
  TooManyRequests: 429,
  ProtocolError: 502,
  UnknownError: 502,
  Timeout: 504,
};

const CodeBody = z.object({ code: z.string().min(1), password: z.string().min(1).optional() });
const PageQuery = z.object({ pageSize: z.coerce.number().int().optional() });
const CallQuery = z.object({ timeoutMs: z.coerce.number().nonnegative().optional() });
const NumericId = z.coerce.number().int();

function parseInput<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
    throw new ValidationError(`Invalid ${what}: ${issues.map((i) => `${i.path || what}: ${i.message}`).join('; ')}`, issues);
  }
  return result.data;
}

/** Builds the HTTP app around an open client. Listening is left to the caller. */
export async function buildServer(client: TdClient, options: ServerOptions = {}) {
  const app = Fastify({ logger: options.logger ?? false });
  const { authToken } = options;

  await app.register(fastifyCors, {
    origin: true,
    credentials: true,
  });

  // Auth middleware
  if (authToken) {
    app.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
      if (request.routeOptions.url === '/health') return;

      const header = request.headers.authorization;
      const token = header?.startsWith('Bearer ') ? header.slice(7) : null;
      if (token !== authToken) {
        return reply.code(401).send({ error: 'Unauthorized' });
      }
    });
  }

  // --- Health ---
  app.get('/health', async () => ({
    status: 'ok',
    uptime: process.uptime(),
  }));

  // --- Auth ---
  app.get('/auth/state', async () => {
    const state = await client.getAuthState();
    return { state, authorized: state === AuthState.Ready };
  });

  app.post('/login/phone', async () => {
    await client.requestAuthCode();
    return { ok: true };
  });

  app.post('/login/code', async (request) => {
    const { code, password } = parseInput(CodeBody, request.body, 'body');
    try {
      const state = await client.submitCode(code, password);
      return { ok: true, state };
    } catch (err: unknown) {
      if (err instanceof TdError && err.kind === 'TwoFactorPasswordNeeded') {
        return { ok: false, need2FA: true };
      }
      throw err;
    }
  });

  app.post('/logout', async () => {
    await client.logOut();
    return { ok: true };
  });

  // --- Me, users, chats ---
  app.get('/me', async () => client.getMe());

  app.get<{ Params: { userId: string } }>('/users/:userId', async (request) => {
    return client.getUser(parseInput(NumericId, request.params.userId, 'userId'));
  });

  app.get('/chats', async (request) => {
    const { pageSize } = parseInput(PageQuery, request.query, 'query');
    return client.listAllChats(pageSize);
  });

  app.get<{ Params: { groupId: string } }>('/groups/:groupId/members', async (request) => {
    const groupId = parseInput(NumericId, request.params.groupId, 'groupId');
    const { pageSize } = parseInput(PageQuery, request.query, 'query');
    return client.listGroupMembers(groupId, pageSize);
  });

  // --- Raw calls ---
  app.post<{ Params: { method: string } }>('/call/:method', async (request) => {
    const params = parseInput(z.record(z.unknown()).default({}), request.body ?? undefined, 'body');
    const { timeoutMs } = parseInput(CallQuery, request.query, 'query');
    return client.callRaw(request.params.method, params, { timeoutMs });
  });

  // --- Error handler ---
  app.setErrorHandler((error: FastifyError | TdError, _request, reply) => {
    if (error instanceof TdError) {
      const statusCode = STATUS_BY_KIND[error.kind];
      return reply.code(statusCode).send({
        error: error.message,
        kind: error.kind,
        ...(error.code !== undefined ? { code: error.code } : {}),
        statusCode,
      });
    }
    const statusCode = error.statusCode || 500;
    return reply.code(statusCode).send({
      error: error.message || 'Internal Server Error',
      statusCode,
    });
  });

  return app;
}

export type GatewayServer = Awaited<ReturnType<typeof buildServer>>;
