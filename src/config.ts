import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ValidationError } from './tdlib/errors';
import { ClientOptionsSchema } from './tdlib/options';

const CONFIG_DIR = path.join(process.env.HOME || '/root', '.tdgate');
const CONFIG_FILE = path.join(CONFIG_DIR, 'config.json');
const PID_FILE = path.join(CONFIG_DIR, 'daemon.pid');

export const DEFAULT_PORT = 7788;

export const GatewayConfigSchema = ClientOptionsSchema.partial().extend({
  port: z.number().int().min(1).max(65535).optional(),
  authToken: z.string().min(1).optional(),
});

export type GatewayConfig = z.output<typeof GatewayConfigSchema>;
/** Client options as configured, before credentials are checked and defaults applied. */
export type ConfiguredClientOptions = Omit<GatewayConfig, 'port' | 'authToken'>;

export function ensureConfigDir(): void {
  if (!fs.existsSync(CONFIG_DIR)) {
    fs.mkdirSync(CONFIG_DIR, { recursive: true, mode: 0o700 });
  }
}

export function loadConfig(file = CONFIG_FILE): GatewayConfig {
  if (!fs.existsSync(file)) return {};
  const raw = fs.readFileSync(file, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Config file ${file} is not valid JSON: ${reason}`);
  }
  const result = GatewayConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
    throw new ValidationError(`Invalid config file ${file}: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`, issues);
  }
  return result.data;
}

function envInt(value: string | undefined): number | undefined {
  const n = parseInt(value || '', 10);
  return Number.isNaN(n) ? undefined : n;
}

/**
 * Client options from the config file with environment overrides. Missing credentials stay
 * missing here; `resolveClientOptions` reports them.
 */
export function getClientOptions(config: GatewayConfig = loadConfig(), env: NodeJS.ProcessEnv = process.env): ConfiguredClientOptions {
  const { port: _port, authToken: _authToken, ...options } = config;
  return {
    ...options,
    apiId: envInt(env.TDLIB_API_ID) ?? options.apiId,
    apiHash: env.TDLIB_API_HASH || options.apiHash,
    phone: env.TDLIB_PHONE || options.phone,
    encryptionKey: env.TDLIB_ENCRYPTION_KEY || options.encryptionKey,
    libraryPath: env.TDLIB_LIBRARY_PATH || options.libraryPath,
    sessionsDirectory: env.TDLIB_SESSIONS_DIR || options.sessionsDirectory,
  };
}

export function getPort(config: GatewayConfig = loadConfig(), env: NodeJS.ProcessEnv = process.env): number {
  return envInt(env.PORT) || config.port || DEFAULT_PORT;
}

export function getAuthToken(config: GatewayConfig = loadConfig(), env: NodeJS.ProcessEnv = process.env): string | undefined {
  return env.AUTH_TOKEN || config.authToken;
}

export function writePid(): void {
  ensureConfigDir();
  fs.writeFileSync(PID_FILE, process.pid.toString());
}

export function readPid(): number | null {
  if (!fs.existsSync(PID_FILE)) return null;
  const pid = parseInt(fs.readFileSync(PID_FILE, 'utf-8').trim(), 10);
  return Number.isNaN(pid) ? null : pid;
}

export function removePid(): void {
  if (fs.existsSync(PID_FILE)) fs.unlinkSync(PID_FILE);
}
