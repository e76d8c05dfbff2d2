#!/usr/bin/env node

import { readPid, removePid, getPort, getAuthToken, getClientOptions, loadConfig } from './config';
import { startDaemon } from './daemon';
import { openClient } from './index';
import type { TdClient } from './tdlib/client';
import { resolveClientOptions } from './tdlib/options';

const USAGE = `Usage: tdgate <command>

  start                         run the HTTP daemon
  stop | status                 manage a running daemon
  login                         send a login code to the configured phone
  code <code> [password]        submit the login code (and 2FA password)
  logout
  me
  chats [pageSize]
  members <groupId> [pageSize]
  user <userId>`;

const [command = 'start', ...args] = process.argv.slice(2);

async function main() {
  switch (command) {
    case 'start':
      await start();
      break;
    case 'stop':
      stop();
      break;
    case 'status':
      status();
      break;
    case 'login':
      await withClient(async (client) => {
        await client.requestAuthCode();
        return { ok: true };
      });
      break;
    case 'code':
      await withClient(async (client) => ({ state: await client.submitCode(required(args[0], 'code'), args[1]) }));
      break;
    case 'logout':
      await withClient(async (client) => {
        await client.logOut();
        return { ok: true };
      });
      break;
    case 'me':
      await withClient((client) => client.getMe());
      break;
    case 'chats':
      await withClient((client) => client.listAllChats(optionalInt(args[0], 'pageSize')));
      break;
    case 'members':
      await withClient((client) => client.listGroupMembers(
        requiredInt(args[0], 'groupId'),
        optionalInt(args[1], 'pageSize'),
      ));
      break;
    case 'user':
      await withClient((client) => client.getUser(requiredInt(args[0], 'userId')));
      break;
    default:
      console.log(USAGE);
      process.exit(1);
  }
}

function required(value: string | undefined, name: string): string {
  if (!value) {
    console.error(`Missing <${name}>\n\n${USAGE}`);
    process.exit(1);
  }
  return value;
}

function requiredInt(value: string | undefined, name: string): number {
  const n = optionalInt(required(value, name), name);
  if (n === undefined) process.exit(1);
  return n;
}

function optionalInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const n = parseInt(value, 10);
  if (Number.isNaN(n)) {
    console.error(`<${name}> must be a number, got "${value}"`);
    process.exit(1);
  }
  return n;
}

/** Opens a client, prints the result as JSON and always closes the client. */
async function withClient(run: (client: TdClient) => Promise<unknown>) {
  const client = await openClient(resolveClientOptions(getClientOptions()));
  try {
    console.log(JSON.stringify(await run(client), null, 2));
  } finally {
    await client.close();
  }
}

async function start() {
  const existingPid = readPid();
  if (existingPid) {
    try {
      process.kill(existingPid, 0);
      console.error(`Daemon already running (PID ${existingPid})`);
      process.exit(1);
    } catch {
      removePid();
    }
  }

  const config = loadConfig();
  const port = getPort(config);
  const client = await openClient(resolveClientOptions(getClientOptions(config)));
  const daemon = await startDaemon(client, { port, authToken: getAuthToken(config) });

  const onSignal = () => {
    daemon.shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('Shutdown failed:', err);
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const state = await client.getAuthState().catch((err: unknown) => (
    `state unavailable: ${err instanceof Error ? err.message : String(err)}`
  ));
  console.log(`tdgate listening on http://127.0.0.1:${port} (${state})`);
}

function stop() {
  const pid = readPid();
  if (!pid) {
    console.log('Daemon not running');
    return;
  }
  try {
    process.kill(pid, 'SIGTERM');
    removePid();
    console.log(`Stopped daemon (PID ${pid})`);
  } catch {
    console.log('Daemon not running (stale PID file)');
    removePid();
  }
}

function status() {
  const pid = readPid();
  if (!pid) {
    console.log('Daemon not running');
    return;
  }
  try {
    process.kill(pid, 0);
    console.log(`Daemon running (PID ${pid}) on port ${getPort()}`);
  } catch {
    console.log('Daemon not running (stale PID file)');
    removePid();
  }
}

main().catch(err => {
  console.error('Fatal:', err instanceof Error ? err.message : err);
  process.exit(1);
});
