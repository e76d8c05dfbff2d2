import { removePid, writePid } from './config';
import { buildServer, type GatewayServer } from './server';
import type { TdClient } from './tdlib/client';

export interface DaemonOptions {
  port: number;
  host?: string;
  authToken?: string;
}

export interface Daemon {
  app: GatewayServer;
  /** Stops listening, then releases the client. */
  shutdown(): Promise<void>;
}

/**
 * Serves `client` over HTTP and writes the pid file once the port is bound. If the server cannot
 * be built or cannot listen, everything acquired so far is released, the client included, and the
 * error is rethrown.
 */
export async function startDaemon(client: TdClient, { port, host = '127.0.0.1', authToken }: DaemonOptions): Promise<Daemon> {
  let app: GatewayServer;
  try {
    app = await buildServer(client, { authToken, logger: true });
  } catch (err) {
    await client.close();
    throw err;
  }

  try {
    await app.listen({ port, host });
    writePid();
  } catch (err) {
    removePid();
    await app.close();
    await client.close();
    throw err;
  }

  const server = app;
  return {
    app: server,
    async shutdown() {
      server.log.info('Shutting down...');
      removePid();
      await server.close();
      await client.close();
    },
  };
}
