/**
 * libtdjson binding.
 *
 * Uses the td_json_client_* functions. `td_json_client_receive` blocks for up to its timeout, so it
 * is run through koffi's async call on a worker thread and the event loop keeps turning.
 */
import * as koffi from 'koffi';
import { parseEnvelope, type ChannelOptions, type TdChannel } from './channel';
import { TdError } from './errors';
import type { TdObject, TdRequest } from './types';

export function createTdJsonChannel(options: ChannelOptions): TdChannel {
  let lib: ReturnType<typeof koffi.load>;
  try {
    lib = koffi.load(options.libraryPath);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new TdError(`Cannot load TDLib from ${options.libraryPath}: ${reason}`);
  }

  const tdCreate = lib.func('td_json_client_create', 'void *', []);
  const tdSend = lib.func('td_json_client_send', 'void', ['void *', 'str']);
  const tdReceive = lib.func('td_json_client_receive', 'str', ['void *', 'double']);
  const tdExecute = lib.func('td_json_client_execute', 'str', ['void *', 'str']);
  const tdDestroy = lib.func('td_json_client_destroy', 'void', ['void *']);

  const handle: unknown = tdCreate();
  let closed = false;
  let inFlight: Promise<TdObject | null> | null = null;

  const assertOpen = () => {
    if (closed) throw new TdError('TDLib channel is closed');
  };

  tdExecute(handle, JSON.stringify({ '@type': 'setLogVerbosityLevel', new_verbosity_level: options.tdlibLogLevel }));

  return {
    send(request: TdRequest): void {
      assertOpen();
      tdSend(handle, JSON.stringify(request));
    },

    receive(timeoutMs: number): Promise<TdObject | null> {
      assertOpen();
      const pending = new Promise<TdObject | null>((resolve, reject) => {
        tdReceive.async(handle, timeoutMs / 1000, (err: unknown, raw: unknown) => {
          if (err) {
            reject(err instanceof Error ? err : new TdError(String(err)));
            return;
          }
          if (typeof raw !== 'string') {
            resolve(null);
            return;
          }
          try {
            resolve(parseEnvelope(raw));
          } catch (parseErr: unknown) {
            reject(parseErr);
          }
        });
      });
      inFlight = pending;
      return pending;
    },

    async close(): Promise<void> {
      if (closed) return;
      closed = true;
      // The native receive must finish before the handle is destroyed under it.
      if (inFlight) await Promise.allSettled([inFlight]);
      tdDestroy(handle);
    },
  };
}
