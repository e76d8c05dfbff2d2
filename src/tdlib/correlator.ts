/**
 * Request/response correlation over a TdChannel.
 *
 * TDLib answers on the same queue it pushes updates to. Each request gets a fresh id in `@extra`,
 * and the channel is polled until the envelope echoing that id comes back. Everything else that
 * arrives meanwhile belongs to no caller here and is dropped, never buffered.
 */
import { randomBytes } from 'crypto';
import type { TdChannel } from './channel';
import { raiseForError } from './classifier';
import { TimeoutError } from './errors';
import { requestIdOf, type CallOptions, type TdObject, type TdRequest } from './types';

export const DEFAULT_POLL_INTERVAL_MS = 100;
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export function genRequestId(): string {
  return randomBytes(16).toString('hex');
}

export interface CorrelatorOptions {
  /** Applies when a call gives no timeout of its own. 0 waits forever. */
  requestTimeoutMs?: number;
  pollIntervalMs?: number;
}

export class RequestCorrelator {
  private readonly requestTimeoutMs: number;
  private readonly pollIntervalMs: number;
  // Tail of the call chain. One request is in flight at a time.
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly channel: TdChannel, options: CorrelatorOptions = {}) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  /** Send `method` and wait for its own response. Calls issued concurrently run one after another. */
  call(method: string, params: object = {}, options: CallOptions = {}): Promise<TdObject> {
    const run = this.tail.then(() => this.exchange(method, params, options));
    // The caller gets the rejection through `run`; the chain only needs to know it settled.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async exchange(method: string, params: object, options: CallOptions): Promise<TdObject> {
    const requestId = genRequestId();
    const timeoutMs = options.timeoutMs !== undefined && options.timeoutMs > 0
      ? options.timeoutMs
      : this.requestTimeoutMs;
    const request: TdRequest = { ...params, '@type': method, '@extra': { request_id: requestId } };

    this.channel.send(request);
    const startedAt = Date.now();

    for (;;) {
      const response = await this.channel.receive(this.pollIntervalMs);
      if (response && requestIdOf(response) === requestId) {
        raiseForError(response);
        return response;
      }
      if (timeoutMs > 0 && Date.now() - startedAt > timeoutMs) {
        throw new TimeoutError(method, timeoutMs);
      }
    }
  }
}
