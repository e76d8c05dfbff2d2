import type { TdChannel } from '../tdlib/channel';
import type { TdObject, TdRequest } from '../tdlib/types';

/** Envelopes queued in answer to one request. */
export type Responder = (request: TdRequest) => TdObject[];

/**
 * In-process stand-in for libtdjson. Whatever the responder returns for a request is queued and
 * handed out one envelope per `receive`.
 */
export class FakeChannel implements TdChannel {
  readonly sent: TdRequest[] = [];
  closeCount = 0;
  private inbox: TdObject[] = [];

  constructor(private readonly responder: Responder = () => []) {}

  get closed(): boolean {
    return this.closeCount > 0;
  }

  send(request: TdRequest): void {
    if (this.closed) throw new Error('FakeChannel is closed');
    this.sent.push(request);
    this.inbox.push(...this.responder(request));
  }

  /** Queues envelopes that arrive without being asked for, like TDLib updates. */
  push(...envelopes: TdObject[]): void {
    this.inbox.push(...envelopes);
  }

  async receive(timeoutMs: number): Promise<TdObject | null> {
    const next = this.inbox.shift();
    if (next) return next;
    await new Promise((resolve) => setTimeout(resolve, Math.min(timeoutMs, 5)));
    return this.inbox.shift() ?? null;
  }

  async close(): Promise<void> {
    this.closeCount++;
  }

  methods(): string[] {
    return this.sent.map((request) => request['@type']);
  }
}

export type Handler = (request: TdRequest) => TdObject;

/** Answers each request with the handler registered for its method, echoing `@extra`. */
export function tdServer(handlers: Record<string, Handler>): Responder {
  return (request) => {
    const handler = handlers[request['@type']];
    const body = handler ? handler(request) : tdError(400, `Unknown method ${request['@type']}`);
    return [{ ...body, '@extra': request['@extra'] }];
  };
}

export function ok(): TdObject {
  return { '@type': 'ok' };
}

export function tdError(code: number, message: string): TdObject {
  return { '@type': 'error', code, message };
}
