import { TdError } from './errors';
import type { TdObject, TdRequest } from './types';

/**
 * Bidirectional message channel to TDLib. `receive` is the only place a call waits for input: it
 * resolves with the next envelope, or `null` once `timeoutMs` passes without one.
 */
export interface TdChannel {
  send(request: TdRequest): void;
  receive(timeoutMs: number): Promise<TdObject | null>;
  close(): Promise<void>;
}

export interface ChannelOptions {
  libraryPath: string;
  tdlibLogLevel: number;
}

export type ChannelFactory = (options: ChannelOptions) => TdChannel;

function isTdObject(value: unknown): value is TdObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    && '@type' in value && typeof value['@type'] === 'string';
}

/** Parses one JSON envelope as received from TDLib. */
export function parseEnvelope(raw: string): TdObject {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new TdError(`Invalid JSON from TDLib: ${raw.slice(0, 200)}`);
  }
  if (!isTdObject(value)) {
    throw new TdError(`Envelope without @type from TDLib: ${raw.slice(0, 200)}`);
  }
  return value;
}
