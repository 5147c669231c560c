import type { RawPayload } from '../protocol/codec';

/**
 * One bidirectional socket. `receive` is a pull: at most one read is
 * outstanding at a time, and it rejects with a TransportError once the socket
 * fails or closes.
 */
export interface Transport {
  open(): Promise<void>;
  send(text: string): Promise<void>;
  receive(): Promise<RawPayload>;
  close(code?: number, reason?: string): void;
}

export type TransportFactory = (url: string) => Transport;
