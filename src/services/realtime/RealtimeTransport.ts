import type { RemoteProtocolError } from '../../errors';
import type { InboundEvent, OutboundEnvelope } from './protocol';

export type TransportSignal =
  | { kind: 'event'; event: InboundEvent }
  | { kind: 'fault'; error: RemoteProtocolError };

export type TransportListener = (signal: TransportSignal) => void;

export interface RealtimeTransport {
  /** Registers the single receiver of inbound events and the terminal fault. */
  subscribe(listener: TransportListener): void;
  connect(): Promise<void>;
  /** Control envelopes flush any buffered audio ahead of themselves. */
  send(envelope: OutboundEnvelope): void;
  appendAudio(frame: Buffer): void;
  isOpen(): boolean;
  close(): Promise<void>;
  terminate(): void;
}
