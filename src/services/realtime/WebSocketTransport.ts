import WebSocket, { type RawData } from 'ws';
import { ConfigurationError, ConnectionError, RemoteProtocolError, describeError } from '../../errors';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import { OutboundAudioBuffer } from './OutboundAudioBuffer';
import {
  buildAudioAppend,
  encodeEnvelope,
  parseInboundEnvelope,
  type InboundEvent,
  type OutboundEnvelope,
  type ParsedEnvelope
} from './protocol';
import type { RealtimeTransport, TransportListener, TransportSignal } from './RealtimeTransport';

const NORMAL_CLOSURE = 1000;
const DEFAULT_MAX_BUFFERED_BYTES = 4 * 1024 * 1024;

export interface SocketHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onError(error: Error): void;
  onClose(code: number, reason: string): void;
}

export interface RealtimeSocket {
  send(data: string): void;
  close(code: number, reason: string): void;
  terminate(): void;
  bufferedAmount(): number;
}

export type SocketFactory = (
  url: string,
  headers: Record<string, string>,
  handlers: SocketHandlers
) => RealtimeSocket;

const rawDataToString = (data: RawData): string => {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }

  if (data instanceof ArrayBuffer) {
    return Buffer.from(new Uint8Array(data)).toString('utf8');
  }

  return data.toString('utf8');
};

export const openWebSocket: SocketFactory = (url, headers, handlers) => {
  const socket = new WebSocket(url, { headers });

  socket.on('open', () => {
    handlers.onOpen();
  });
  socket.on('message', (data: RawData) => {
    handlers.onMessage(rawDataToString(data));
  });
  socket.on('error', (error: Error) => {
    handlers.onError(error);
  });
  socket.on('close', (code: number, reason: Buffer) => {
    handlers.onClose(code, reason.toString('utf8'));
  });

  return {
    send: (data) => {
      socket.send(data);
    },
    close: (code, reason) => {
      socket.close(code, reason);
    },
    terminate: () => {
      socket.terminate();
    },
    bufferedAmount: () => socket.bufferedAmount
  };
};

export const buildRealtimeUrl = (baseUrl: string, model: string): string => {
  const url = new URL(baseUrl);
  url.searchParams.set('model', model);
  return url.toString();
};

export interface WebSocketTransportOptions {
  url: string;
  apiKey: string;
  model: string;
  flushIntervalMs: number;
  flushChunkCount: number;
  maxBufferedBytes?: number;
  socketFactory?: SocketFactory;
}

type ConnectionState = 'new' | 'connecting' | 'open' | 'closing' | 'closed';

/**
 * One WebSocket per session. Inbound frames are decoded into typed events;
 * an unexpected close, socket error or undecodable frame becomes a single
 * terminal fault, after which nothing more is delivered.
 */
export class WebSocketTransport implements RealtimeTransport {
  private socket: RealtimeSocket | undefined;
  private state: ConnectionState = 'new';
  private listener: TransportListener | undefined;
  private faulted = false;
  private droppedAudioBytes = 0;
  private closeWaiters: Array<() => void> = [];
  private rejectConnect: ((error: Error) => void) | undefined;
  // Turn ids of sent `response.create`s still waiting for `response.created`, oldest first.
  private readonly awaitingResponseTurns: number[] = [];
  private readonly responseTurns = new Map<string, number>();
  private readonly audioBuffer: OutboundAudioBuffer;

  public constructor(
    private readonly options: WebSocketTransportOptions,
    private readonly logger?: StructuredLogger
  ) {
    this.audioBuffer = new OutboundAudioBuffer({
      flushIntervalMs: options.flushIntervalMs,
      flushChunkCount: options.flushChunkCount,
      onFlush: (audio) => {
        this.sendAudio(audio);
      }
    });
  }

  public subscribe(listener: TransportListener): void {
    this.listener = listener;
  }

  public isOpen(): boolean {
    return this.state === 'open';
  }

  public getDroppedAudioBytes(): number {
    return this.droppedAudioBytes;
  }

  public connect(): Promise<void> {
    if (!this.options.apiKey.trim()) {
      return Promise.reject(new ConfigurationError('OPENAI_API_KEY is not set.', ['apiKey: missing']));
    }

    if (this.state !== 'new') {
      return Promise.reject(new ConnectionError(`Transport cannot connect from state '${this.state}'`));
    }

    this.state = 'connecting';
    const url = buildRealtimeUrl(this.options.url, this.options.model);
    this.logger?.info('Connecting realtime transport', { url });

    return new Promise<void>((resolve, reject) => {
      this.rejectConnect = reject;
      const handlers: SocketHandlers = {
        onOpen: () => {
          if (this.state !== 'connecting') {
            return;
          }

          this.state = 'open';
          this.rejectConnect = undefined;
          this.logger?.info('Realtime transport connected');
          resolve();
        },
        onMessage: (data) => {
          this.handleMessage(data);
        },
        onError: (error) => {
          if (this.state === 'connecting') {
            this.failConnect(new ConnectionError(`Realtime handshake failed: ${error.message}`, { cause: error }));
            return;
          }

          this.fault(new RemoteProtocolError(`Realtime socket error: ${error.message}`, 'socket_error', { cause: error }));
        },
        onClose: (code, reason) => {
          this.handleClose(code, reason);
        }
      };

      try {
        this.socket = (this.options.socketFactory ?? openWebSocket)(
          url,
          {
            Authorization: `Bearer ${this.options.apiKey}`,
            'OpenAI-Beta': 'realtime=v1'
          },
          handlers
        );
      } catch (error) {
        this.failConnect(
          new ConnectionError(`Realtime connection could not be opened: ${describeError(error)}`, { cause: error })
        );
      }
    });
  }

  public send(envelope: OutboundEnvelope): void {
    if (envelope.type !== 'input_audio_buffer.append') {
      this.audioBuffer.flush();
    }

    if (envelope.type === 'response.create') {
      this.awaitingResponseTurns.push(envelope.turn_id);
    }

    this.write(envelope);
  }

  public appendAudio(frame: Buffer): void {
    if (this.state !== 'open') {
      return;
    }

    this.audioBuffer.push(frame);
  }

  public close(): Promise<void> {
    this.audioBuffer.discard();
    const socket = this.socket;
    if (!socket || this.state === 'closed' || this.state === 'new') {
      this.state = 'closed';
      return Promise.resolve();
    }

    const closed = new Promise<void>((resolve) => {
      this.closeWaiters.push(resolve);
    });

    if (this.state !== 'closing') {
      this.state = 'closing';
      socket.close(NORMAL_CLOSURE, 'session ended');
    }

    return closed;
  }

  public terminate(): void {
    this.audioBuffer.discard();
    const socket = this.socket;
    this.state = 'closed';
    this.socket = undefined;
    this.releaseCloseWaiters();
    this.failConnect(new ConnectionError('Realtime connection was terminated during the handshake'));
    if (socket) {
      socket.terminate();
      this.logger?.warn('Realtime transport terminated');
    }
  }

  private write(envelope: OutboundEnvelope): void {
    const socket = this.socket;
    if (!socket || this.state !== 'open') {
      this.logger?.warn('Dropped outbound envelope on closed transport', { type: envelope.type });
      return;
    }

    try {
      socket.send(encodeEnvelope(envelope));
    } catch (error) {
      this.fault(new RemoteProtocolError(`Realtime send failed: ${describeError(error)}`, 'send_failed', { cause: error }));
    }
  }

  private sendAudio(audio: Buffer): void {
    const limit = this.options.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES;
    const buffered = this.socket?.bufferedAmount() ?? 0;
    if (buffered > limit) {
      this.droppedAudioBytes += audio.length;
      this.logger?.warn('Dropped outbound audio while the socket is congested', {
        bufferedBytes: buffered,
        droppedBytes: audio.length
      });
      return;
    }

    this.write(buildAudioAppend(audio));
  }

  private handleMessage(data: string): void {
    if (this.faulted || this.state !== 'open') {
      return;
    }

    let parsed: ParsedEnvelope;
    try {
      parsed = parseInboundEnvelope(data);
    } catch (error) {
      this.fault(
        error instanceof RemoteProtocolError
          ? error
          : new RemoteProtocolError(`Realtime frame could not be decoded: ${describeError(error)}`, 'malformed_frame')
      );
      return;
    }

    if (parsed.kind === 'ignored') {
      this.logger?.debug('Ignored realtime event', { type: parsed.type });
      return;
    }

    this.deliver({ kind: 'event', event: this.tagWithTurn(parsed.event) });
  }

  /**
   * Fills in `turnId` from the remote response id when the service does not
   * echo it. Responses are created in the order their requests were sent.
   */
  private tagWithTurn(event: InboundEvent): InboundEvent {
    switch (event.type) {
      case 'response_created': {
        const turnId = event.turnId ?? this.awaitingResponseTurns.shift();
        if (event.turnId !== undefined) {
          const index = this.awaitingResponseTurns.indexOf(event.turnId);
          if (index >= 0) {
            this.awaitingResponseTurns.splice(index, 1);
          }
        }

        if (turnId !== undefined && event.responseId) {
          this.responseTurns.set(event.responseId, turnId);
        }

        return { ...event, turnId };
      }
      case 'audio_delta':
      case 'text_delta':
        return event.turnId === undefined && event.responseId
          ? { ...event, turnId: this.responseTurns.get(event.responseId) }
          : event;
      case 'response_done': {
        if (!event.responseId) {
          return event;
        }

        const turnId = event.turnId ?? this.responseTurns.get(event.responseId);
        this.responseTurns.delete(event.responseId);
        return { ...event, turnId };
      }
      default:
        return event;
    }
  }

  private handleClose(code: number, reason: string): void {
    const previous = this.state;
    this.state = 'closed';
    this.socket = undefined;
    this.audioBuffer.discard();
    this.releaseCloseWaiters();

    if (this.rejectConnect) {
      this.failConnect(new ConnectionError(`Realtime handshake closed (code=${code}${reason ? `, ${reason}` : ''})`));
      return;
    }

    if (previous === 'open') {
      this.fault(
        new RemoteProtocolError(
          `Realtime connection lost (code=${code}${reason ? `, ${reason}` : ''})`,
          'connection_lost'
        )
      );
      return;
    }

    this.logger?.info('Realtime transport closed', { code });
  }

  private failConnect(error: ConnectionError): void {
    const reject = this.rejectConnect;
    this.rejectConnect = undefined;
    this.state = 'closed';
    reject?.(error);
  }

  private fault(error: RemoteProtocolError): void {
    if (this.faulted) {
      return;
    }

    this.faulted = true;
    this.logger?.error('Realtime transport fault', { detail: error.message, remoteCode: error.remoteCode });
    this.deliver({ kind: 'fault', error });
  }

  private deliver(signal: TransportSignal): void {
    this.listener?.(signal);
  }

  private releaseCloseWaiters(): void {
    for (const waiter of this.closeWaiters.splice(0)) {
      waiter();
    }
  }
}
