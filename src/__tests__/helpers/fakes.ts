import type { DeviceError, RemoteProtocolError } from '../../errors';
import type { AudioRecorder, RealtimeStreamOptions } from '../../services/capture/AudioRecorder';
import type { AudioPlayer, PlaybackOptions } from '../../services/playback/AudioPlayer';
import type { InboundEvent, OutboundEnvelope } from '../../services/realtime/protocol';
import type { RealtimeTransport, TransportListener } from '../../services/realtime/RealtimeTransport';
import type { AudioChunk } from '../../types';

/** PCM16 mono frame holding a constant sample value. */
export const tone = (amplitude: number, durationMs: number, sampleRate = 24000): Buffer => {
  const samples = Math.round((sampleRate * durationMs) / 1000);
  const frame = Buffer.alloc(samples * 2);
  for (let index = 0; index < samples; index += 1) {
    frame.writeInt16LE(amplitude, index * 2);
  }

  return frame;
};

export type ConnectBehavior = 'open' | 'hang' | Error;

export class FakeTransport implements RealtimeTransport {
  public readonly sent: OutboundEnvelope[] = [];
  public readonly appended: Buffer[] = [];
  public connectCalls = 0;
  public closed = false;
  public terminated = false;
  private listener: TransportListener | undefined;
  private open = false;

  public constructor(private readonly behavior: ConnectBehavior = 'open') {}

  public subscribe(listener: TransportListener): void {
    this.listener = listener;
  }

  public connect(): Promise<void> {
    this.connectCalls += 1;
    if (this.behavior === 'hang') {
      return new Promise<void>(() => undefined);
    }

    if (this.behavior instanceof Error) {
      return Promise.reject(this.behavior);
    }

    this.open = true;
    return Promise.resolve();
  }

  public send(envelope: OutboundEnvelope): void {
    this.sent.push(envelope);
  }

  public appendAudio(frame: Buffer): void {
    this.appended.push(frame);
  }

  public isOpen(): boolean {
    return this.open;
  }

  public close(): Promise<void> {
    this.open = false;
    this.closed = true;
    return Promise.resolve();
  }

  public terminate(): void {
    this.open = false;
    this.terminated = true;
  }

  public emit(event: InboundEvent): void {
    this.listener?.({ kind: 'event', event });
  }

  public fault(error: RemoteProtocolError): void {
    this.listener?.({ kind: 'fault', error });
  }

  public types(): string[] {
    return this.sent.map((envelope) => envelope.type);
  }

  public sentOfType<T extends OutboundEnvelope['type']>(type: T): Array<Extract<OutboundEnvelope, { type: T }>> {
    return this.sent.filter((envelope): envelope is Extract<OutboundEnvelope, { type: T }> => envelope.type === type);
  }
}

export class FakeRecorder implements AudioRecorder {
  public hangOnStop = false;
  public startError: DeviceError | undefined;
  public startCalls = 0;
  public stopCalls = 0;
  public terminated = false;
  private options: RealtimeStreamOptions | undefined;

  public startStreaming(options: RealtimeStreamOptions): Promise<void> {
    this.startCalls += 1;
    if (this.startError) {
      return Promise.reject(this.startError);
    }

    this.options = options;
    return Promise.resolve();
  }

  public stop(): Promise<void> {
    this.stopCalls += 1;
    if (this.hangOnStop) {
      return new Promise<void>(() => undefined);
    }

    this.options = undefined;
    return Promise.resolve();
  }

  public terminate(): void {
    this.terminated = true;
    this.options = undefined;
  }

  public feed(frame: Buffer): void {
    this.options?.onChunk(frame);
  }

  public fail(error: DeviceError): void {
    this.options?.onError?.(error);
  }
}

export class FakePlayer implements AudioPlayer {
  public readonly log: string[] = [];
  public readonly chunks: AudioChunk[] = [];
  public stopped = false;
  public terminated = false;
  private options: PlaybackOptions | undefined;

  public open(options: PlaybackOptions): void {
    this.options = options;
  }

  public write(chunk: AudioChunk): void {
    this.chunks.push(chunk);
    this.log.push(`write:${chunk.turnId ?? '?'}`);
  }

  public flush(): void {
    this.log.push('flush');
  }

  public stop(): Promise<void> {
    this.stopped = true;
    return Promise.resolve();
  }

  public terminate(): void {
    this.terminated = true;
    this.options = undefined;
  }

  public fail(error: DeviceError): void {
    this.options?.onError?.(error);
  }
}
