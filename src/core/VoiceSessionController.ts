import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import { parseSessionConfig, type SessionConfigInput } from '../config';
import {
  ConfigurationError,
  ConnectionError,
  DeviceError,
  RemoteProtocolError,
  TurnCancelledError,
  TurnTimeoutError,
  VoxshellError,
  describeError
} from '../errors';
import type { StructuredLogger } from '../logging/StructuredLogger';
import { TurnLatencyTracker, type TurnLatencySummary, type TurnOutcome } from '../perf/TurnLatencyTracker';
import type { AudioRecorder } from '../services/capture/AudioRecorder';
import type { AudioPlayer } from '../services/playback/AudioPlayer';
import { buildSessionInstructions, stampMessage } from '../services/realtime/prompt';
import {
  buildSessionUpdate,
  buildTextItem,
  type InboundEvent,
  type RealtimeToolDefinition,
  type ResponseModality,
  type ResponseStatus
} from '../services/realtime/protocol';
import type { RealtimeTransport, TransportSignal } from '../services/realtime/RealtimeTransport';
import { EnergyVad } from '../services/vad/EnergyVad';
import type { SessionConfig, SessionPhase, SpeechSignalSource, Turn, TurnPhase, TurnSource } from '../types';
import { settleWithin, withTimeout } from './deadline';
import { EventInbox } from './EventInbox';

export interface VoiceSessionDependencies {
  recorder: AudioRecorder;
  player: AudioPlayer;
  createTransport: (config: SessionConfig) => RealtimeTransport;
  /** Declared in `session.update` only when the session config enables function calling. */
  tools?: RealtimeToolDefinition[];
}

export interface VoiceSessionOptions {
  device: string;
  sampleRate: number;
  captureChunkMs: number;
  handshakeTimeoutMs: number;
  turnTimeoutMs: number;
  cancelAckTimeoutMs: number;
  shutdownGraceMs: number;
  vadWindowFrames?: number;
  now?: () => number;
}

export interface AssistantReply {
  turnId: number;
  source: TurnSource;
  text: string;
}

export interface BargeInNotice {
  cancelledTurnId: number;
  userTurnId: number;
  source: SpeechSignalSource;
}

export interface SessionEndNotice {
  sessionId: string;
  reason: 'stopped' | VoxshellError['code'];
}

export interface VoiceSessionStatus {
  sessionId?: string;
  phase: SessionPhase;
  turnPhase?: TurnPhase;
  turnsOpened: number;
  droppedDeltas: number;
  queuedTextTurns: number;
  latency: TurnLatencySummary;
}

interface TextRequest {
  readonly text: string;
  readonly submittedAtMs: number;
  readonly resolve: (reply: string) => void;
  readonly reject: (error: Error) => void;
  timer?: NodeJS.Timeout;
  turnId?: number;
  settled: boolean;
}

type InboxEvent =
  | { kind: 'mic_frame'; frame: Buffer }
  | { kind: 'transport'; signal: TransportSignal }
  | { kind: 'device_fault'; error: DeviceError }
  | { kind: 'operator'; action: 'begin' | 'end' }
  | { kind: 'text_submitted'; request: TextRequest }
  | { kind: 'text_timeout'; request: TextRequest }
  | { kind: 'turn_timeout'; turnId: number }
  | { kind: 'cancel_ack_timeout'; turnId: number };

interface ActiveSession {
  readonly id: string;
  readonly config: SessionConfig;
  readonly transport: RealtimeTransport;
  readonly inbox: EventInbox<InboxEvent>;
  readonly vad: EnergyVad | undefined;
  loop?: Promise<void>;
  shutdown?: Promise<void>;
}

const VOICE_MODALITIES: ResponseModality[] = ['text', 'audio'];
const TEXT_MODALITIES: ResponseModality[] = ['text'];

export declare interface VoiceSessionController {
  on(event: 'phaseChanged', listener: (phase: SessionPhase) => void): this;
  on(event: 'turnPhaseChanged', listener: (phase: TurnPhase) => void): this;
  on(event: 'assistantText', listener: (reply: AssistantReply) => void): this;
  on(event: 'bargeIn', listener: (notice: BargeInNotice) => void): this;
  on(event: 'turnTimeout', listener: (error: TurnTimeoutError) => void): this;
  on(event: 'sessionError', listener: (error: VoxshellError) => void): this;
  on(event: 'sessionEnded', listener: (notice: SessionEndNotice) => void): this;
}

/**
 * Owns one realtime voice session at a time. Microphone frames, transport
 * events, device faults, operator actions and timers all land in a single
 * inbox; one dispatch loop applies them to the turn state machine, so no two
 * transitions ever interleave.
 */
export class VoiceSessionController extends EventEmitter {
  private phase: SessionPhase = 'idle';
  private turnPhase: TurnPhase | undefined;
  private session: ActiveSession | undefined;
  private startPromise: Promise<void> | undefined;
  private everStarted = false;

  private turnSeq = 0;
  private userTurn: Turn | undefined;
  private assistantTurn: Turn | undefined;
  private cancellingTurn: Turn | undefined;
  private pendingCommit = false;
  // Cancelled responses whose acknowledgement timed out; their late untagged events are discarded.
  private unacknowledgedCancels = 0;
  private assistantTextParts: string[] = [];
  private firstAudioAtMs: number | undefined;
  private activeText: TextRequest | undefined;
  private readonly textQueue: TextRequest[] = [];
  private readonly textRequests = new Set<TextRequest>();
  private turnTimer: NodeJS.Timeout | undefined;
  private cancelTimer: NodeJS.Timeout | undefined;
  private droppedDeltas = 0;
  private readonly latencyTracker = new TurnLatencyTracker();
  private readonly now: () => number;

  public constructor(
    private readonly deps: VoiceSessionDependencies,
    private readonly options: VoiceSessionOptions,
    private readonly logger?: StructuredLogger
  ) {
    super();
    this.now = options.now ?? Date.now;
  }

  public getPhase(): SessionPhase {
    return this.phase;
  }

  public getTurnPhase(): TurnPhase | undefined {
    return this.turnPhase;
  }

  public getStatus(): VoiceSessionStatus {
    return {
      sessionId: this.session?.id,
      phase: this.phase,
      turnPhase: this.turnPhase,
      turnsOpened: this.turnSeq,
      droppedDeltas: this.droppedDeltas,
      queuedTextTurns: this.textQueue.length,
      latency: this.latencyTracker.summarize()
    };
  }

  public start(input: SessionConfigInput): Promise<void> {
    this.everStarted = true;

    if (this.phase === 'active') {
      return Promise.resolve();
    }

    if (this.startPromise) {
      return this.startPromise;
    }

    let config: SessionConfig;
    try {
      config = parseSessionConfig(input);
    } catch (error) {
      return Promise.reject(error);
    }

    this.startPromise = this.openSession(config).finally(() => {
      this.startPromise = undefined;
    });

    return this.startPromise;
  }

  public async stop(): Promise<void> {
    if (this.startPromise) {
      try {
        await this.startPromise;
      } catch (error) {
        this.logger?.debug('Stop requested after a failed start', { detail: describeError(error) });
      }
    }

    const session = this.session;
    if (!session) {
      return;
    }

    await this.shutdown(session);
    await session.loop;
  }

  public sendText(text: string): Promise<string> {
    const session = this.session;
    if (!session || this.phase !== 'active') {
      return Promise.reject(
        this.everStarted
          ? new ConnectionError('No active voice session; the session has ended.')
          : new ConfigurationError('No voice session has been started.')
      );
    }

    if (!text.trim()) {
      return Promise.reject(new ConfigurationError('Text message must not be empty.'));
    }

    return new Promise<string>((resolve, reject) => {
      const request: TextRequest = {
        text,
        submittedAtMs: this.now(),
        resolve,
        reject,
        settled: false
      };

      request.timer = setTimeout(() => {
        session.inbox.push({ kind: 'text_timeout', request });
      }, this.options.turnTimeoutMs);

      this.textRequests.add(request);
      session.inbox.push({ kind: 'text_submitted', request });
    });
  }

  /** Operator speech-start, e.g. push-to-talk pressed. */
  public beginTurn(): boolean {
    return this.pushOperator('begin');
  }

  /** Operator speech-stop; with the VAD disabled this also opens a turn from `listening`. */
  public endTurn(): boolean {
    return this.pushOperator('end');
  }

  private pushOperator(action: 'begin' | 'end'): boolean {
    const session = this.session;
    if (!session || this.phase !== 'active') {
      return false;
    }

    return session.inbox.push({ kind: 'operator', action });
  }

  private async openSession(config: SessionConfig): Promise<void> {
    const previous = this.session;
    if (previous?.shutdown) {
      await previous.shutdown;
    }

    this.resetTurnState();
    this.latencyTracker.reset();
    this.setPhase('connecting');

    const transport = this.deps.createTransport(config);
    const inbox = new EventInbox<InboxEvent>();
    transport.subscribe((signal) => {
      inbox.push({ kind: 'transport', signal });
    });

    try {
      await withTimeout(
        transport.connect(),
        this.options.handshakeTimeoutMs,
        () => new ConnectionError(`Realtime handshake did not complete within ${this.options.handshakeTimeoutMs}ms`)
      );
    } catch (error) {
      transport.terminate();
      inbox.close();
      this.setPhase('idle');
      this.logger?.error('Realtime session failed to open', { detail: describeError(error) });
      throw error instanceof VoxshellError
        ? error
        : new ConnectionError(`Realtime connection failed: ${describeError(error)}`, { cause: error });
    }

    const session: ActiveSession = {
      id: randomUUID(),
      config,
      transport,
      inbox,
      vad: config.vadEnabled
        ? new EnergyVad({
            ...config.vadSensitivity,
            sampleRate: this.options.sampleRate,
            windowFrames: this.options.vadWindowFrames
          })
        : undefined
    };

    transport.send(
      buildSessionUpdate(
        config,
        buildSessionInstructions(config.systemPrompt, {
          device: this.options.device,
          now: new Date(this.now())
        }),
        this.deps.tools
      )
    );

    this.deps.player.open({
      onError: (error) => {
        inbox.push({ kind: 'device_fault', error });
      }
    });

    try {
      await this.deps.recorder.startStreaming({
        chunkDurationMs: this.options.captureChunkMs,
        onChunk: (frame) => {
          inbox.push({ kind: 'mic_frame', frame });
        },
        onError: (error) => {
          inbox.push({ kind: 'device_fault', error });
        }
      });
    } catch (error) {
      inbox.close();
      this.deps.recorder.terminate();
      this.deps.player.terminate();
      await this.closeTransport(transport);
      this.setPhase('idle');
      this.logger?.error('Audio capture failed to start', { detail: describeError(error) });
      throw error instanceof DeviceError
        ? error
        : new DeviceError('capture', `Audio capture failed to start: ${describeError(error)}`, { cause: error });
    }

    this.session = session;
    this.logger?.info('Voice session active', {
      sessionId: session.id,
      model: config.model,
      voice: config.voice,
      vadEnabled: config.vadEnabled
    });
    this.setPhase('active');
    this.setTurnPhase('listening');
    session.loop = this.runLoop(session);
  }

  private async runLoop(session: ActiveSession): Promise<void> {
    for (;;) {
      const event = await session.inbox.next();
      if (!event) {
        return;
      }

      let fatal: VoxshellError | undefined;
      try {
        fatal = this.dispatch(session, event);
      } catch (error) {
        this.logger?.error('Session dispatch failed', { kind: event.kind, detail: describeError(error) });
        fatal = new VoxshellError('internal', `Session dispatch failed: ${describeError(error)}`, { cause: error });
      }

      if (fatal) {
        await this.shutdown(session, fatal);
        return;
      }
    }
  }

  private dispatch(session: ActiveSession, event: InboxEvent): VoxshellError | undefined {
    switch (event.kind) {
      case 'mic_frame':
        this.handleMicFrame(session, event.frame);
        return undefined;
      case 'transport':
        if (event.signal.kind === 'fault') {
          return event.signal.error;
        }

        return this.handleInbound(session, event.signal.event);
      case 'device_fault':
        this.logger?.error('Audio device failed; stopping session', {
          device: event.error.device,
          detail: event.error.message
        });
        return event.error;
      case 'operator':
        if (event.action === 'begin') {
          this.handleSpeechStart(session, 'operator');
        } else if (this.turnPhase === 'listening' && !session.config.vadEnabled) {
          this.openUserTurn('voice');
          this.setTurnPhase('user_speaking');
          this.commitUserTurn(session);
        } else {
          this.handleSpeechStop(session, 'operator');
        }
        return undefined;
      case 'text_submitted':
        this.textQueue.push(event.request);
        this.pumpTextQueue(session);
        return undefined;
      case 'text_timeout':
        this.handleTextTimeout(session, event.request);
        return undefined;
      case 'turn_timeout':
        this.handleTurnTimeout(session, event.turnId);
        return undefined;
      case 'cancel_ack_timeout':
        if (this.cancellingTurn?.id === event.turnId) {
          this.logger?.warn('Cancellation was not acknowledged in time', { turnId: event.turnId });
          this.unacknowledgedCancels += 1;
          this.resolveCancellation(session);
        }
        return undefined;
    }
  }

  private handleMicFrame(session: ActiveSession, frame: Buffer): void {
    session.transport.appendAudio(frame);

    const transition = session.vad?.push(frame);
    if (transition === 'speech_started') {
      this.handleSpeechStart(session, 'vad');
    } else if (transition === 'speech_stopped') {
      this.handleSpeechStop(session, 'vad');
    }
  }

  private handleInbound(session: ActiveSession, event: InboundEvent): VoxshellError | undefined {
    switch (event.type) {
      case 'speech_started':
        this.handleSpeechStart(session, 'remote');
        return undefined;
      case 'speech_stopped':
        this.handleSpeechStop(session, 'remote');
        return undefined;
      case 'response_created':
        this.logger?.debug('Response created', { turnId: event.turnId, responseId: event.responseId });
        return undefined;
      case 'audio_delta':
        this.handleAudioDelta(event.turnId, event.audio);
        return undefined;
      case 'text_delta':
        if (this.isRespondingTurn(event.turnId)) {
          this.assistantTextParts.push(event.text);
        }
        return undefined;
      case 'response_done':
        this.handleResponseDone(session, event.turnId, event.status, event.text);
        return undefined;
      case 'error':
        return new RemoteProtocolError(`Realtime service error: ${event.message}`, event.code);
    }
  }

  private handleSpeechStart(session: ActiveSession, source: SpeechSignalSource): void {
    switch (this.turnPhase) {
      case 'listening':
        this.openUserTurn('voice');
        this.setTurnPhase('user_speaking');
        return;
      case 'assistant_responding': {
        const cancelled = this.cancelResponse(session, 'cancelled');
        const userTurn = this.openUserTurn('voice');
        if (cancelled) {
          this.logger?.info('Barge-in', { cancelledTurnId: cancelled.id, userTurnId: userTurn.id, source });
          this.emit('bargeIn', { cancelledTurnId: cancelled.id, userTurnId: userTurn.id, source });
        }
        return;
      }
      case 'cancelling':
        if (!this.userTurn) {
          this.openUserTurn('voice');
        }
        this.pendingCommit = false;
        return;
      default:
        return;
    }
  }

  private handleSpeechStop(session: ActiveSession, source: SpeechSignalSource): void {
    if (this.turnPhase === 'user_speaking') {
      this.commitUserTurn(session);
      return;
    }

    if (this.turnPhase === 'cancelling' && this.userTurn) {
      this.logger?.debug('Deferring commit until cancellation resolves', { source });
      this.pendingCommit = true;
    }
  }

  private openUserTurn(source: TurnSource): Turn {
    const turn: Turn = {
      id: this.nextTurnId(),
      role: 'user',
      source,
      status: 'open',
      openedAtMs: this.now()
    };
    this.userTurn = turn;
    return turn;
  }

  private commitUserTurn(session: ActiveSession): void {
    const turn = this.userTurn;
    if (!turn) {
      return;
    }

    turn.status = 'committed';
    this.userTurn = undefined;
    session.transport.send({ type: 'input_audio_buffer.commit', turn_id: turn.id });
    this.setTurnPhase('user_turn_committed');
    this.requestResponse(session, 'voice');
  }

  private requestResponse(session: ActiveSession, source: TurnSource, textRequest?: TextRequest): void {
    const turn: Turn = {
      id: this.nextTurnId(),
      role: 'assistant',
      source,
      status: 'responding',
      openedAtMs: this.now()
    };

    this.assistantTurn = turn;
    this.assistantTextParts = [];
    this.firstAudioAtMs = undefined;
    this.activeText = textRequest;
    if (textRequest) {
      textRequest.turnId = turn.id;
    }

    session.transport.send({
      type: 'response.create',
      turn_id: turn.id,
      response: { modalities: textRequest ? TEXT_MODALITIES : VOICE_MODALITIES }
    });

    if (!textRequest) {
      this.turnTimer = setTimeout(() => {
        session.inbox.push({ kind: 'turn_timeout', turnId: turn.id });
      }, this.options.turnTimeoutMs);
    }

    this.setTurnPhase('assistant_responding');
  }

  /**
   * Silences playback before telling the remote side, so no buffered audio of
   * the cancelled turn is heard after this returns.
   */
  private cancelResponse(session: ActiveSession, outcome: Exclude<TurnOutcome, 'completed'>): Turn | undefined {
    const turn = this.assistantTurn;
    if (!turn) {
      return undefined;
    }

    this.deps.player.flush();
    turn.status = 'cancelled';
    this.assistantTurn = undefined;
    this.cancellingTurn = turn;
    this.clearTurnTimer();
    this.recordTurn(turn, outcome);

    session.transport.send({ type: 'response.cancel', turn_id: turn.id });

    const textRequest = this.activeText;
    this.activeText = undefined;
    if (textRequest) {
      this.settleText(
        textRequest,
        outcome === 'timed_out'
          ? new TurnTimeoutError(turn.id, this.options.turnTimeoutMs)
          : new TurnCancelledError(turn.id)
      );
    }

    this.setTurnPhase('cancelling');
    this.cancelTimer = setTimeout(() => {
      session.inbox.push({ kind: 'cancel_ack_timeout', turnId: turn.id });
    }, this.options.cancelAckTimeoutMs);

    return turn;
  }

  private resolveCancellation(session: ActiveSession): void {
    this.cancellingTurn = undefined;
    if (this.cancelTimer) {
      clearTimeout(this.cancelTimer);
      this.cancelTimer = undefined;
    }

    if (!this.userTurn) {
      this.setTurnPhase('listening');
      this.pumpTextQueue(session);
      return;
    }

    this.setTurnPhase('user_speaking');
    if (this.pendingCommit) {
      this.pendingCommit = false;
      this.commitUserTurn(session);
    }
  }

  private handleAudioDelta(turnId: number | undefined, audio: Buffer): void {
    const turn = this.assistantTurn;
    if (!turn || !this.isRespondingTurn(turnId)) {
      this.droppedDeltas += 1;
      this.logger?.debug('Dropped stale audio delta', { turnId, respondingTurnId: turn?.id });
      return;
    }

    const nowMs = this.now();
    this.firstAudioAtMs = this.firstAudioAtMs ?? nowMs;
    this.deps.player.write({ data: audio, source: 'remote', capturedAtMs: nowMs, turnId: turn.id });
  }

  private handleResponseDone(
    session: ActiveSession,
    turnId: number | undefined,
    status: ResponseStatus,
    text: string | undefined
  ): void {
    if (this.cancellingTurn && (turnId === undefined || turnId === this.cancellingTurn.id)) {
      this.logger?.debug('Cancellation acknowledged', { turnId: this.cancellingTurn.id, status });
      this.resolveCancellation(session);
      return;
    }

    if (this.unacknowledgedCancels > 0 && turnId !== this.assistantTurn?.id) {
      this.unacknowledgedCancels -= 1;
      this.logger?.debug('Late acknowledgement of a cancelled response', { turnId, status });
      return;
    }

    const turn = this.assistantTurn;
    if (!turn || !this.isRespondingTurn(turnId)) {
      this.logger?.debug('Ignored response.done for a turn that is not responding', { turnId });
      return;
    }

    turn.status = 'complete';
    this.assistantTurn = undefined;
    this.clearTurnTimer();
    this.recordTurn(turn, 'completed');

    const reply = text ?? this.assistantTextParts.join('');
    this.assistantTextParts = [];
    const textRequest = this.activeText;
    this.activeText = undefined;

    if (status === 'failed') {
      this.logger?.warn('Assistant response failed', { turnId: turn.id });
      if (textRequest) {
        this.settleText(textRequest, new RemoteProtocolError(`Response for turn ${turn.id} failed`, 'response_failed'));
      }
    } else {
      this.emit('assistantText', { turnId: turn.id, source: turn.source, text: reply });
      if (textRequest) {
        this.settleText(textRequest, reply);
      }
    }

    this.setTurnPhase('listening');
    this.pumpTextQueue(session);
  }

  private handleTurnTimeout(session: ActiveSession, turnId: number): void {
    if (this.assistantTurn?.id !== turnId) {
      return;
    }

    const error = new TurnTimeoutError(turnId, this.options.turnTimeoutMs);
    this.logger?.warn('Assistant turn timed out', { turnId });
    this.cancelResponse(session, 'timed_out');
    this.emit('turnTimeout', error);
  }

  private handleTextTimeout(session: ActiveSession, request: TextRequest): void {
    if (request.settled) {
      return;
    }

    if (this.activeText === request) {
      this.logger?.warn('Text turn timed out', { turnId: request.turnId });
      this.cancelResponse(session, 'timed_out');
      return;
    }

    const index = this.textQueue.indexOf(request);
    if (index >= 0) {
      this.textQueue.splice(index, 1);
    }

    this.settleText(request, new TurnTimeoutError(request.turnId, this.options.turnTimeoutMs));
  }

  private pumpTextQueue(session: ActiveSession): void {
    if (this.turnPhase !== 'listening' || this.assistantTurn) {
      return;
    }

    const request = this.textQueue.shift();
    if (!request) {
      return;
    }

    const userTurn: Turn = {
      id: this.nextTurnId(),
      role: 'user',
      source: 'text',
      status: 'committed',
      openedAtMs: this.now()
    };

    const stamped = stampMessage(request.text, session.config.localeFlags, new Date(this.now()));
    session.transport.send(buildTextItem(userTurn.id, stamped));
    this.setTurnPhase('user_turn_committed');
    this.requestResponse(session, 'text', request);
  }

  private settleText(request: TextRequest, outcome: string | Error): void {
    if (request.settled) {
      return;
    }

    request.settled = true;
    if (request.timer) {
      clearTimeout(request.timer);
      request.timer = undefined;
    }
    this.textRequests.delete(request);

    if (outcome instanceof Error) {
      request.reject(outcome);
    } else {
      request.resolve(outcome);
    }
  }

  // Untagged events belong to the responding turn only while no cancelled response can still be streaming.
  private isRespondingTurn(turnId: number | undefined): boolean {
    const turn = this.assistantTurn;
    if (!turn) {
      return false;
    }

    if (turnId === undefined) {
      return !this.cancellingTurn && this.unacknowledgedCancels === 0;
    }

    return turnId === turn.id;
  }

  private recordTurn(turn: Turn, outcome: TurnOutcome): void {
    const nowMs = this.now();
    this.latencyTracker.push({
      outcome,
      firstAudioMs: this.firstAudioAtMs === undefined ? undefined : this.firstAudioAtMs - turn.openedAtMs,
      durationMs: nowMs - turn.openedAtMs
    });
  }

  private nextTurnId(): number {
    this.turnSeq += 1;
    return this.turnSeq;
  }

  private clearTurnTimer(): void {
    if (this.turnTimer) {
      clearTimeout(this.turnTimer);
      this.turnTimer = undefined;
    }
  }

  private shutdown(session: ActiveSession, fatal?: VoxshellError): Promise<void> {
    if (!session.shutdown) {
      session.shutdown = this.runShutdown(session, fatal);
    }

    return session.shutdown;
  }

  private async runShutdown(session: ActiveSession, fatal?: VoxshellError): Promise<void> {
    this.logger?.info('Closing voice session', { sessionId: session.id, reason: fatal?.code ?? 'stopped' });
    this.setPhase('closing');
    session.inbox.close();
    this.clearTurnTimer();
    if (this.cancelTimer) {
      clearTimeout(this.cancelTimer);
      this.cancelTimer = undefined;
    }

    this.deps.player.flush();
    await Promise.all([
      this.releaseDevice('capture', this.deps.recorder.stop(), () => {
        this.deps.recorder.terminate();
      }),
      this.releaseDevice('playback', this.deps.player.stop(), () => {
        this.deps.player.terminate();
      })
    ]);
    await this.closeTransport(session.transport);

    for (const request of [...this.textRequests]) {
      this.settleText(request, new ConnectionError('Voice session ended before the reply arrived.'));
    }

    this.logger?.info('Voice session latency', { sessionId: session.id, ...this.latencyTracker.summarize() });

    this.session = undefined;
    this.resetTurnState();
    if (fatal && !(fatal instanceof DeviceError)) {
      this.emit('sessionError', fatal);
    }

    this.setPhase('idle');
    this.emit('sessionEnded', { sessionId: session.id, reason: fatal?.code ?? 'stopped' });
  }

  private async releaseDevice(label: string, stopping: Promise<void>, terminate: () => void): Promise<void> {
    const outcome = await settleWithin(stopping, this.options.shutdownGraceMs);
    if (outcome.kind === 'resolved') {
      return;
    }

    this.logger?.warn(`Forcing ${label} release`, {
      outcome: outcome.kind,
      detail: outcome.kind === 'rejected' ? describeError(outcome.error) : undefined
    });
    terminate();
  }

  private async closeTransport(transport: RealtimeTransport): Promise<void> {
    const outcome = await settleWithin(transport.close(), this.options.shutdownGraceMs);
    if (outcome.kind === 'resolved') {
      return;
    }

    this.logger?.warn('Forcing realtime transport close', {
      outcome: outcome.kind,
      detail: outcome.kind === 'rejected' ? describeError(outcome.error) : undefined
    });
    transport.terminate();
  }

  private resetTurnState(): void {
    this.turnPhase = undefined;
    this.userTurn = undefined;
    this.assistantTurn = undefined;
    this.cancellingTurn = undefined;
    this.pendingCommit = false;
    this.unacknowledgedCancels = 0;
    this.assistantTextParts = [];
    this.firstAudioAtMs = undefined;
    this.activeText = undefined;
    this.textQueue.length = 0;
  }

  private setPhase(phase: SessionPhase): void {
    if (this.phase === phase) {
      return;
    }

    this.phase = phase;
    this.logger?.debug('Session phase changed', { phase });
    this.emit('phaseChanged', phase);
  }

  private setTurnPhase(phase: TurnPhase): void {
    if (this.turnPhase === phase) {
      return;
    }

    this.turnPhase = phase;
    this.logger?.debug('Turn phase changed', { phase });
    this.emit('turnPhaseChanged', phase);
  }
}
