export type SessionPhase = 'idle' | 'connecting' | 'active' | 'closing';

export type TurnPhase =
  | 'listening'
  | 'user_speaking'
  | 'user_turn_committed'
  | 'assistant_responding'
  | 'cancelling';

export type TurnRole = 'user' | 'assistant';
export type TurnStatus = 'open' | 'committed' | 'responding' | 'cancelled' | 'complete';
export type TurnSource = 'voice' | 'text';

export interface Turn {
  readonly id: number;
  readonly role: TurnRole;
  readonly source: TurnSource;
  status: TurnStatus;
  readonly openedAtMs: number;
}

export type AudioSource = 'mic' | 'remote';

export interface AudioChunk {
  readonly data: Buffer;
  readonly source: AudioSource;
  readonly capturedAtMs: number;
  readonly turnId?: number;
}

export interface LocaleFlags {
  includeTime: boolean;
  includeDate: boolean;
}

export interface VadSensitivity {
  enterDbfs: number;
  exitDbfs: number;
  hangoverMs: number;
}

export interface SessionConfig {
  model: string;
  voice: string;
  vadEnabled: boolean;
  functionCallingEnabled: boolean;
  systemPrompt: string;
  localeFlags: LocaleFlags;
  vadSensitivity: VadSensitivity;
}

export type SpeechSignalSource = 'vad' | 'remote' | 'operator';

export type PlaybackBackend = 'auto' | 'ffplay' | 'play' | 'sox';

export interface AppConfig {
  apiKey: string;
  realtimeUrl: string;
  model: string;
  voice: string;
  vadEnabled: boolean;
  systemPrompt: string;
  includeDate: boolean;
  includeTime: boolean;
  device: string;
  vadEnterDbfs: number;
  vadExitDbfs: number;
  vadHangoverMs: number;
  ffmpegInputFormat: string;
  ffmpegInputDevice: string;
  playbackBackend: PlaybackBackend;
  sampleRate: number;
  captureChunkMs: number;
  outboundFlushIntervalMs: number;
  outboundFlushChunkCount: number;
  handshakeTimeoutMs: number;
  turnTimeoutMs: number;
  cancelAckTimeoutMs: number;
  shutdownGraceMs: number;
  logDir: string;
  consoleLogLevel: 'debug' | 'info' | 'warn' | 'error';
}
