export { resolveConfig, validateConfig, parseSessionConfig, toSessionConfig } from './config';
export type { SessionConfigInput } from './config';
export * from './errors';
export { VoiceSessionController } from './core/VoiceSessionController';
export type {
  AssistantReply,
  BargeInNotice,
  SessionEndNotice,
  VoiceSessionDependencies,
  VoiceSessionOptions,
  VoiceSessionStatus
} from './core/VoiceSessionController';
export { EnergyVad } from './services/vad/EnergyVad';
export { FfmpegRecorder } from './services/capture/FfmpegRecorder';
export type { AudioRecorder, RealtimeStreamOptions } from './services/capture/AudioRecorder';
export { ProcessAudioPlayer } from './services/playback/ProcessAudioPlayer';
export type { AudioPlayer, PlaybackOptions } from './services/playback/AudioPlayer';
export { WebSocketTransport } from './services/realtime/WebSocketTransport';
export type { RealtimeTransport, TransportSignal } from './services/realtime/RealtimeTransport';
export type { InboundEvent, OutboundEnvelope, RealtimeToolDefinition } from './services/realtime/protocol';
export { StructuredLogger } from './logging/StructuredLogger';
export type * from './types';
