import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { AppConfig, PlaybackBackend, SessionConfig, VadSensitivity } from './types';

export const DEFAULT_REALTIME_URL = 'wss://api.openai.com/v1/realtime';
export const DEFAULT_MODEL = 'gpt-4o-mini-realtime-preview-2024-12-17';
export const DEFAULT_VOICE = 'echo';
export const SUPPORTED_VOICES = ['alloy', 'ash', 'ballad', 'coral', 'echo', 'sage', 'shimmer', 'verse'];

export const DEFAULT_VAD_SENSITIVITY: VadSensitivity = {
  enterDbfs: -38,
  exitDbfs: -46,
  hangoverMs: 600
};

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseFloatOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseBoolOrDefault = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }

  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
};

const resolvePlaybackBackend = (value: string | undefined): PlaybackBackend => {
  if (value === 'ffplay' || value === 'play' || value === 'sox' || value === 'auto') {
    return value;
  }

  return 'auto';
};

const resolveLogLevel = (value: string | undefined): AppConfig['consoleLogLevel'] => {
  const match = LOG_LEVELS.find((level) => level === value);
  return match ?? 'info';
};

const defaultCaptureInput = (platform: NodeJS.Platform): { format: string; device: string } => {
  if (platform === 'darwin') {
    return { format: 'avfoundation', device: ':0' };
  }

  if (platform === 'win32') {
    return { format: 'dshow', device: 'audio=Microphone' };
  }

  return { format: 'pulse', device: 'default' };
};

export const resolveConfig = (
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): AppConfig => {
  const captureInput = defaultCaptureInput(platform);

  return {
    apiKey: env.OPENAI_API_KEY ?? '',
    realtimeUrl: env.VOXSHELL_REALTIME_URL ?? DEFAULT_REALTIME_URL,
    model: env.VOXSHELL_MODEL ?? DEFAULT_MODEL,
    voice: env.VOXSHELL_VOICE ?? DEFAULT_VOICE,
    vadEnabled: parseBoolOrDefault(env.VOXSHELL_VAD_ENABLED, true),
    systemPrompt: env.VOXSHELL_SYSTEM_PROMPT ?? '',
    includeDate: parseBoolOrDefault(env.VOXSHELL_INCLUDE_DATE, true),
    includeTime: parseBoolOrDefault(env.VOXSHELL_INCLUDE_TIME, true),
    device: env.VOXSHELL_DEVICE ?? os.hostname(),
    vadEnterDbfs: parseFloatOrDefault(env.VOXSHELL_VAD_ENTER_DBFS, DEFAULT_VAD_SENSITIVITY.enterDbfs),
    vadExitDbfs: parseFloatOrDefault(env.VOXSHELL_VAD_EXIT_DBFS, DEFAULT_VAD_SENSITIVITY.exitDbfs),
    vadHangoverMs: parseIntOrDefault(env.VOXSHELL_VAD_HANGOVER_MS, DEFAULT_VAD_SENSITIVITY.hangoverMs),
    ffmpegInputFormat: env.VOXSHELL_FFMPEG_FORMAT ?? captureInput.format,
    ffmpegInputDevice: env.VOXSHELL_FFMPEG_INPUT ?? captureInput.device,
    playbackBackend: resolvePlaybackBackend(env.VOXSHELL_PLAYBACK),
    sampleRate: parseIntOrDefault(env.VOXSHELL_SAMPLE_RATE, 24000),
    captureChunkMs: parseIntOrDefault(env.VOXSHELL_CAPTURE_CHUNK_MS, 40),
    outboundFlushIntervalMs: parseIntOrDefault(env.VOXSHELL_SEND_FLUSH_MS, 100),
    outboundFlushChunkCount: parseIntOrDefault(env.VOXSHELL_SEND_FLUSH_CHUNKS, 5),
    handshakeTimeoutMs: parseIntOrDefault(env.VOXSHELL_HANDSHAKE_TIMEOUT_MS, 8000),
    turnTimeoutMs: parseIntOrDefault(env.VOXSHELL_TURN_TIMEOUT_MS, 30000),
    cancelAckTimeoutMs: parseIntOrDefault(env.VOXSHELL_CANCEL_ACK_TIMEOUT_MS, 1500),
    shutdownGraceMs: parseIntOrDefault(env.VOXSHELL_SHUTDOWN_GRACE_MS, 1500),
    logDir: env.VOXSHELL_LOG_DIR ?? path.join(os.homedir(), '.voxshell', 'logs'),
    consoleLogLevel: resolveLogLevel(env.VOXSHELL_LOG_LEVEL)
  };
};

export const validateConfig = (config: AppConfig): string[] => {
  const errors: string[] = [];

  if (!config.realtimeUrl.startsWith('wss://') && !config.realtimeUrl.startsWith('ws://')) {
    errors.push('VOXSHELL_REALTIME_URL must be a ws:// or wss:// URL.');
  }

  if (!config.model.trim()) {
    errors.push('VOXSHELL_MODEL must not be empty.');
  }

  if (!SUPPORTED_VOICES.includes(config.voice)) {
    errors.push(`VOXSHELL_VOICE must be one of: ${SUPPORTED_VOICES.join(', ')}.`);
  }

  if (!config.ffmpegInputFormat.trim()) {
    errors.push('VOXSHELL_FFMPEG_FORMAT must not be empty.');
  }

  if (!config.ffmpegInputDevice.trim()) {
    errors.push('VOXSHELL_FFMPEG_INPUT must not be empty.');
  }

  if (![16000, 24000, 48000].includes(config.sampleRate)) {
    errors.push('VOXSHELL_SAMPLE_RATE must be one of: 16000, 24000, 48000.');
  }

  if (config.vadEnterDbfs > 0 || config.vadEnterDbfs < -100) {
    errors.push('VOXSHELL_VAD_ENTER_DBFS must be between -100 and 0.');
  }

  if (config.vadExitDbfs > config.vadEnterDbfs) {
    errors.push('VOXSHELL_VAD_EXIT_DBFS must not exceed VOXSHELL_VAD_ENTER_DBFS.');
  }

  if (config.vadHangoverMs < 0 || config.vadHangoverMs > 5000) {
    errors.push('VOXSHELL_VAD_HANGOVER_MS must be between 0 and 5000 milliseconds.');
  }

  if (config.captureChunkMs < 10 || config.captureChunkMs > 500) {
    errors.push('VOXSHELL_CAPTURE_CHUNK_MS must be between 10 and 500 milliseconds.');
  }

  if (config.outboundFlushIntervalMs < 10 || config.outboundFlushIntervalMs > 1000) {
    errors.push('VOXSHELL_SEND_FLUSH_MS must be between 10 and 1000 milliseconds.');
  }

  if (config.outboundFlushChunkCount < 1 || config.outboundFlushChunkCount > 64) {
    errors.push('VOXSHELL_SEND_FLUSH_CHUNKS must be between 1 and 64.');
  }

  if (config.handshakeTimeoutMs < 500 || config.handshakeTimeoutMs > 60000) {
    errors.push('VOXSHELL_HANDSHAKE_TIMEOUT_MS must be between 500 and 60000 milliseconds.');
  }

  if (config.turnTimeoutMs < 1000 || config.turnTimeoutMs > 300000) {
    errors.push('VOXSHELL_TURN_TIMEOUT_MS must be between 1000 and 300000 milliseconds.');
  }

  if (config.cancelAckTimeoutMs < 50 || config.cancelAckTimeoutMs > 10000) {
    errors.push('VOXSHELL_CANCEL_ACK_TIMEOUT_MS must be between 50 and 10000 milliseconds.');
  }

  if (config.shutdownGraceMs < 50 || config.shutdownGraceMs > 10000) {
    errors.push('VOXSHELL_SHUTDOWN_GRACE_MS must be between 50 and 10000 milliseconds.');
  }

  return errors;
};

const vadSensitivitySchema = z
  .object({
    enterDbfs: z.number().min(-100).max(0),
    exitDbfs: z.number().min(-100).max(0),
    hangoverMs: z.number().int().min(0).max(5000)
  })
  .strict()
  .refine((value) => value.exitDbfs <= value.enterDbfs, {
    message: 'exitDbfs must not exceed enterDbfs',
    path: ['exitDbfs']
  });

const sessionConfigSchema = z
  .object({
    model: z.string().trim().min(1),
    voice: z.string().trim().min(1),
    vadEnabled: z.boolean(),
    functionCallingEnabled: z.boolean(),
    systemPrompt: z.string(),
    localeFlags: z
      .object({
        includeTime: z.boolean(),
        includeDate: z.boolean()
      })
      .strict(),
    vadSensitivity: vadSensitivitySchema.default(DEFAULT_VAD_SENSITIVITY)
  })
  .strict();

export type SessionConfigInput = z.input<typeof sessionConfigSchema>;

const formatIssuePath = (issuePath: (string | number)[]): string =>
  issuePath.length > 0 ? issuePath.join('.') : '(root)';

/**
 * Validates a session configuration and returns a frozen copy. Unrecognized
 * keys are rejected at every level.
 */
export const parseSessionConfig = (input: unknown): SessionConfig => {
  const result = sessionConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${formatIssuePath(issue.path)}: ${issue.message}`
    );
    throw new ConfigurationError(
      `Invalid session configuration:\n- ${issues.join('\n- ')}`,
      issues
    );
  }

  const config = result.data;
  return Object.freeze({
    ...config,
    localeFlags: Object.freeze({ ...config.localeFlags }),
    vadSensitivity: Object.freeze({ ...config.vadSensitivity })
  });
};

// The terminal registers no tools, so function calling stays off for its sessions.
export const toSessionConfig = (config: AppConfig): SessionConfig =>
  parseSessionConfig({
    model: config.model,
    voice: config.voice,
    vadEnabled: config.vadEnabled,
    functionCallingEnabled: false,
    systemPrompt: config.systemPrompt,
    localeFlags: {
      includeTime: config.includeTime,
      includeDate: config.includeDate
    },
    vadSensitivity: {
      enterDbfs: config.vadEnterDbfs,
      exitDbfs: config.vadExitDbfs,
      hangoverMs: config.vadHangoverMs
    }
  });
