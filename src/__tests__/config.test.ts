import { describe, expect, it } from 'vitest';
import { DEFAULT_MODEL, DEFAULT_VAD_SENSITIVITY, parseSessionConfig, resolveConfig, toSessionConfig, validateConfig } from '../config';
import { ConfigurationError } from '../errors';

const baseInput = {
  model: 'test-model',
  voice: 'echo',
  vadEnabled: true,
  functionCallingEnabled: false,
  systemPrompt: '',
  localeFlags: { includeTime: true, includeDate: false }
};

const catchError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }

  return undefined;
};

describe('resolveConfig', () => {
  it('applies defaults and the platform capture input', () => {
    const config = resolveConfig({ VOXSHELL_DEVICE: 'test-host' }, 'darwin');

    expect(config.apiKey).toBe('');
    expect(config.model).toBe(DEFAULT_MODEL);
    expect(config.voice).toBe('echo');
    expect(config.device).toBe('test-host');
    expect(config.ffmpegInputFormat).toBe('avfoundation');
    expect(config.ffmpegInputDevice).toBe(':0');
    expect(config.playbackBackend).toBe('auto');
    expect(config.sampleRate).toBe(24000);
    expect(validateConfig(config)).toEqual([]);
  });

  it('reads overrides from the environment', () => {
    const config = resolveConfig(
      {
        OPENAI_API_KEY: 'test-secret',
        VOXSHELL_VAD_ENABLED: 'no',
        VOXSHELL_PLAYBACK: 'ffplay',
        VOXSHELL_VAD_ENTER_DBFS: '-30.5',
        VOXSHELL_TURN_TIMEOUT_MS: 'soon',
        VOXSHELL_LOG_LEVEL: 'debug'
      },
      'linux'
    );

    expect(config.apiKey).toBe('test-secret');
    expect(config.vadEnabled).toBe(false);
    expect(config.playbackBackend).toBe('ffplay');
    expect(config.vadEnterDbfs).toBe(-30.5);
    expect(config.turnTimeoutMs).toBe(30000);
    expect(config.consoleLogLevel).toBe('debug');
    expect(config.ffmpegInputFormat).toBe('pulse');
  });
});

describe('validateConfig', () => {
  it('reports each invalid setting', () => {
    const config = {
      ...resolveConfig({}, 'linux'),
      realtimeUrl: 'https://example.test',
      voice: 'robot',
      vadExitDbfs: -10
    };

    expect(validateConfig(config)).toEqual([
      'VOXSHELL_REALTIME_URL must be a ws:// or wss:// URL.',
      'VOXSHELL_VOICE must be one of: alloy, ash, ballad, coral, echo, sage, shimmer, verse.',
      'VOXSHELL_VAD_EXIT_DBFS must not exceed VOXSHELL_VAD_ENTER_DBFS.'
    ]);
  });
});

describe('parseSessionConfig', () => {
  it('fills the default VAD sensitivity and freezes the result', () => {
    const config = parseSessionConfig(baseInput);

    expect(config.vadSensitivity).toEqual(DEFAULT_VAD_SENSITIVITY);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.localeFlags)).toBe(true);
  });

  it('rejects unrecognized keys', () => {
    const error = catchError(() => parseSessionConfig({ ...baseInput, temperature: 0.2 }));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ issues: ["(root): Unrecognized key(s) in object: 'temperature'"] });
  });

  it('rejects nested unrecognized keys', () => {
    const error = catchError(() =>
      parseSessionConfig({ ...baseInput, localeFlags: { includeTime: true, includeDate: true, zone: 'UTC' } })
    );

    expect(error).toMatchObject({ issues: ["localeFlags: Unrecognized key(s) in object: 'zone'"] });
  });

  it('rejects an exit threshold above the enter threshold', () => {
    const error = catchError(() =>
      parseSessionConfig({ ...baseInput, vadSensitivity: { enterDbfs: -40, exitDbfs: -30, hangoverMs: 300 } })
    );

    expect(error).toMatchObject({ issues: ['vadSensitivity.exitDbfs: exitDbfs must not exceed enterDbfs'] });
  });

  it('rejects an empty model', () => {
    const error = catchError(() => parseSessionConfig({ ...baseInput, model: '  ' }));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ code: 'configuration' });
  });

  it('builds a session config from the app config', () => {
    const config = toSessionConfig(resolveConfig({ VOXSHELL_INCLUDE_DATE: 'false' }, 'linux'));

    expect(config.localeFlags).toEqual({ includeTime: true, includeDate: false });
    expect(config.functionCallingEnabled).toBe(false);
    expect(config.vadSensitivity).toEqual({ enterDbfs: -38, exitDbfs: -46, hangoverMs: 600 });
  });
});
