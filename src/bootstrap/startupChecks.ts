import { DeviceError, describeError } from '../errors';
import type { StructuredLogger } from '../logging/StructuredLogger';
import type { PlaybackTool } from '../services/playback/ProcessAudioPlayer';
import { runCommand, type CommandRunner } from '../services/process/runCommand';
import type { AppConfig } from '../types';

const CHECK_TIMEOUT_MS = 8000;
const AUTO_PLAYBACK_ORDER: PlaybackTool[] = ['play', 'sox', 'ffplay'];

const VERSION_ARGS: Record<PlaybackTool, string[]> = {
  ffplay: ['-version'],
  play: ['--version'],
  sox: ['--version']
};

const isAvailable = async (runner: CommandRunner, command: string, args: string[]): Promise<boolean> => {
  try {
    await runner(command, args, { timeoutMs: CHECK_TIMEOUT_MS });
    return true;
  } catch {
    return false;
  }
};

export const resolvePlaybackTool = async (
  config: Pick<AppConfig, 'playbackBackend'>,
  runner: CommandRunner = runCommand
): Promise<PlaybackTool> => {
  const candidates = config.playbackBackend === 'auto' ? AUTO_PLAYBACK_ORDER : [config.playbackBackend];

  for (const tool of candidates) {
    if (await isAvailable(runner, tool, VERSION_ARGS[tool])) {
      return tool;
    }
  }

  throw new DeviceError(
    'playback',
    `No audio playback tool found (tried ${candidates.join(', ')}). Install sox or ffmpeg, or set VOXSHELL_PLAYBACK.`
  );
};

export interface StartupReport {
  playbackTool: PlaybackTool;
}

export const runStartupChecks = async (
  config: AppConfig,
  logger: StructuredLogger,
  runner: CommandRunner = runCommand
): Promise<StartupReport> => {
  logger.info('Running startup checks');

  try {
    await runner('ffmpeg', ['-version'], { timeoutMs: CHECK_TIMEOUT_MS });
  } catch (error) {
    throw new DeviceError('capture', `ffmpeg is required for microphone capture: ${describeError(error)}`, {
      cause: error
    });
  }

  const playbackTool = await resolvePlaybackTool(config, runner);

  logger.info('Startup checks completed successfully', { playbackTool });
  return { playbackTool };
};
