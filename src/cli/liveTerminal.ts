#!/usr/bin/env node
import readline from 'node:readline';
import { runStartupChecks } from '../bootstrap/startupChecks';
import { resolveConfig, toSessionConfig, validateConfig } from '../config';
import { VoiceSessionController } from '../core/VoiceSessionController';
import { ConfigurationError, RemoteProtocolError, describeError } from '../errors';
import { StructuredLogger } from '../logging/StructuredLogger';
import { FfmpegRecorder } from '../services/capture/FfmpegRecorder';
import { ProcessAudioPlayer } from '../services/playback/ProcessAudioPlayer';
import { WebSocketTransport } from '../services/realtime/WebSocketTransport';
import { CommandDispatcher, HELP_LINES } from './CommandDispatcher';

const print = (line: string): void => {
  process.stdout.write(`${line}\n`);
};

const main = async (): Promise<void> => {
  const config = resolveConfig();
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigurationError(`Invalid configuration:\n- ${errors.join('\n- ')}`, errors);
  }

  const sessionConfig = toSessionConfig(config);
  const logger = await StructuredLogger.create(config.logDir, { consoleLevel: config.consoleLogLevel });
  const { playbackTool } = await runStartupChecks(config, logger);

  const controller = new VoiceSessionController(
    {
      recorder: new FfmpegRecorder(
        {
          inputFormat: config.ffmpegInputFormat,
          inputDevice: config.ffmpegInputDevice,
          sampleRate: config.sampleRate
        },
        logger.child({ component: 'capture' })
      ),
      player: new ProcessAudioPlayer(
        { tool: playbackTool, sampleRate: config.sampleRate },
        logger.child({ component: 'playback' })
      ),
      createTransport: (session) =>
        new WebSocketTransport(
          {
            url: config.realtimeUrl,
            apiKey: config.apiKey,
            model: session.model,
            flushIntervalMs: config.outboundFlushIntervalMs,
            flushChunkCount: config.outboundFlushChunkCount
          },
          logger.child({ component: 'transport' })
        )
    },
    {
      device: config.device,
      sampleRate: config.sampleRate,
      captureChunkMs: config.captureChunkMs,
      handshakeTimeoutMs: config.handshakeTimeoutMs,
      turnTimeoutMs: config.turnTimeoutMs,
      cancelAckTimeoutMs: config.cancelAckTimeoutMs,
      shutdownGraceMs: config.shutdownGraceMs
    },
    logger.child({ component: 'session' })
  );

  const dispatcher = new CommandDispatcher(controller, sessionConfig, print, logger.child({ component: 'cli' }));

  let shuttingDown = false;
  let remoteFailure = false;
  let commandChain = Promise.resolve();

  const queue = (fn: () => Promise<void>): void => {
    commandChain = commandChain.then(fn).catch((error: unknown) => {
      if (error instanceof ConfigurationError) {
        process.stderr.write(`[config] ${error.message}\n`);
        return;
      }

      process.stderr.write(`[error] ${describeError(error)}\n`);
    });
  };

  controller.on('turnPhaseChanged', (phase) => {
    if (phase === 'user_speaking') {
      print('[listening]');
    } else if (phase === 'assistant_responding') {
      print('[responding]');
    }
  });

  controller.on('assistantText', (reply) => {
    if (reply.source === 'voice' && reply.text) {
      print(`assistant: ${reply.text}`);
    }
  });

  controller.on('bargeIn', (notice) => {
    print(`[barge-in] cancelled turn ${notice.cancelledTurnId}`);
  });

  controller.on('turnTimeout', (error) => {
    print(`[timeout] ${error.message}`);
  });

  controller.on('sessionError', (error) => {
    process.stderr.write(`[session:error] ${error.message}\n`);
    remoteFailure = remoteFailure || error instanceof RemoteProtocolError;
  });

  controller.on('sessionEnded', (notice) => {
    print(`[voice] session ended (${notice.reason})`);
    if (remoteFailure) {
      queue(() => shutdown(1));
    }
  });

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: true
  });

  const shutdown = async (exitCode: number): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    rl.close();
    await controller.stop();
    await dispatcher.drain();
    logger.info('voxshell exiting', { exitCode });
    await logger.flush();
    print('Bye.');
    process.exit(exitCode);
  };

  process.on('SIGINT', () => {
    queue(() => shutdown(0));
  });

  rl.on('line', (line) => {
    queue(async () => {
      const result = await dispatcher.handleLine(line);
      if (result === 'quit') {
        await shutdown(0);
      }
    });
  });

  print(`Model: ${sessionConfig.model}  Voice: ${sessionConfig.voice}  Playback: ${playbackTool}`);
  HELP_LINES.forEach((line) => print(line));

  try {
    await controller.start(sessionConfig);
    print(sessionConfig.vadEnabled ? '[voice] session active, speak any time' : '[voice] session active, use /talk and /end');
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }

    process.stderr.write(`[voice] ${describeError(error)}\nUse /voice start to retry.\n`);
  }
};

main().catch((error: unknown) => {
  process.stderr.write(`${describeError(error)}\n`);
  process.exit(1);
});
