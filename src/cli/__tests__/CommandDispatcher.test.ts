import { describe, expect, it, vi } from 'vitest';
import type { SessionConfigInput } from '../../config';
import type { VoiceSessionStatus } from '../../core/VoiceSessionController';
import { ConnectionError, TurnCancelledError, TurnTimeoutError } from '../../errors';
import { CommandDispatcher, HELP_LINES, formatStatus, type VoiceSessionPort } from '../CommandDispatcher';

const emptySummary = { p50: 0, p95: 0, max: 0, avg: 0 };

const idleStatus: VoiceSessionStatus = {
  phase: 'idle',
  turnsOpened: 0,
  droppedDeltas: 0,
  queuedTextTurns: 0,
  latency: { turns: 0, completed: 0, cancelled: 0, timedOut: 0, firstAudioMs: emptySummary, durationMs: emptySummary }
};

const sessionConfig: SessionConfigInput = {
  model: 'test-model',
  voice: 'echo',
  vadEnabled: true,
  functionCallingEnabled: false,
  systemPrompt: '',
  localeFlags: { includeTime: false, includeDate: false }
};

const createPort = (overrides: Partial<VoiceSessionPort> = {}): VoiceSessionPort => ({
  start: vi.fn(async () => undefined),
  stop: vi.fn(async () => undefined),
  sendText: vi.fn(async (text: string) => `echo ${text}`),
  beginTurn: vi.fn(() => true),
  endTurn: vi.fn(() => true),
  getStatus: vi.fn(() => idleStatus),
  ...overrides
});

const createDispatcher = (port: VoiceSessionPort) => {
  const lines: string[] = [];
  const dispatcher = new CommandDispatcher(port, sessionConfig, (line) => lines.push(line));
  return { dispatcher, lines };
};

describe('formatStatus', () => {
  it('omits the turn phase when no turn is open', () => {
    expect(formatStatus(idleStatus)).toBe('[status] phase=idle turns=0 dropped=0 queued=0 firstAudioP50=0ms');
  });

  it('includes the turn phase and latency', () => {
    const status: VoiceSessionStatus = {
      ...idleStatus,
      phase: 'active',
      turnPhase: 'listening',
      turnsOpened: 3,
      droppedDeltas: 2,
      latency: { ...idleStatus.latency, firstAudioMs: { p50: 180, p95: 240, max: 240, avg: 200 } }
    };

    expect(formatStatus(status)).toBe(
      '[status] phase=active turn=listening turns=3 dropped=2 queued=0 firstAudioP50=180ms'
    );
  });
});

describe('CommandDispatcher', () => {
  it('starts and stops the session', async () => {
    const port = createPort();
    const { dispatcher, lines } = createDispatcher(port);

    await expect(dispatcher.handleLine('/voice start')).resolves.toBe('continue');
    await dispatcher.handleLine('/voice stop');

    expect(port.start).toHaveBeenCalledWith(sessionConfig);
    expect(port.stop).toHaveBeenCalledTimes(1);
    expect(lines).toEqual(['[voice] session active', '[voice] session stopped']);
  });

  it('propagates a failed start to the caller', async () => {
    const port = createPort({ start: vi.fn(async () => Promise.reject(new ConnectionError('refused'))) });
    const { dispatcher, lines } = createDispatcher(port);

    await expect(dispatcher.handleLine('/voice start')).rejects.toThrow('refused');
    expect(lines).toEqual([]);
  });

  it('routes push-to-talk commands', async () => {
    const port = createPort({ endTurn: vi.fn(() => false) });
    const { dispatcher, lines } = createDispatcher(port);

    await dispatcher.handleLine('/talk');
    await dispatcher.handleLine('/end');

    expect(lines).toEqual(['[talk] listening', '[talk] no active session']);
  });

  it('prints help, status and unknown commands', async () => {
    const { dispatcher, lines } = createDispatcher(createPort());

    await dispatcher.handleLine('/help');
    await dispatcher.handleLine('/status');
    await dispatcher.handleLine('/dance');
    await dispatcher.handleLine('   ');

    expect(lines).toEqual([
      ...HELP_LINES,
      '[status] phase=idle turns=0 dropped=0 queued=0 firstAudioP50=0ms',
      'Unknown command: /dance. Use /help.'
    ]);
  });

  it('returns quit for /quit', async () => {
    const { dispatcher } = createDispatcher(createPort());

    await expect(dispatcher.handleLine('/quit')).resolves.toBe('quit');
  });

  it('sends text without waiting for the reply', async () => {
    let release: (reply: string) => void = () => undefined;
    const port = createPort({
      sendText: vi.fn(
        () =>
          new Promise<string>((resolve) => {
            release = resolve;
          })
      )
    });
    const { dispatcher, lines } = createDispatcher(port);

    await expect(dispatcher.handleLine('  what time is it  ')).resolves.toBe('continue');
    expect(port.sendText).toHaveBeenCalledWith('what time is it');
    expect(lines).toEqual([]);

    release('noon');
    await dispatcher.drain();

    expect(lines).toEqual(['assistant: noon']);
  });

  it('reports each kind of text failure', async () => {
    const failures = [
      new TurnTimeoutError(undefined, 5000),
      new TurnCancelledError(4),
      new ConnectionError('Voice session closed')
    ];
    const port = createPort({ sendText: vi.fn(async () => Promise.reject(failures.shift())) });
    const { dispatcher, lines } = createDispatcher(port);

    await dispatcher.handleLine('one');
    await dispatcher.handleLine('two');
    await dispatcher.handleLine('three');
    await dispatcher.drain();

    expect(lines).toEqual([
      '[timeout] Queued text turn did not complete within 5000ms',
      '[interrupted] Turn 4 was interrupted by user speech',
      '[error] Voice session closed'
    ]);
  });
});
