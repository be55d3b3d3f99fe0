import type { SessionConfigInput } from '../config';
import type { VoiceSessionStatus } from '../core/VoiceSessionController';
import { TurnCancelledError, TurnTimeoutError, describeError } from '../errors';
import type { StructuredLogger } from '../logging/StructuredLogger';

export interface VoiceSessionPort {
  start(config: SessionConfigInput): Promise<void>;
  stop(): Promise<void>;
  sendText(text: string): Promise<string>;
  beginTurn(): boolean;
  endTurn(): boolean;
  getStatus(): VoiceSessionStatus;
}

export type DispatchResult = 'continue' | 'quit';

export const HELP_LINES = [
  'Commands:',
  '  /voice start        Open the voice session',
  '  /voice stop         Close the voice session',
  '  /talk               Start a spoken turn (push-to-talk)',
  '  /end                End the spoken turn and ask for a reply',
  '  /status             Print session state',
  '  /help               Show this help',
  '  /quit               Exit',
  '  <text>              Send a text message to the assistant'
];

export const formatStatus = (status: VoiceSessionStatus): string => {
  const parts = [`phase=${status.phase}`];
  if (status.turnPhase) {
    parts.push(`turn=${status.turnPhase}`);
  }

  parts.push(`turns=${status.turnsOpened}`);
  parts.push(`dropped=${status.droppedDeltas}`);
  parts.push(`queued=${status.queuedTextTurns}`);
  parts.push(`firstAudioP50=${status.latency.firstAudioMs.p50}ms`);
  return `[status] ${parts.join(' ')}`;
};

/**
 * Routes terminal lines to the voice session. Text lines are sent without
 * blocking further commands; `drain()` waits for replies still in flight.
 */
export class CommandDispatcher {
  private readonly inFlight = new Set<Promise<void>>();

  public constructor(
    private readonly session: VoiceSessionPort,
    private readonly sessionConfig: SessionConfigInput,
    private readonly print: (line: string) => void,
    private readonly logger?: StructuredLogger
  ) {}

  public async handleLine(line: string): Promise<DispatchResult> {
    const input = line.trim();
    if (!input) {
      return 'continue';
    }

    if (!input.startsWith('/')) {
      this.submitText(input);
      return 'continue';
    }

    switch (input) {
      case '/help':
        HELP_LINES.forEach((helpLine) => this.print(helpLine));
        return 'continue';
      case '/status':
        this.print(formatStatus(this.session.getStatus()));
        return 'continue';
      case '/voice start':
        await this.session.start(this.sessionConfig);
        this.print('[voice] session active');
        return 'continue';
      case '/voice stop':
        await this.session.stop();
        this.print('[voice] session stopped');
        return 'continue';
      case '/talk':
        this.print(this.session.beginTurn() ? '[talk] listening' : '[talk] no active session');
        return 'continue';
      case '/end':
        this.print(this.session.endTurn() ? '[talk] turn ended' : '[talk] no active session');
        return 'continue';
      case '/quit':
        return 'quit';
      default:
        this.print(`Unknown command: ${input}. Use /help.`);
        return 'continue';
    }
  }

  public async drain(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  private submitText(text: string): void {
    const pending: Promise<void> = this.session
      .sendText(text)
      .then(
        (reply) => {
          this.print(`assistant: ${reply}`);
        },
        (error: unknown) => {
          this.reportTextFailure(error);
        }
      )
      .then(() => {
        this.inFlight.delete(pending);
      });

    this.inFlight.add(pending);
  }

  private reportTextFailure(error: unknown): void {
    this.logger?.warn('Text turn failed', { detail: describeError(error) });
    if (error instanceof TurnTimeoutError) {
      this.print(`[timeout] ${error.message}`);
      return;
    }

    if (error instanceof TurnCancelledError) {
      this.print(`[interrupted] ${error.message}`);
      return;
    }

    this.print(`[error] ${describeError(error)}`);
  }
}
