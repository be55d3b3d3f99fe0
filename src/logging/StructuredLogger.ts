import fs from 'node:fs/promises';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry extends LogContext {
  ts: string;
  level: LogLevel;
  message: string;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export interface StructuredLoggerOptions {
  consoleLevel?: LogLevel;
  baseContext?: LogContext;
}

export class StructuredLogger {
  private writeQueue: Promise<void> = Promise.resolve();

  private constructor(
    private readonly filePath: string,
    private readonly consoleLevel: LogLevel,
    private readonly baseContext: LogContext,
    private readonly root?: StructuredLogger
  ) {}

  public static async create(
    logDir: string,
    options: StructuredLoggerOptions = {}
  ): Promise<StructuredLogger> {
    await fs.mkdir(logDir, { recursive: true });

    const datePrefix = new Date().toISOString().slice(0, 10);
    const filePath = path.join(logDir, `voxshell-${datePrefix}.log`);

    return new StructuredLogger(filePath, options.consoleLevel ?? 'info', options.baseContext ?? {});
  }

  public getLogPath(): string {
    return this.filePath;
  }

  /**
   * Returns a logger that stamps every entry with `context` and shares this
   * logger's file and write queue.
   */
  public child(context: LogContext): StructuredLogger {
    return new StructuredLogger(
      this.filePath,
      this.consoleLevel,
      { ...this.baseContext, ...context },
      this.root ?? this
    );
  }

  public async flush(): Promise<void> {
    await (this.root ?? this).writeQueue;
  }

  public debug(message: string, context: LogContext = {}): void {
    this.write('debug', message, context);
  }

  public info(message: string, context: LogContext = {}): void {
    this.write('info', message, context);
  }

  public warn(message: string, context: LogContext = {}): void {
    this.write('warn', message, context);
  }

  public error(message: string, context: LogContext = {}): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context: LogContext): void {
    const merged = { ...this.baseContext, ...context };
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      message,
      ...merged
    };

    const line = `${JSON.stringify(entry)}\n`;
    const owner = this.root ?? this;

    owner.writeQueue = owner.writeQueue
      .then(async () => {
        await fs.appendFile(this.filePath, line, 'utf8');
      })
      .catch((error: unknown) => {
        const detail = error instanceof Error ? error.message : String(error);
        console.error(`[voxshell] Failed to write log file: ${detail}`);
      });

    if (LEVEL_RANK[level] < LEVEL_RANK[this.consoleLevel]) {
      return;
    }

    if (level === 'error') {
      console.error(`[voxshell] ${message}`, merged);
      return;
    }

    if (level === 'warn') {
      console.warn(`[voxshell] ${message}`, merged);
      return;
    }

    console.log(`[voxshell] ${message}`, merged);
  }
}
