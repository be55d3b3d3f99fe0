export type VoxshellErrorCode =
  | 'configuration'
  | 'connection'
  | 'remote_protocol'
  | 'turn_timeout'
  | 'turn_cancelled'
  | 'device'
  | 'internal';

export class VoxshellError extends Error {
  public constructor(
    public readonly code: VoxshellErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends VoxshellError {
  public constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super('configuration', message);
  }
}

export class ConnectionError extends VoxshellError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super('connection', message, options);
  }
}

export class RemoteProtocolError extends VoxshellError {
  public constructor(
    message: string,
    public readonly remoteCode?: string,
    options?: { cause?: unknown }
  ) {
    super('remote_protocol', message, options);
  }
}

// turnId is undefined when the request timed out before it was given a turn.
export class TurnTimeoutError extends VoxshellError {
  public constructor(
    public readonly turnId: number | undefined,
    public readonly timeoutMs: number
  ) {
    super(
      'turn_timeout',
      turnId === undefined
        ? `Queued text turn did not complete within ${timeoutMs}ms`
        : `Turn ${turnId} did not complete within ${timeoutMs}ms`
    );
  }
}

export class TurnCancelledError extends VoxshellError {
  public constructor(public readonly turnId: number) {
    super('turn_cancelled', `Turn ${turnId} was interrupted by user speech`);
  }
}

export type DeviceKind = 'capture' | 'playback';

export class DeviceError extends VoxshellError {
  public constructor(
    public readonly device: DeviceKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('device', message, options);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
