export class MariaReplError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MariaReplError';
  }
}

export class ConfigError extends MariaReplError {
  constructor(public readonly issues: string[]) {
    super(
      `Invalid configuration: ${issues.join('; ')}`,
      'CONFIG_ERROR',
      { issues }
    );
    this.name = 'ConfigError';
  }
}

export type LaunchFailureReason = 'endOfStream' | 'binaryNotFound' | 'timeout';

export class LaunchError extends MariaReplError {
  constructor(
    public readonly reason: LaunchFailureReason,
    message: string,
    public readonly output: string = ''
  ) {
    super(
      `Failed to launch client: ${message}`,
      'LAUNCH_ERROR',
      { reason }
    );
    this.name = 'LaunchError';
  }
}

export class LoginError extends MariaReplError {
  constructor(output: string) {
    super(
      'The credentials used for connecting were rejected',
      'LOGIN_ERROR',
      { output }
    );
    this.name = 'LoginError';
  }
}

export class ServerDownError extends MariaReplError {
  constructor(output: string) {
    super(
      'The client exited during startup, most probably the server is not running',
      'SERVER_DOWN',
      { output }
    );
    this.name = 'ServerDownError';
  }
}

export class ChannelClosedError extends MariaReplError {
  constructor(
    public readonly before: string,
    public readonly exitCode: number | null
  ) {
    super(
      exitCode === null
        ? 'Client output stream is closed'
        : `Client exited with code ${exitCode}`,
      'CHANNEL_CLOSED',
      { exitCode }
    );
    this.name = 'ChannelClosedError';
  }
}

export class ChannelTimeoutError extends MariaReplError {
  constructor(
    public readonly timeoutMs: number,
    public readonly before: string
  ) {
    super(
      `Timed out after ${timeoutMs}ms waiting for the client prompt`,
      'CHANNEL_TIMEOUT',
      { timeoutMs }
    );
    this.name = 'ChannelTimeoutError';
  }
}

export class ChannelBusyError extends MariaReplError {
  constructor() {
    super(
      'A command is already waiting for the client prompt',
      'CHANNEL_BUSY'
    );
    this.name = 'ChannelBusyError';
  }
}
