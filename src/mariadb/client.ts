import { nanoid } from 'nanoid';
import { config } from '../config/index.js';
import { logger, type Logger } from '../utils/logger.js';
import {
  ChannelClosedError,
  ChannelTimeoutError,
  LaunchError,
  LoginError,
  ServerDownError,
} from '../utils/errors.js';
import { PromptChannel } from './channel.js';
import {
  cleanReply,
  cleanTerminalOutput,
  compilePrompt,
  detectCredentialRejection,
  isClientError,
} from './parser.js';
import { scratchFilePath, withScratchFile } from './scratch.js';
import type {
  ClientConfig,
  DriverState,
  MariaDBClientOptions,
  Outcome,
  SpawnTerminal,
} from './types.js';

/** Silent mode, results as HTML tables */
export const CLIENT_FLAGS = ['-s', '-H'];

export const QUERY_OK = 'Query OK';

const STATEMENT_PREVIEW_LENGTH = 200;

function preview(statement: string): string {
  return statement.length > STATEMENT_PREVIEW_LENGTH
    ? `${statement.slice(0, STATEMENT_PREVIEW_LENGTH)}...`
    : statement;
}

/**
 * Runs statements through an interactive mariadb client. Each statement is
 * written to a scratch file and loaded with `source`, which keeps long and
 * multi-line statements clear of the terminal's line limits.
 */
export class MariaDBClient {
  private channel: PromptChannel | null = null;
  private state: DriverState = 'unstarted';
  private last: Outcome | null = null;
  private tail: Promise<void> = Promise.resolve();
  private starting: Promise<void> | null = null;

  private readonly log: Logger;
  private readonly prompt: RegExp;
  private readonly startupTimeoutMs: number;
  private readonly statementTimeoutMs: number;
  private readonly terminateGraceMs: number;
  private readonly scratchPath: string;
  private readonly spawnTerminal?: SpawnTerminal;

  constructor(
    private readonly clientConfig: ClientConfig,
    options: MariaDBClientOptions = {}
  ) {
    this.log = options.log ?? logger.child({ component: 'mariadb-client' });
    this.prompt = compilePrompt(options.prompt ?? config.client.promptPattern);
    this.startupTimeoutMs = options.startupTimeoutMs ?? config.client.startupTimeoutMs;
    this.statementTimeoutMs = options.statementTimeoutMs ?? config.client.statementTimeoutMs;
    this.terminateGraceMs = options.terminateGraceMs ?? config.client.terminateGraceMs;
    this.scratchPath = scratchFilePath(options.scratchDir ?? config.client.scratchDir, nanoid(10));
    this.spawnTerminal = options.spawnTerminal;
  }

  getState(): DriverState {
    return this.state;
  }

  get scratchFile(): string {
    return this.scratchPath;
  }

  lastOutcome(): Outcome | null {
    return this.last;
  }

  isError(): boolean {
    return this.last !== null && this.last.kind !== 'ok';
  }

  errorMessage(): string {
    const last = this.last;
    if (!last) return '';
    switch (last.kind) {
      case 'error':
        return last.text;
      case 'transport':
        return last.message;
      case 'ok':
        return '';
    }
  }

  /**
   * Launch the client and wait for its first prompt. A missing binary is
   * logged and leaves the client stopped; a client that exits during startup
   * raises LoginError or ServerDownError. Calls made while a launch is in
   * progress share it.
   */
  start(): Promise<void> {
    if (this.starting) {
      return this.starting;
    }
    if (this.state === 'running') {
      this.log.warn('MariaDB client is already running');
      return Promise.resolve();
    }

    const starting = this.launch().finally(() => {
      this.starting = null;
    });
    this.starting = starting;
    return starting;
  }

  private async launch(): Promise<void> {
    const bin = this.clientConfig.clientBin();

    let channel: PromptChannel;
    try {
      channel = await PromptChannel.launch({
        file: bin,
        flags: CLIENT_FLAGS,
        args: this.clientConfig.getArgs(),
        prompt: this.prompt,
        startupTimeoutMs: this.startupTimeoutMs,
        spawnTerminal: this.spawnTerminal,
      });
    } catch (err) {
      if (!(err instanceof LaunchError)) throw err;
      this.state = 'stopped';

      if (err.reason === 'binaryNotFound') {
        this.log.error({ bin }, `No mariadb command line client found at ${bin}`);
        this.log.error('Please install MariaDB from mariadb.org/download');
        return;
      }

      const output = cleanTerminalOutput(err.output).trim();
      this.log.error({ reason: err.reason, output }, 'MariaDB client failed to start');

      if (err.reason === 'endOfStream' && detectCredentialRejection(output)) {
        this.log.error('The credentials used for connecting are wrong');
        throw new LoginError(output);
      }

      this.log.error('Most probably the MariaDB server is not started');
      throw new ServerDownError(output);
    }

    this.channel = channel;
    this.state = 'running';
    this.log.info({ pid: channel.pid }, 'MariaDB client was successfully started');
  }

  async stop(): Promise<void> {
    // a launch in progress is let through, then stopped; its failure belongs to start()
    await this.starting?.then(
      () => undefined,
      () => undefined
    );

    const channel = this.channel;
    if (!channel) {
      return;
    }

    this.channel = null;
    this.state = 'stopped';

    // quit ends the process; the closed stream is the success signal
    await channel.terminate(this.terminateGraceMs);
    this.log.info({ exitCode: channel.exitCode }, 'MariaDB client was successfully stopped');
  }

  /**
   * Submit one statement. Statements are queued so only one is in flight per
   * client. `timeoutMs < 0` waits for the prompt indefinitely.
   */
  execute(statement: string, timeoutMs: number = this.statementTimeoutMs): Promise<Outcome> {
    if (statement.trim() === '') {
      return Promise.resolve<Outcome>({ kind: 'ok', text: '', acknowledged: false });
    }

    const result = this.tail.then(() => this.submit(statement, timeoutMs));
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /**
   * Text-only form of execute: the reply for results and client errors, empty
   * text when the client could not be reached. isError() and errorMessage()
   * describe the same statement afterwards.
   */
  async run(statement: string, timeoutMs?: number): Promise<string> {
    const outcome = await this.execute(statement, timeoutMs);
    return outcome.kind === 'transport' ? '' : outcome.text;
  }

  private async submit(statement: string, timeoutMs: number): Promise<Outcome> {
    const channel = this.channel;
    if (!channel || this.state !== 'running') {
      return this.record({
        kind: 'transport',
        reason: 'notRunning',
        message: 'MariaDB client is not running',
      });
    }

    const command = `source ${this.scratchPath}`;
    let raw: string;
    try {
      raw = await withScratchFile(this.scratchPath, statement, () =>
        channel.send(command, timeoutMs)
      );
    } catch (err) {
      if (err instanceof ChannelTimeoutError || err instanceof ChannelClosedError) {
        return this.record(this.transportFailure(statement, channel, err));
      }
      throw err;
    }

    const reply = cleanReply(raw, command);

    if (isClientError(reply)) {
      return this.record({ kind: 'error', text: reply });
    }
    if (!reply) {
      return this.record({ kind: 'ok', text: QUERY_OK, acknowledged: true });
    }
    return this.record({ kind: 'ok', text: reply, acknowledged: false });
  }

  private transportFailure(
    statement: string,
    channel: PromptChannel,
    err: ChannelTimeoutError | ChannelClosedError
  ): Outcome {
    if (err instanceof ChannelTimeoutError) {
      this.log.error(
        { err, statement: preview(statement) },
        'MariaDB client failed to run command. Reading from the client timed out'
      );
    } else {
      this.log.error(
        { err, statement: preview(statement) },
        'MariaDB client failed to run command. Client most probably exited due to a crash'
      );
    }

    // The prompt position is lost either way
    channel.kill();
    if (this.channel === channel) {
      this.channel = null;
      this.state = 'stopped';
    }

    return {
      kind: 'transport',
      reason: err instanceof ChannelTimeoutError ? 'timeout' : 'closed',
      message: err.message,
    };
  }

  private record(outcome: Outcome): Outcome {
    this.last = outcome;
    return outcome;
  }
}
