import * as pty from 'node-pty';
import { logger } from '../utils/logger.js';
import { findExecutable } from '../utils/system.js';
import {
  ChannelBusyError,
  ChannelClosedError,
  ChannelTimeoutError,
  LaunchError,
} from '../utils/errors.js';
import { compilePrompt } from './parser.js';
import type {
  ChannelLaunchOptions,
  Disposable,
  SpawnTerminal,
  Terminal,
  TerminalExit,
} from './types.js';

const log = logger.child({ component: 'prompt-channel' });

const DEFAULT_COLS = 200;
const DEFAULT_ROWS = 40;

export const QUIT_COMMAND = 'quit';

export const spawnPty: SpawnTerminal = (file, args, options) =>
  pty.spawn(file, args, {
    name: 'xterm-256color',
    cols: options.cols,
    rows: options.rows,
    cwd: options.cwd,
    env: {
      ...options.env,
      TERM: 'xterm-256color',
      // No pager between the client and the channel
      PAGER: '',
    },
  });

function quoteShell(word: string): string {
  return `'${word.replace(/'/g, `'\\''`)}'`;
}

interface Expectation {
  resolve: (before: string) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout | null;
}

/**
 * A child process behind a pseudo-terminal, driven as request/response: write
 * a line, then collect output until the prompt shows up again.
 */
export class PromptChannel {
  private terminal: Terminal | null;
  private buffer = '';
  private pending: Expectation | null = null;
  private closed = false;
  private desynchronized = false;
  private exitWaiters: Array<() => void> = [];
  private readonly subscriptions: Disposable[] = [];
  private _exitCode: number | null = null;

  readonly pid: number;

  private constructor(
    terminal: Terminal,
    private readonly prompt: RegExp
  ) {
    this.terminal = terminal;
    this.pid = terminal.pid;
    this.subscriptions.push(
      terminal.onData((data) => this.handleData(data)),
      terminal.onExit((exit) => this.handleExit(exit))
    );
  }

  static async launch(options: ChannelLaunchOptions): Promise<PromptChannel> {
    const resolved = findExecutable(options.file);
    if (!resolved) {
      throw new LaunchError('binaryNotFound', `no executable found at ${options.file}`);
    }

    const command = ['exec', quoteShell(resolved), ...options.flags.map(quoteShell), options.args.trim()]
      .filter(Boolean)
      .join(' ');
    const spawnTerminal = options.spawnTerminal ?? spawnPty;

    log.info({ command }, 'Launching client');

    let terminal: Terminal;
    try {
      terminal = spawnTerminal('/bin/sh', ['-c', command], {
        cwd: options.cwd ?? process.cwd(),
        env: options.env ?? process.env,
        cols: DEFAULT_COLS,
        rows: DEFAULT_ROWS,
      });
    } catch (err) {
      throw new LaunchError('binaryNotFound', err instanceof Error ? err.message : String(err));
    }

    const channel = new PromptChannel(terminal, compilePrompt(options.prompt));

    try {
      // The client prints its banner and first prompt unprompted
      await channel.expectPrompt(options.startupTimeoutMs);
    } catch (err) {
      if (err instanceof ChannelClosedError) {
        throw new LaunchError('endOfStream', 'client exited before showing a prompt', err.before);
      }
      if (err instanceof ChannelTimeoutError) {
        channel.kill();
        throw new LaunchError('timeout', `no prompt within ${err.timeoutMs}ms`, err.before);
      }
      throw err;
    }

    log.debug({ pid: channel.pid }, 'Client is ready');
    return channel;
  }

  get exitCode(): number | null {
    return this._exitCode;
  }

  isAlive(): boolean {
    return this.terminal !== null && !this.closed;
  }

  /**
   * Write `text` as one line and resolve with everything the client printed
   * before its next prompt. `timeoutMs < 0` waits for as long as it takes.
   * After a timeout the prompt position is unknown and the channel refuses
   * further sends.
   */
  async send(text: string, timeoutMs: number): Promise<string> {
    if (!this.terminal || this.closed || this.desynchronized) {
      throw new ChannelClosedError('', this._exitCode);
    }
    if (this.pending) {
      throw new ChannelBusyError();
    }

    log.debug({ pid: this.pid, inputLength: text.length }, 'Sending line');
    this.terminal.write(text + '\n');

    try {
      return await this.expectPrompt(timeoutMs);
    } catch (err) {
      if (err instanceof ChannelTimeoutError) {
        this.desynchronized = true;
      }
      throw err;
    }
  }

  /**
   * Ask the client to quit and wait for it to go away. The process is killed
   * if it is still running after `graceMs`.
   */
  async terminate(graceMs: number): Promise<void> {
    if (!this.terminal || this.closed) {
      return;
    }

    log.info({ pid: this.pid }, 'Terminating client');
    this.terminal.write(QUIT_COMMAND + '\n');

    await new Promise<void>((resolve) => {
      const forceKillTimeout = setTimeout(() => {
        log.warn({ pid: this.pid, graceMs }, 'Client ignored quit, killing it');
        this.kill();
        resolve();
      }, graceMs);

      this.exitWaiters.push(() => {
        clearTimeout(forceKillTimeout);
        resolve();
      });
    });
  }

  /** Release the process unconditionally. */
  kill(): void {
    const terminal = this.terminal;
    if (!terminal || this.closed) {
      return;
    }
    try {
      terminal.kill();
    } catch (err) {
      log.warn({ err, pid: this.pid }, 'Failed to kill client');
    }
    this.release(null);
  }

  private expectPrompt(timeoutMs: number): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const expectation: Expectation = { resolve, reject, timer: null };
      this.pending = expectation;

      if (this.matchPrompt()) {
        return;
      }
      if (this.closed) {
        this.failPending(new ChannelClosedError(this.takeBuffer(), this._exitCode));
        return;
      }

      if (timeoutMs >= 0) {
        expectation.timer = setTimeout(() => {
          if (this.pending === expectation) {
            this.failPending(new ChannelTimeoutError(timeoutMs, this.takeBuffer()));
          }
        }, timeoutMs);
      }
    });
  }

  private matchPrompt(): boolean {
    const pending = this.pending;
    if (!pending) return false;

    const match = this.prompt.exec(this.buffer);
    if (!match) return false;

    const before = this.buffer.slice(0, match.index);
    this.buffer = this.buffer.slice(match.index + match[0].length);
    this.clearPending(pending);
    pending.resolve(before);
    return true;
  }

  private failPending(err: Error): void {
    const pending = this.pending;
    if (!pending) return;
    this.clearPending(pending);
    pending.reject(err);
  }

  private clearPending(pending: Expectation): void {
    if (pending.timer) {
      clearTimeout(pending.timer);
    }
    this.pending = null;
  }

  private takeBuffer(): string {
    const text = this.buffer;
    this.buffer = '';
    return text;
  }

  private handleData(data: string): void {
    this.buffer += data;
    this.matchPrompt();
  }

  private handleExit({ exitCode }: TerminalExit): void {
    log.info({ pid: this.pid, exitCode }, 'Client exited');
    this.release(exitCode);
  }

  private release(exitCode: number | null): void {
    if (this.closed) return;
    this.closed = true;
    this._exitCode = exitCode;

    for (const subscription of this.subscriptions) {
      subscription.dispose();
    }
    this.terminal = null;

    this.failPending(new ChannelClosedError(this.takeBuffer(), exitCode));

    const waiters = this.exitWaiters;
    this.exitWaiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}
