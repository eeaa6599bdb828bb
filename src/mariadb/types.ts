import type { Config } from '../config/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * Connection settings supplied by the host. `getArgs()` is appended verbatim
 * to the client command line.
 */
export interface ClientConfig {
  clientBin(): string;
  getArgs(): string;
}

export interface Disposable {
  dispose(): void;
}

export interface TerminalExit {
  exitCode: number;
  signal?: number;
}

/**
 * The slice of a pseudo-terminal the channel relies on. node-pty's IPty
 * satisfies it; tests substitute an in-process fake.
 */
export interface Terminal {
  readonly pid: number;
  write(data: string): void;
  kill(signal?: string): void;
  onData(listener: (data: string) => void): Disposable;
  onExit(listener: (exit: TerminalExit) => void): Disposable;
}

export interface TerminalOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
  cols: number;
  rows: number;
}

export type SpawnTerminal = (file: string, args: string[], options: TerminalOptions) => Terminal;

export interface ChannelLaunchOptions {
  /** Binary to run, a bare name or a path */
  file: string;
  flags: string[];
  /** Shell text appended after the flags */
  args: string;
  prompt: RegExp;
  /** Negative waits forever */
  startupTimeoutMs: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  spawnTerminal?: SpawnTerminal;
}

export type DriverState = 'unstarted' | 'running' | 'stopped';

export type TransportFailure = 'timeout' | 'closed' | 'notRunning';

export type Outcome =
  | { kind: 'ok'; text: string; acknowledged: boolean }
  | { kind: 'error'; text: string }
  | { kind: 'transport'; reason: TransportFailure; message: string };

export interface MariaDBClientOptions {
  log?: Logger;
  prompt?: string | RegExp;
  startupTimeoutMs?: number;
  statementTimeoutMs?: number;
  terminateGraceMs?: number;
  /** Directory holding the scratch file; defaults to the process cwd */
  scratchDir?: string;
  spawnTerminal?: SpawnTerminal;
}

export function envClientConfig(config: Config): ClientConfig {
  return {
    clientBin: () => config.client.bin,
    getArgs: () => config.client.args,
  };
}
