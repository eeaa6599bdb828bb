import type { Disposable, Terminal, TerminalExit } from '../../src/mariadb/types.js'

/** In-process stand-in for a node-pty terminal. */
export class FakeTerminal implements Terminal {
  readonly pid = 4242
  readonly written: string[] = []
  killed = false
  exited = false
  onInput: ((data: string) => void) | null = null

  private readonly dataListeners = new Set<(data: string) => void>()
  private readonly exitListeners = new Set<(exit: TerminalExit) => void>()

  write(data: string): void {
    this.written.push(data)
    this.onInput?.(data)
  }

  kill(): void {
    this.killed = true
    setImmediate(() => this.exit(0, 15))
  }

  onData(listener: (data: string) => void): Disposable {
    this.dataListeners.add(listener)
    return { dispose: () => this.dataListeners.delete(listener) }
  }

  onExit(listener: (exit: TerminalExit) => void): Disposable {
    this.exitListeners.add(listener)
    return { dispose: () => this.exitListeners.delete(listener) }
  }

  emit(data: string): void {
    for (const listener of this.dataListeners) {
      listener(data)
    }
  }

  exit(exitCode: number, signal?: number): void {
    if (this.exited) return
    this.exited = true
    for (const listener of this.exitListeners) {
      listener({ exitCode, signal })
    }
  }
}
