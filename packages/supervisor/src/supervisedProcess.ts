import { spawn as spawnDefault, type ChildProcess, type SpawnOptions } from 'node:child_process';

import { exitCodeFromExitEvent, isProcessAlive, signalProcess } from './processTermination.js';

export type SpawnImpl = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export type CompletionState = 'completed' | 'timed_out' | 'interrupted';

export type CompletionResult = Readonly<{
  state: CompletionState;
  statusCode: number;
  stdout: string;
  stderr: string;
}>;

export type ProcessState = 'unstarted' | 'running' | CompletionState;

/** Largest delay `setTimeout` honours; longer delays fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

type CancellationReason = 'deadline' | 'owner';

type ExitEvent = Readonly<{ code: number | null; signal: NodeJS.Signals | null }>;

export class SpawnError extends Error {
  override name = 'SpawnError';
  readonly command: readonly string[];

  constructor(command: readonly string[], cause: Error) {
    super(`Failed to launch ${command[0] ?? '(empty command)'}: ${cause.message}`, { cause });
    this.command = [...command];
  }
}

function assertTimerDelay(name: string, ms: number): void {
  if (!Number.isFinite(ms) || ms < 0 || ms > MAX_TIMER_DELAY_MS) {
    throw new RangeError(`${name} must be between 0 and ${MAX_TIMER_DELAY_MS} ms, got ${ms}`);
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * One external process with a bounded wait.
 *
 * The deadline path and the owner-interrupt path both end in SIGINT followed by
 * a full drain of stdout/stderr; `cancellation` records which one came first.
 * Once cancelled, output pipes still open `killGraceMs + drainMs` later are
 * destroyed, so a grandchild holding them cannot stall the wait.
 */
export class SupervisedProcess {
  private readonly spawnImpl: SpawnImpl;
  private readonly killGraceMs: number;
  private readonly drainMs: number;

  private child: ChildProcess | null = null;
  private closed: Promise<ExitEvent> | null = null;
  private cancellation: CancellationReason | null = null;
  private escalationTimer: NodeJS.Timeout | null = null;
  private drainTimer: NodeJS.Timeout | null = null;
  private hasClosed = false;
  private state: ProcessState = 'unstarted';
  private stdout = '';
  private stderr = '';

  constructor(params: { spawn?: SpawnImpl; killGraceMs?: number; drainMs?: number } = {}) {
    this.spawnImpl = params.spawn ?? spawnDefault;
    this.killGraceMs = params.killGraceMs ?? 10_000;
    this.drainMs = params.drainMs ?? 5_000;
    assertTimerDelay('killGraceMs', this.killGraceMs);
    assertTimerDelay('drainMs', this.drainMs);
  }

  getState(): ProcessState {
    return this.state;
  }

  get pid(): number | null {
    return this.child?.pid ?? null;
  }

  async start(command: readonly string[], envOverlay: Readonly<Record<string, string>> = {}): Promise<void> {
    if (this.state !== 'unstarted') throw new Error(`process already ${this.state}`);
    const [file, ...args] = command;
    if (!file) throw new SpawnError(command, new Error('empty command'));

    let child: ChildProcess;
    try {
      child = this.spawnImpl(file, args, {
        env: { ...process.env, ...envOverlay },
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (err) {
      throw new SpawnError(command, toError(err));
    }

    child.stdout?.setEncoding('utf-8');
    child.stderr?.setEncoding('utf-8');
    child.stdout?.on('data', (chunk: string) => {
      this.stdout += chunk;
    });
    child.stderr?.on('data', (chunk: string) => {
      this.stderr += chunk;
    });

    const closed = new Promise<ExitEvent>((resolve) => {
      child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
        this.hasClosed = true;
        resolve({ code, signal });
      });
    });

    await new Promise<void>((resolve, reject) => {
      child.once('spawn', () => resolve());
      child.once('error', (err) => reject(new SpawnError(command, err)));
    });

    // Later errors (e.g. a failed kill) end up in the run's own log.
    child.on('error', (err) => {
      this.stderr += `\n[supervisor] ${err.message}\n`;
    });

    this.child = child;
    this.closed = closed;
    this.state = 'running';
  }

  /**
   * Waits for the process to exit, for `deadlineMs` to elapse, or for an owner
   * interrupt, whichever comes first. Always returns after the process has
   * exited and both output streams have closed.
   */
  async awaitCompletion(deadlineMs: number): Promise<CompletionResult> {
    const child = this.child;
    const closed = this.closed;
    if (!child || !closed || this.state !== 'running') {
      throw new Error(`cannot await a process that is ${this.state}`);
    }
    assertTimerDelay('deadlineMs', deadlineMs);

    let deadlineTimer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'deadline'>((resolve) => {
      deadlineTimer = setTimeout(() => resolve('deadline'), deadlineMs);
    });
    const first = await Promise.race([closed, deadline]);
    clearTimeout(deadlineTimer);
    if (first === 'deadline') this.requestInterrupt('deadline');

    const exit = await closed;
    this.clearTimers();

    const statusCode = exitCodeFromExitEvent(exit.code, exit.signal);
    const state: CompletionState =
      this.cancellation === 'deadline' ? 'timed_out' : this.cancellation === 'owner' ? 'interrupted' : 'completed';

    this.state = state;
    this.child = null;
    this.closed = null;
    return { state, statusCode, stdout: this.stdout, stderr: this.stderr };
  }

  /** Owner-initiated cancellation: SIGINT, then the process shuts down on its own. */
  interrupt(): void {
    this.requestInterrupt('owner');
  }

  /** Forced termination for out-of-band cleanup; leaves the cancellation reason untouched. */
  kill(): void {
    if (!this.child) return;
    signalProcess(this.child, 'SIGKILL');
  }

  private requestInterrupt(reason: CancellationReason): void {
    const child = this.child;
    if (!child || this.hasClosed) return;
    if (this.cancellation === null) this.cancellation = reason;

    if (this.drainTimer === null) {
      const drainAfterMs = Math.min(this.killGraceMs + this.drainMs, MAX_TIMER_DELAY_MS);
      this.drainTimer = setTimeout(() => {
        this.drainTimer = null;
        child.stdout?.destroy();
        child.stderr?.destroy();
      }, drainAfterMs);
    }

    if (!isProcessAlive(child)) return;
    signalProcess(child, 'SIGINT');

    if (this.escalationTimer === null) {
      this.escalationTimer = setTimeout(() => {
        this.escalationTimer = null;
        this.kill();
      }, this.killGraceMs);
    }
  }

  private clearTimers(): void {
    if (this.escalationTimer !== null) clearTimeout(this.escalationTimer);
    if (this.drainTimer !== null) clearTimeout(this.drainTimer);
    this.escalationTimer = null;
    this.drainTimer = null;
  }
}
