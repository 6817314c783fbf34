import type { ChildProcess, SpawnOptions } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';

import type { SpawnImpl } from './supervisedProcess.js';

/** Scripted behaviour of one fake child process. */
export type FakeBehavior = Readonly<{
  stdout?: string;
  stderr?: string;
  /** Exit on its own after this many ms; omitted means run until signalled. */
  exitAfterMs?: number;
  exitCode?: number;
  /** SIGINT handler exits with this code instead of dying by the signal. */
  sigintExitCode?: number;
  ignoreSigint?: boolean;
  /** Keep stdout/stderr open after exit, as a grandchild holding the pipes would. */
  holdOutputAfterExit?: boolean;
  /** Fail to launch with this errno code (e.g. ENOENT). */
  spawnErrorCode?: string;
}>;

export type FakeSpawnCall = Readonly<{
  file: string;
  args: readonly string[];
  env: NodeJS.ProcessEnv;
  child: FakeChild;
}>;

export class FakeChild extends EventEmitter {
  pid = 4242;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  stdin = null;
  stdout = new PassThrough();
  stderr = new PassThrough();
  readonly signals: NodeJS.Signals[] = [];
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly behavior: FakeBehavior) {
    super();
  }

  launch(): void {
    if (this.behavior.spawnErrorCode) {
      const err = Object.assign(new Error(`spawn fake ${this.behavior.spawnErrorCode}`), {
        code: this.behavior.spawnErrorCode,
      });
      setImmediate(() => {
        this.emit('error', err);
        this.finish(-2, null);
      });
      return;
    }

    setImmediate(() => {
      this.emit('spawn');
      if (this.behavior.stdout) this.stdout.write(this.behavior.stdout);
      if (this.behavior.stderr) this.stderr.write(this.behavior.stderr);
      if (this.behavior.exitAfterMs !== undefined) {
        this.timer = setTimeout(() => this.finish(this.behavior.exitCode ?? 0, null), this.behavior.exitAfterMs);
      }
    });
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signals.push(signal);
    if (this.exitCode !== null || this.signalCode !== null) return false;
    if (signal === 'SIGINT' && this.behavior.ignoreSigint) return true;
    if (signal === 'SIGINT' && this.behavior.sigintExitCode !== undefined) {
      setTimeout(() => this.finish(this.behavior.sigintExitCode ?? 0, null), 5);
      return true;
    }
    setImmediate(() => this.finish(null, signal));
    return true;
  }

  get alive(): boolean {
    return this.exitCode === null && this.signalCode === null;
  }

  private finish(code: number | null, signal: NodeJS.Signals | null): void {
    if (!this.alive) return;
    if (this.timer) clearTimeout(this.timer);
    this.exitCode = code;
    this.signalCode = signal;
    this.emit('exit', code, signal);
    if (this.behavior.holdOutputAfterExit) {
      let open = 2;
      const onStreamClose = (): void => {
        open -= 1;
        if (open === 0) this.emit('close', code, signal);
      };
      this.stdout.once('close', onStreamClose);
      this.stderr.once('close', onStreamClose);
      return;
    }
    this.stdout.end();
    this.stderr.end();
    setImmediate(() => this.emit('close', code, signal));
  }
}

export function fakeSpawn(behaviorFor: (file: string, args: readonly string[]) => FakeBehavior): {
  spawn: SpawnImpl;
  calls: FakeSpawnCall[];
} {
  const calls: FakeSpawnCall[] = [];
  const spawn: SpawnImpl = (file: string, args: readonly string[], options: SpawnOptions) => {
    const child = new FakeChild(behaviorFor(file, args));
    calls.push({ file, args: [...args], env: options.env ?? {}, child });
    child.launch();
    return child as unknown as ChildProcess;
  };
  return { spawn, calls };
}
