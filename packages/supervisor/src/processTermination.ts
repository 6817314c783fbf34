import os from 'node:os';

export interface ProcessSignalTarget {
  pid?: number | null;
  exitCode: number | null;
  signalCode: NodeJS.Signals | null;
  kill: (signal?: NodeJS.Signals) => boolean;
}

export function isProcessAlive(proc: ProcessSignalTarget): boolean {
  return proc.exitCode === null && proc.signalCode === null;
}

/**
 * Best-effort signal delivery.
 * Returns false when the process has already exited or the OS refused the signal.
 */
export function signalProcess(proc: ProcessSignalTarget, signal: NodeJS.Signals): boolean {
  if (!isProcessAlive(proc)) return false;
  try {
    return proc.kill(signal);
  } catch {
    // ESRCH between the liveness check and kill(): the exit event settles the run.
    return false;
  }
}

/** Shell-style status for an exit event: the code itself, or 128 + signal number. */
export function exitCodeFromExitEvent(code: number | null, signal: NodeJS.Signals | null): number {
  if (typeof code === 'number') return code;
  if (signal) {
    const entry = Object.entries(os.constants.signals).find(([name]) => name === signal);
    if (entry) return 128 + entry[1];
    return 1;
  }
  return 0;
}
