import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { resolveSupervisorConfig, type SupervisorConfig } from './config.js';
import { formatIterationLine, runEnduranceLoop } from './enduranceLoop.js';
import { classifyCompletion } from './outcome.js';
import { SummarySink } from './summarySink.js';
import { SpawnError } from './supervisedProcess.js';
import { fakeSpawn, type FakeBehavior } from './testFakeChild.js';
import type { TestRecord } from './testRecords.js';

const fixedNow = () => new Date(2026, 9, 19, 9, 0, 0);

const record: TestRecord = { testId: 'T1', commandA: '--first', commandB: '--second', debugLevel: 2 };

async function readLines(filePath: string): Promise<string[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  return content.split('\n').filter(Boolean);
}

describe('runEnduranceLoop', () => {
  let tmp: string;
  let sink: SummarySink;
  let config: SupervisorConfig;
  let reported: string[];

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'pipesoak-loop-'));
    sink = await SummarySink.open(path.join(tmp, 'summary-loop.log'));
    config = resolveSupervisorConfig({
      env: {},
      overrides: { invocation: 'fakecmd %s', timeoutSec: 0.1, killGraceSec: 0.05, summaryDir: tmp },
    });
    reported = [];
  });

  afterEach(async () => {
    await sink.close();
  });

  /** Behaviour per command template and 1-based iteration. */
  function scripted(behaviorFor: (role: string, iteration: number) => FakeBehavior) {
    const seen = new Map<string, number>();
    return fakeSpawn((_file, args) => {
      const role = args[0] ?? '';
      const iteration = (seen.get(role) ?? 0) + 1;
      seen.set(role, iteration);
      return behaviorFor(role, iteration);
    });
  }

  function loop(spawn: ReturnType<typeof fakeSpawn>['spawn'], extra: { maxIterations?: number; signal?: AbortSignal } = {}) {
    return runEnduranceLoop({
      record,
      sink,
      config,
      spawn,
      now: fixedNow,
      report: (line) => reported.push(line),
      ...extra,
    });
  }

  it('keeps iterating while both runs pass and only stops at the injected cap', async () => {
    const { spawn, calls } = scripted(() => ({ exitAfterMs: 1, exitCode: 0 }));
    const result = await loop(spawn, { maxIterations: 25 });

    expect(result.stopReason).toBe('iteration_cap');
    expect(result.iterations).toBe(25);
    expect(result.outcomes?.map((o) => o.kind)).toEqual(['pass', 'pass']);
    expect(calls).toHaveLength(50);
    expect(reported).toHaveLength(25);
    expect(reported[24]).toBe('[ITERATION 25] T1-first: PASS | T1-second: PASS');

    const lines = await readLines(sink.filePath);
    expect(lines).toHaveLength(50);
    expect(new Set(lines)).toEqual(new Set(['T1-first : PASS : 2026-10-19-09:00', 'T1-second : PASS : 2026-10-19-09:00']));
  });

  it('stops after exactly the iteration in which a run fails', async () => {
    const { spawn } = scripted((role, iteration) =>
      role === '--second' && iteration === 3 ? { exitAfterMs: 1, exitCode: 2 } : { exitAfterMs: 1, exitCode: 0 },
    );
    const result = await loop(spawn, { maxIterations: 100 });

    expect(result.stopReason).toBe('failure');
    expect(result.iterations).toBe(3);
    expect(result.outcomes?.map((o) => o.kind)).toEqual(['pass', 'error']);
    expect(reported).toEqual([
      '[ITERATION 1] T1-first: PASS | T1-second: PASS',
      '[ITERATION 2] T1-first: PASS | T1-second: PASS',
      '[ITERATION 3] T1-first: PASS | T1-second: ERROR',
    ]);
    expect(await readLines(sink.filePath)).toHaveLength(6);
  });

  it('passes the record debug level to both runs', async () => {
    const { spawn, calls } = scripted(() => ({ exitAfterMs: 1, exitCode: 1 }));
    await loop(spawn);

    expect(calls.map((c) => c.env.GST_DEBUG)).toEqual(['2', '2']);
  });

  it('lets the other run finish when one fails early', async () => {
    const { spawn, calls } = scripted((role) =>
      role === '--first' ? { exitAfterMs: 1, exitCode: 7 } : { stdout: 'still going\n', exitAfterMs: 40, exitCode: 0 },
    );
    const result = await loop(spawn);

    expect(result.iterations).toBe(1);
    expect(result.outcomes?.[0]).toMatchObject({ runId: 'T1-first', kind: 'error', statusCode: 7 });
    expect(result.outcomes?.[1]).toMatchObject({ runId: 'T1-second', kind: 'pass', stdout: 'still going\n' });
    expect(calls.every((c) => c.child.signals.length === 0)).toBe(true);
  });

  it('stops after one iteration when the second run times out, leaving no process behind', async () => {
    const { spawn, calls } = scripted((role) => (role === '--first' ? { exitAfterMs: 1, exitCode: 0 } : {}));
    const result = await loop(spawn);

    expect(result.stopReason).toBe('failure');
    expect(result.iterations).toBe(1);
    expect(result.outcomes?.map((o) => o.kind)).toEqual(['pass', 'timeout']);
    expect(calls.map((c) => c.child.alive)).toEqual([false, false]);
    expect(reported).toEqual(['[ITERATION 1] T1-first: PASS | T1-second: TIMEOUT']);
    expect(await readLines(sink.filePath)).toEqual(
      expect.arrayContaining(['T1-first : PASS : 2026-10-19-09:00', 'T1-second : TIMEOUT : 2026-10-19-09:00']),
    );
  });

  it('abandons the started run when its partner cannot be spawned', async () => {
    const { spawn, calls } = scripted((role) => (role === '--second' ? { spawnErrorCode: 'ENOENT' } : {}));

    await expect(loop(spawn)).rejects.toBeInstanceOf(SpawnError);
    expect(calls[0]?.child.signals).toEqual(['SIGKILL']);
    expect(calls[0]?.child.alive).toBe(false);
    expect(reported).toEqual([]);
    expect(await readLines(sink.filePath)).toEqual([]);
  });

  it('turns an abort into owner interrupts, classified as killed', async () => {
    const { spawn, calls } = scripted(() => ({ sigintExitCode: 130 }));
    const controller = new AbortController();
    const pending = loop(spawn, { signal: controller.signal });
    setTimeout(() => controller.abort(), 10);
    const result = await pending;

    expect(result.stopReason).toBe('failure');
    expect(result.outcomes?.map((o) => o.kind)).toEqual(['killed', 'killed']);
    expect(calls.map((c) => c.child.signals)).toEqual([['SIGINT'], ['SIGINT']]);
  });

  it('does not start an iteration once aborted', async () => {
    const { spawn, calls } = scripted(() => ({ exitAfterMs: 1, exitCode: 0 }));
    const controller = new AbortController();
    controller.abort();
    const result = await loop(spawn, { signal: controller.signal });

    expect(result).toEqual({ testId: 'T1', iterations: 0, outcomes: null, stopReason: 'aborted' });
    expect(calls).toHaveLength(0);
  });
});

describe('formatIterationLine', () => {
  it('lists both runs with their outcome kinds', () => {
    const pass = classifyCompletion('A-first', ['x'], { state: 'completed', statusCode: 0, stdout: '', stderr: '' });
    const killed = classifyCompletion('A-second', ['x'], { state: 'interrupted', statusCode: 130, stdout: '', stderr: '' });
    expect(formatIterationLine(4, [pass, killed])).toBe('[ITERATION 4] A-first: PASS | A-second: KILLED');
  });
});
