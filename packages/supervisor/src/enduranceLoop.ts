import type { SupervisorConfig } from './config.js';
import { isPass, outcomeLabel, type Outcome } from './outcome.js';
import { PipelineRun } from './pipelineRun.js';
import type { SummarySink } from './summarySink.js';
import type { SpawnImpl } from './supervisedProcess.js';
import type { TestRecord } from './testRecords.js';

export type OutcomePair = readonly [first: Outcome, second: Outcome];

export type EnduranceStopReason = 'failure' | 'iteration_cap' | 'aborted';

export type EnduranceResult = Readonly<{
  testId: string;
  iterations: number;
  /** Outcomes of the last completed iteration; null if none completed. */
  outcomes: OutcomePair | null;
  stopReason: EnduranceStopReason;
}>;

export interface EnduranceLoopParams {
  record: TestRecord;
  sink: SummarySink;
  config: SupervisorConfig;
  spawn?: SpawnImpl;
  now?: () => Date;
  report?: (line: string) => void;
  /** Test hook. Left unset, the loop only ends on a non-pass outcome or an abort. */
  maxIterations?: number;
  signal?: AbortSignal;
}

export function formatIterationLine(iteration: number, outcomes: OutcomePair): string {
  const parts = outcomes.map((o) => `${o.runId}: ${outcomeLabel(o.kind)}`);
  return `[ITERATION ${iteration}] ${parts.join(' | ')}`;
}

async function startPair(runs: readonly [PipelineRun, PipelineRun], debugLevel: number): Promise<void> {
  const started = await Promise.allSettled(runs.map((run) => run.start(debugLevel)));
  const failure = started.find((s): s is PromiseRejectedResult => s.status === 'rejected');
  if (!failure) return;

  await Promise.all(runs.map((run) => run.abandon()));
  throw failure.reason;
}

async function runIteration(
  runs: readonly [PipelineRun, PipelineRun],
  debugLevel: number,
  signal: AbortSignal | undefined,
): Promise<OutcomePair> {
  await startPair(runs, debugLevel);

  const onAbort = (): void => {
    for (const run of runs) run.interrupt();
  };
  signal?.addEventListener('abort', onAbort, { once: true });
  if (signal?.aborted) onAbort();
  try {
    const [first, second] = runs;
    return await Promise.all([first.finish(), second.finish()]);
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * Runs the record's two commands side by side, again and again, until an
 * iteration produces a non-pass outcome. There is no success exit.
 */
export async function runEnduranceLoop(params: EnduranceLoopParams): Promise<EnduranceResult> {
  const { record, signal } = params;
  const report = params.report ?? ((line: string) => console.log(line));

  let iterations = 0;
  let outcomes: OutcomePair | null = null;
  const result = (stopReason: EnduranceStopReason): EnduranceResult => ({
    testId: record.testId,
    iterations,
    outcomes,
    stopReason,
  });

  while (true) {
    if (signal?.aborted) return result('aborted');
    if (params.maxIterations !== undefined && iterations >= params.maxIterations) return result('iteration_cap');

    const shared = { sink: params.sink, config: params.config, spawn: params.spawn, now: params.now };
    const runs = [
      new PipelineRun({ ...shared, runId: `${record.testId}-first`, commandTemplate: record.commandA }),
      new PipelineRun({ ...shared, runId: `${record.testId}-second`, commandTemplate: record.commandB }),
    ] as const;

    iterations += 1;
    outcomes = await runIteration(runs, record.debugLevel, signal);
    report(formatIterationLine(iterations, outcomes));
    if (!outcomes.every(isPass)) return result('failure');
  }
}
