import fs from 'node:fs/promises';
import path from 'node:path';

import { buildCommandVector } from './commandLine.js';
import type { SupervisorConfig } from './config.js';
import { classifyCompletion, formatOutcomeDump, formatSummaryLine, type Outcome } from './outcome.js';
import type { SummarySink } from './summarySink.js';
import { SupervisedProcess, type SpawnImpl } from './supervisedProcess.js';

export function sanitizeRunId(runId: string): string {
  const safe = runId.replace(/[^A-Za-z0-9._-]/g, '_').slice(0, 120);
  return safe || 'run';
}

export function runLogPath(runLogDir: string, runId: string): string {
  return path.join(runLogDir, `${sanitizeRunId(runId)}.log`);
}

export interface PipelineRunParams {
  runId: string;
  commandTemplate: string;
  sink: SummarySink;
  config: SupervisorConfig;
  spawn?: SpawnImpl;
  now?: () => Date;
}

/** One command template bound to one supervised process for a single iteration. */
export class PipelineRun {
  readonly runId: string;
  private readonly commandTemplate: string;
  private readonly sink: SummarySink;
  private readonly config: SupervisorConfig;
  private readonly spawnImpl: SpawnImpl | undefined;
  private readonly now: () => Date;

  private proc: SupervisedProcess | null = null;
  private command: readonly string[] = [];

  constructor(params: PipelineRunParams) {
    this.runId = params.runId;
    this.commandTemplate = params.commandTemplate;
    this.sink = params.sink;
    this.config = params.config;
    this.spawnImpl = params.spawn;
    this.now = params.now ?? (() => new Date());
  }

  async start(debugLevel: number): Promise<void> {
    if (this.proc) throw new Error(`${this.runId} already started`);
    this.command = buildCommandVector(this.config.invocation, this.commandTemplate);
    const proc = new SupervisedProcess({
      spawn: this.spawnImpl,
      killGraceMs: this.config.killGraceSec * 1000,
    });
    this.proc = proc;
    await proc.start(this.command, { [this.config.debugEnvVar]: String(debugLevel) });
  }

  async finish(): Promise<Outcome> {
    const proc = this.proc;
    if (!proc) throw new Error(`${this.runId} has not been started`);
    const result = await proc.awaitCompletion(this.config.timeoutSec * 1000);
    this.proc = null;

    const outcome = classifyCompletion(this.runId, this.command, result);
    await this.sink.append(formatSummaryLine(outcome, this.now()));
    await fs.mkdir(this.sink.runLogDir, { recursive: true });
    await fs.writeFile(runLogPath(this.sink.runLogDir, this.runId), formatOutcomeDump(outcome), 'utf-8');
    return outcome;
  }

  interrupt(): void {
    this.proc?.interrupt();
  }

  /** Kills a started run that will never be finished and waits for it to exit. Nothing is logged. */
  async abandon(): Promise<void> {
    const proc = this.proc;
    this.proc = null;
    if (!proc || proc.getState() !== 'running') return;
    proc.kill();
    await proc.awaitCompletion(this.config.timeoutSec * 1000);
  }
}
