import fs from 'node:fs/promises';
import path from 'node:path';

import type { SupervisorConfig } from './config.js';
import { runEnduranceLoop, type EnduranceResult } from './enduranceLoop.js';
import { buildSummaryFileName, SummarySink } from './summarySink.js';
import { SpawnError, type SpawnImpl } from './supervisedProcess.js';
import { parseTestRecords } from './testRecords.js';

export type RecordResult =
  | Readonly<{ testId: string; status: 'finished'; result: EnduranceResult }>
  | Readonly<{ testId: string; status: 'spawn_error'; error: SpawnError }>;

export type SessionResult = Readonly<{
  summaryPath: string;
  runLogDir: string;
  results: RecordResult[];
  skippedLines: number[];
  aborted: boolean;
}>;

export interface TestSessionParams {
  recordsPath: string;
  config: SupervisorConfig;
  spawn?: SpawnImpl;
  now?: () => Date;
  report?: (line: string) => void;
  signal?: AbortSignal;
  maxIterations?: number;
}

function isNodeError(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && 'code' in value;
}

export async function readTestRecordFile(recordsPath: string): Promise<string> {
  try {
    return await fs.readFile(recordsPath, 'utf-8');
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') throw new Error(`Test file not found: ${recordsPath}`, { cause: err });
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Cannot read test file ${recordsPath}: ${msg}`, { cause: err });
  }
}

/** Runs every record's endurance loop in file order against one session summary. */
export async function runTestSession(params: TestSessionParams): Promise<SessionResult> {
  const report = params.report ?? ((line: string) => console.log(line));
  const now = params.now ?? (() => new Date());

  const content = await readTestRecordFile(params.recordsPath);
  const { records, skippedLines } = parseTestRecords(content);
  for (const line of skippedLines) {
    report(`[SKIP] line ${line}: expected 4 fields separated by ':::'`);
  }

  const summaryPath = path.join(
    params.config.summaryDir,
    buildSummaryFileName(params.config.summaryFilePattern, now()),
  );
  const sink = await SummarySink.open(summaryPath);
  report(`[SESSION] summary=${sink.filePath} records=${records.length}`);

  const results: RecordResult[] = [];
  try {
    for (const record of records) {
      if (params.signal?.aborted) break;
      report(`[TEST] ${record.testId} debug=${record.debugLevel}`);
      try {
        const result = await runEnduranceLoop({
          record,
          sink,
          config: params.config,
          spawn: params.spawn,
          now,
          report,
          signal: params.signal,
          maxIterations: params.maxIterations,
        });
        results.push({ testId: record.testId, status: 'finished', result });
      } catch (err) {
        if (!(err instanceof SpawnError)) throw err;
        report(`[SPAWN_ERROR] ${record.testId}: ${err.message}`);
        results.push({ testId: record.testId, status: 'spawn_error', error: err });
      }
    }
  } finally {
    await sink.close();
  }

  return {
    summaryPath: sink.filePath,
    runLogDir: sink.runLogDir,
    results,
    skippedLines,
    aborted: params.signal?.aborted ?? false,
  };
}
