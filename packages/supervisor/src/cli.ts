import path from 'node:path';
import { parseArgs } from 'node:util';

import { readDotenvFile, resolveSupervisorConfig } from './config.js';
import type { SpawnImpl } from './supervisedProcess.js';
import { runTestSession, type SessionResult } from './testDriver.js';

function usage(): string {
  return [
    'Usage:',
    '  pipesoak --tests <file> [--summary-dir <dir>] [--timeout <sec>] [--invocation <pattern>]',
    '',
    'Runs both commands of every test record side by side until one of them stops passing.',
    '',
    'Options:',
    "  -t, --tests <file>         Test records: testId ::: commandA ::: commandB ::: debugLevel",
    '  --summary-dir <dir>        Directory for the session summary (default: PIPESOAK_SUMMARY_DIR or .)',
    '  --timeout <sec>            Deadline per run in seconds (default: PIPESOAK_TIMEOUT_SEC or 120)',
    "  --invocation <pattern>     Outer command pattern with %s (default: 'gst-launch-1.0 %s')",
    '  -h, --help                 Show this help message',
    '',
  ].join('\n');
}

function parseTimeout(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`Invalid timeout value: "${value}" must be a positive number of seconds`);
  }
  return n;
}

export interface MainDeps {
  env?: NodeJS.ProcessEnv;
  /** Directory whose `.env` supplies `PIPESOAK_*` fallbacks; defaults to the working directory. */
  cwd?: string;
  signal?: AbortSignal;
  spawn?: SpawnImpl;
  now?: () => Date;
  report?: (line: string) => void;
}

export async function main(argv: string[], deps: MainDeps = {}): Promise<SessionResult | null> {
  const { values } = parseArgs({
    args: argv,
    options: {
      tests: { type: 'string', short: 't' },
      'summary-dir': { type: 'string' },
      timeout: { type: 'string' },
      invocation: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: false,
  });

  if (values.help) {
    console.log(usage());
    return null;
  }

  const recordsPath = values.tests?.trim();
  if (!recordsPath) throw new Error(`--tests is required\n\n${usage()}`);

  const dotenv = await readDotenvFile(path.join(deps.cwd ?? process.cwd(), '.env'));
  const config = resolveSupervisorConfig({
    env: deps.env,
    dotenv,
    overrides: {
      summaryDir: values['summary-dir'],
      timeoutSec: values.timeout === undefined ? undefined : parseTimeout(values.timeout),
      invocation: values.invocation,
    },
  });

  const session = await runTestSession({
    recordsPath,
    config,
    spawn: deps.spawn,
    now: deps.now,
    report: deps.report,
    signal: deps.signal,
  });

  const spawnErrors = session.results.filter((r) => r.status === 'spawn_error');
  if (spawnErrors.length > 0) {
    throw new Error(`${spawnErrors.length} test(s) could not be launched: ${spawnErrors.map((r) => r.testId).join(', ')}`);
  }
  return session;
}

// Intentionally no side-effectful entrypoint here; see `src/bin.ts`.
