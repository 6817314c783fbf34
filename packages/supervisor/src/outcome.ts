import { quote } from 'shell-quote';

import type { CompletionResult } from './supervisedProcess.js';

export const outcomeKinds = ['pass', 'timeout', 'killed', 'error'] as const;
export type OutcomeKind = (typeof outcomeKinds)[number];

export type Outcome = Readonly<{
  kind: OutcomeKind;
  runId: string;
  command: readonly string[];
  stdout: string;
  stderr: string;
  /** Exit status of the process; null on pass. */
  statusCode: number | null;
}>;

export function outcomeLabel(kind: OutcomeKind): string {
  return kind.toUpperCase();
}

export function isPass(outcome: Outcome): boolean {
  return outcome.kind === 'pass';
}

export function classifyCompletion(runId: string, command: readonly string[], result: CompletionResult): Outcome {
  const base = { runId, command: [...command], stdout: result.stdout, stderr: result.stderr };
  switch (result.state) {
    case 'timed_out':
      return { ...base, kind: 'timeout', statusCode: result.statusCode };
    case 'interrupted':
      return { ...base, kind: 'killed', statusCode: result.statusCode };
    case 'completed':
      if (result.statusCode === 0) return { ...base, kind: 'pass', statusCode: null };
      return { ...base, kind: 'error', statusCode: result.statusCode };
  }
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as `YYYY-MM-DD-HH:MM`. */
export function formatSummaryTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  return `${day}-${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

/** Local time as `YYYYMMDD-HHMMSS`, used in summary file names. */
export function formatFileTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  return `${day}-${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
}

export function formatSummaryLine(outcome: Outcome, at: Date): string {
  return `${outcome.runId} : ${outcomeLabel(outcome.kind)} : ${formatSummaryTimestamp(at)}`;
}

function withTrailingNewline(text: string): string {
  if (text.length === 0 || text.endsWith('\n')) return text;
  return `${text}\n`;
}

export function formatOutcomeDump(outcome: Outcome): string {
  return [
    `=== ${outcomeLabel(outcome.kind)} ===\n`,
    `run: ${outcome.runId}\n`,
    `command: ${quote([...outcome.command])}\n`,
    `status: ${outcome.statusCode === null ? 'n/a' : String(outcome.statusCode)}\n`,
    '\n',
    '--- stdout ---\n',
    withTrailingNewline(outcome.stdout),
    '--- stderr ---\n',
    withTrailingNewline(outcome.stderr),
  ].join('');
}
