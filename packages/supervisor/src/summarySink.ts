import fs from 'node:fs/promises';
import path from 'node:path';

import { formatFileTimestamp } from './outcome.js';

export const SUMMARY_TIMESTAMP_TOKEN = '{timestamp}';

export function buildSummaryFileName(pattern: string, at: Date): string {
  return pattern.split(SUMMARY_TIMESTAMP_TOKEN).join(formatFileTimestamp(at));
}

/** `<dir>/summary-x.log` -> `<dir>/summary-x` */
export function deriveRunLogDir(summaryPath: string): string {
  const ext = path.extname(summaryPath);
  return path.join(path.dirname(summaryPath), path.basename(summaryPath, ext));
}

/**
 * Append-only session summary shared by every run. Appends are chained so that
 * concurrent runs never interleave partial lines.
 */
export class SummarySink {
  readonly filePath: string;
  readonly runLogDir: string;
  private tail: Promise<void> = Promise.resolve();
  private closed = false;

  private constructor(filePath: string) {
    this.filePath = filePath;
    this.runLogDir = deriveRunLogDir(filePath);
  }

  static async open(filePath: string): Promise<SummarySink> {
    const resolved = path.resolve(filePath);
    await fs.mkdir(path.dirname(resolved), { recursive: true });
    await fs.writeFile(resolved, '', { encoding: 'utf-8', flag: 'a' });
    return new SummarySink(resolved);
  }

  append(line: string): Promise<void> {
    if (this.closed) return Promise.reject(new Error(`summary sink is closed: ${this.filePath}`));
    const next = this.tail.then(() => fs.appendFile(this.filePath, `${line}\n`, 'utf-8'));
    // A failed write is reported to its caller only; later appends still run.
    this.tail = next.catch(() => undefined);
    return next;
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.tail;
  }
}
