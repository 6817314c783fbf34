import { z } from 'zod';

export const RECORD_DELIMITER = ':::';
export const RECORD_FIELD_COUNT = 4;

export type TestRecord = Readonly<{
  testId: string;
  commandA: string;
  commandB: string;
  debugLevel: number;
}>;

export class TestRecordError extends Error {
  override name = 'TestRecordError';
  readonly line: number;

  constructor(line: number, message: string) {
    super(`line ${line}: ${message}`);
    this.line = line;
  }
}

const testRecordSchema = z.object({
  testId: z.string().min(1, 'test id is empty'),
  commandA: z.string().min(1, 'first command is empty'),
  commandB: z.string().min(1, 'second command is empty'),
  debugLevel: z
    .string()
    .regex(/^-?\d+$/, 'debug level must be an integer')
    .transform((v) => Number(v)),
});

export type ParsedTestRecords = Readonly<{
  records: TestRecord[];
  /** 1-based numbers of non-blank lines without exactly four fields. */
  skippedLines: number[];
}>;

export function parseTestRecords(content: string): ParsedTestRecords {
  const records: TestRecord[] = [];
  const skippedLines: number[] = [];

  content.split(/\r?\n/).forEach((line, idx) => {
    const lineNumber = idx + 1;
    const fields = line.split(RECORD_DELIMITER).map((f) => f.trim());
    if (fields.length !== RECORD_FIELD_COUNT) {
      if (line.trim()) skippedLines.push(lineNumber);
      return;
    }

    const [testId, commandA, commandB, debugLevel] = fields;
    const parsed = testRecordSchema.safeParse({ testId, commandA, commandB, debugLevel });
    if (!parsed.success) {
      throw new TestRecordError(lineNumber, parsed.error.issues.map((issue) => issue.message).join('; '));
    }
    records.push(parsed.data);
  });

  return { records, skippedLines };
}
