import { describe, expect, it } from 'vitest';

import { parseTestRecords, TestRecordError } from './testRecords.js';

describe('parseTestRecords', () => {
  it('parses delimiter-separated records and trims fields', () => {
    const parsed = parseTestRecords(
      [
        'T1:::fakecmd --ok:::fakecmd --ok:::0',
        'T2 ::: videotestsrc ! fakesink ::: audiotestsrc ! fakesink ::: 3',
      ].join('\n'),
    );
    expect(parsed.records).toEqual([
      { testId: 'T1', commandA: 'fakecmd --ok', commandB: 'fakecmd --ok', debugLevel: 0 },
      { testId: 'T2', commandA: 'videotestsrc ! fakesink', commandB: 'audiotestsrc ! fakesink', debugLevel: 3 },
    ]);
    expect(parsed.skippedLines).toEqual([]);
  });

  it('skips lines with any other field count without raising', () => {
    const parsed = parseTestRecords(
      [
        '# header comment',
        'T1:::a:::b',
        '',
        'T2:::a:::b:::1:::extra',
        'T3:::a:::b:::2',
        '',
      ].join('\r\n'),
    );
    expect(parsed.records.map((r) => r.testId)).toEqual(['T3']);
    expect(parsed.skippedLines).toEqual([1, 2, 4]);
  });

  it('rejects a four-field record with a non-integer debug level', () => {
    expect(() => parseTestRecords('T1:::a:::b:::1\nT2:::a:::b:::high')).toThrow(
      new TestRecordError(2, 'debug level must be an integer'),
    );
  });

  it('rejects a four-field record with an empty field', () => {
    try {
      parseTestRecords('T1::: :::b:::1');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(TestRecordError);
      expect((err as TestRecordError).line).toBe(1);
      expect((err as TestRecordError).message).toBe('line 1: first command is empty');
    }
  });
});
