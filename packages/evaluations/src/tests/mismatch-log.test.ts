import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { MismatchRecord } from '@watchlist-eval/core';
import { MismatchLog, decodeMismatchRecord, encodeMismatchRecord, readMismatchLog } from '../mismatch-log.js';

const record: MismatchRecord = {
  caseId: '5',
  transactionData: 'Remittance to Karim ibn Faysal al-Nadri',
  watchlistEntry: 'Karim Faysal Al Nadri',
  watchlistType: 'Person',
  expected: 'True Match',
  predicted: 'False Match',
  confidence: 'Medium',
  reason: {
    TypeValidation: 'Pass',
    NormalizationSteps: 'Dropped ibn connector, lowercased',
    AppliedCriteria: 'Only two of three components aligned',
    AnomaliesNoted: 'Patronymic structure',
  },
  recommendedAction: 'Allow & Log',
};

describe('encodeMismatchRecord', () => {
  it('writes the log keys in record order', () => {
    expect(encodeMismatchRecord({ ...record, reason: { TypeValidation: 'Pass' } })).toBe(
      '{"SI. No":"5","Transaction Data":"Remittance to Karim ibn Faysal al-Nadri",' +
        '"High Risk Database Entry":"Karim Faysal Al Nadri","High Risk Database Entry Type":"Person",' +
        '"Expected":"True Match","Predicted":"False Match","Confidence":"Medium",' +
        '"Reason":{"TypeValidation":"Pass"},"RecommendedAction":"Allow & Log"}',
    );
  });

  it('decodes back to the same record', () => {
    expect(decodeMismatchRecord(encodeMismatchRecord(record))).toEqual({ success: true, record });
  });
});

describe('decodeMismatchRecord', () => {
  it('rejects a line that is not JSON', () => {
    const decoded = decodeMismatchRecord('{"SI. No":');

    expect(decoded.success).toBe(false);
  });

  it('keeps non-string confidence, reason and action values', () => {
    const loose: MismatchRecord = { ...record, confidence: 0.4, reason: 'names differ', recommendedAction: null };

    expect(decodeMismatchRecord(encodeMismatchRecord(loose))).toEqual({ success: true, record: loose });
  });

  it('rejects a line without Confidence', () => {
    const line = encodeMismatchRecord(record).replace('"Confidence":"Medium",', '');
    const decoded = decodeMismatchRecord(line);

    expect(decoded).toEqual({ success: false, errors: ['Confidence: Required'] });
  });

  it('rejects an expected label outside the enumeration', () => {
    const line = encodeMismatchRecord(record).replace('"Expected":"True Match"', '"Expected":"Maybe"');
    const decoded = decodeMismatchRecord(line);

    expect(decoded.success).toBe(false);
    if (!decoded.success) {
      expect(decoded.errors[0]).toMatch(/^Expected: /);
    }
  });
});

describe('MismatchLog', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'watchlist-eval-log-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('appends one line per record and reads them back', async () => {
    const path = join(workDir, 'mismatches.jsonl');
    const log = await MismatchLog.open(path);

    await log.append(record);
    await log.append({ ...record, caseId: '6', expected: 'False Match', predicted: 'True Match' });
    await log.close();

    const content = await readFile(path, 'utf-8');
    expect(content.split('\n')).toHaveLength(3);

    const records = await readMismatchLog(path);
    expect(records.map((r) => [r.caseId, r.expected])).toEqual([
      ['5', 'True Match'],
      ['6', 'False Match'],
    ]);
  });

  it('refuses to append after close and tolerates a second close', async () => {
    const path = join(workDir, 'closed.jsonl');
    const log = await MismatchLog.open(path);

    await log.close();
    await log.close();

    await expect(log.append(record)).rejects.toThrow(`Mismatch log ${path} is closed`);
  });

  it('reports the line number of a corrupt entry', async () => {
    const path = join(workDir, 'corrupt.jsonl');
    await writeFile(path, `${encodeMismatchRecord(record)}\n\n{"SI. No":"7"}\n`, 'utf-8');

    await expect(readMismatchLog(path)).rejects.toThrow(/^Invalid mismatch record on line 3: /);
  });
});
