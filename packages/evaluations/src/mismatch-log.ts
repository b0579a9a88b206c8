/**
 * JSON Lines log of cases the model got wrong
 */

import { open, readFile, type FileHandle } from 'fs/promises';
import { z } from 'zod';
import type { MismatchRecord } from '@watchlist-eval/core';

// Any JSON value the model returned, as long as the key is there
const JsonValue = z.unknown().refine((value): boolean => value !== undefined, { message: 'Required' });

const MismatchLineSchema = z.object({
  'SI. No': z.string(),
  'Transaction Data': z.string(),
  'High Risk Database Entry': z.string(),
  'High Risk Database Entry Type': z.string(),
  Expected: z.enum(['True Match', 'False Match']),
  Predicted: z.string(),
  Confidence: JsonValue,
  Reason: JsonValue,
  RecommendedAction: JsonValue,
});

type MismatchLine = z.infer<typeof MismatchLineSchema>;

export type MismatchDecode = { success: true; record: MismatchRecord } | { success: false; errors: string[] };

export function encodeMismatchRecord(record: MismatchRecord): string {
  const line: MismatchLine = {
    'SI. No': record.caseId,
    'Transaction Data': record.transactionData,
    'High Risk Database Entry': record.watchlistEntry,
    'High Risk Database Entry Type': record.watchlistType,
    Expected: record.expected,
    Predicted: record.predicted,
    Confidence: record.confidence,
    Reason: record.reason,
    RecommendedAction: record.recommendedAction,
  };

  return JSON.stringify(line);
}

export function decodeMismatchRecord(line: string): MismatchDecode {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (error: unknown) {
    return { success: false, errors: [error instanceof Error ? error.message : String(error)] };
  }

  const parsed = MismatchLineSchema.safeParse(json);
  if (!parsed.success) {
    return {
      success: false,
      errors: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
    };
  }

  const data = parsed.data;
  return {
    success: true,
    record: {
      caseId: data['SI. No'],
      transactionData: data['Transaction Data'],
      watchlistEntry: data['High Risk Database Entry'],
      watchlistType: data['High Risk Database Entry Type'],
      expected: data.Expected,
      predicted: data.Predicted,
      confidence: data.Confidence,
      reason: data.Reason,
      recommendedAction: data.RecommendedAction,
    },
  };
}

/**
 * Read a mismatch log back into records. Blank lines are skipped.
 */
export async function readMismatchLog(path: string): Promise<MismatchRecord[]> {
  const content = await readFile(path, 'utf-8');
  const records: MismatchRecord[] = [];

  content.split('\n').forEach((line, index) => {
    if (line.trim() === '') {
      return;
    }

    const decoded = decodeMismatchRecord(line);
    if (!decoded.success) {
      throw new Error(`Invalid mismatch record on line ${index + 1}: ${decoded.errors.join('; ')}`);
    }
    records.push(decoded.record);
  });

  return records;
}

/**
 * Append-only writer. The file is truncated on open; every record goes
 * straight to the file descriptor so a crash loses at most the current case.
 */
export class MismatchLog {
  private handle: FileHandle | null;

  private constructor(
    readonly path: string,
    handle: FileHandle,
  ) {
    this.handle = handle;
  }

  static async open(path: string): Promise<MismatchLog> {
    const handle = await open(path, 'w');
    return new MismatchLog(path, handle);
  }

  async append(record: MismatchRecord): Promise<void> {
    if (!this.handle) {
      throw new Error(`Mismatch log ${this.path} is closed`);
    }

    await this.handle.write(`${encodeMismatchRecord(record)}\n`);
  }

  async close(): Promise<void> {
    if (!this.handle) {
      return;
    }

    const handle = this.handle;
    this.handle = null;
    await handle.close();
  }
}
