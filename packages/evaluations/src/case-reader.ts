/**
 * Streams labeled test cases from the input CSV, one per data row, in file order
 */

import { createReadStream } from 'fs';
import csv from 'csv-parser';
import { z } from 'zod';
import type { TestCase } from '@watchlist-eval/core';

export const CASE_COLUMNS = {
  caseId: 'SI. No',
  transactionData: 'Transaction Data',
  watchlistEntry: 'High Risk Database Entry',
  watchlistType: 'High Risk Database Entry Type',
  matchLabel: 'Match Type',
} as const;

const CaseRowSchema = z.object({
  [CASE_COLUMNS.caseId]: z.string(),
  [CASE_COLUMNS.transactionData]: z.string(),
  [CASE_COLUMNS.watchlistEntry]: z.string(),
  [CASE_COLUMNS.watchlistType]: z.string(),
  [CASE_COLUMNS.matchLabel]: z.string(),
});

export function parseCaseRow(row: unknown, rowNumber: number): TestCase {
  const parsed = CaseRowSchema.safeParse(row);

  if (!parsed.success) {
    const column = parsed.error.errors[0].path.join('.');
    throw new Error(`Row ${rowNumber}: missing column "${column}"`);
  }

  const data = parsed.data;
  return {
    caseId: data[CASE_COLUMNS.caseId],
    transactionData: data[CASE_COLUMNS.transactionData],
    watchlistEntry: data[CASE_COLUMNS.watchlistEntry],
    watchlistType: data[CASE_COLUMNS.watchlistType],
    matchLabel: data[CASE_COLUMNS.matchLabel],
  };
}

// A blank line parses to a row with no cells, or with only empty ones
export function isBlankRow(row: unknown): boolean {
  return typeof row === 'object' && row !== null && Object.values(row).every((cell) => cell === '');
}

/**
 * Read test cases lazily so each row is only parsed when the run reaches it.
 * Blank lines are skipped. Read errors and malformed rows reject the iteration.
 */
export async function* readTestCases(inputPath: string): AsyncGenerator<TestCase> {
  const parser = csv({
    mapHeaders: ({ header }) => header.replace(/^\uFEFF/, '').trim(),
  });

  const source = createReadStream(inputPath);
  // pipe() does not forward source errors on its own
  source.on('error', (error) => parser.destroy(error));
  source.pipe(parser);

  let rowNumber = 0;
  try {
    for await (const row of parser) {
      if (isBlankRow(row)) {
        continue;
      }
      rowNumber++;
      yield parseCaseRow(row, rowNumber);
    }
  } finally {
    source.destroy();
    parser.destroy();
  }
}
