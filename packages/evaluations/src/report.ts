/**
 * Human-readable console report for an evaluation run
 */

import { outcomeFor, type EvaluationSummary, type MatchResult, type TestCase } from '@watchlist-eval/core';

export type ReportWriter = (line: string) => void;

export const consoleWriter: ReportWriter = (line) => console.log(line);

const SEPARATOR = '-'.repeat(80);

export function computeAccuracy(correct: number, total: number): number {
  return total > 0 ? (correct / total) * 100 : 0;
}

export function formatAccuracy(accuracy: number): string {
  return `${accuracy.toFixed(2)}%`;
}

// Strings print bare; numbers, lists and objects print as JSON
function displayValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export function formatCaseReport(testCase: TestCase, expected: boolean, result: MatchResult, correct: boolean): string[] {
  return [
    `Case ${testCase.caseId}: ${correct ? '✓ CORRECT' : '✗ INCORRECT'}`,
    `Transaction: ${testCase.transactionData}`,
    `Watchlist: ${testCase.watchlistEntry} (${testCase.watchlistType})`,
    `Expected: ${outcomeFor(expected)}`,
    `Predicted: ${result.MatchOutcome} (Confidence: ${displayValue(result.Confidence)})`,
    `Reason: ${JSON.stringify(result.Reason)}`,
    SEPARATOR,
  ];
}

export function formatSummary(summary: EvaluationSummary, mismatchLogPath: string): string[] {
  const lines = [
    '',
    `Final Accuracy: ${formatAccuracy(summary.accuracy)} (${summary.correct}/${summary.total} correct)`,
  ];

  if (summary.skipped.length > 0) {
    lines.push(`Skipped cases: ${summary.skipped.length}`);
  }

  lines.push(`Mismatched cases saved to: ${mismatchLogPath}`);
  return lines;
}
