/**
 * Evaluation driver: runs every labeled case through the classifier,
 * keeps the accuracy tally and records mismatches as they happen.
 */

import {
  MatchOutcome,
  decodeExpectedLabel,
  decodeMatchOutcome,
  decodeMatchResult,
  isExpectedTrue,
  isPredictedTrue,
  outcomeFor,
  type EvaluationSummary,
  type LabelPolicy,
  type MatchResultError,
  type MismatchRecord,
  type TestCase,
} from '@watchlist-eval/core';
import { createScopedLogger, type Logger } from '@watchlist-eval/logger';
import type { MatchClassifier } from '@watchlist-eval/runtime';
import { readTestCases } from './case-reader.js';
import { MismatchLog } from './mismatch-log.js';
import { computeAccuracy, consoleWriter, formatCaseReport, formatSummary, type ReportWriter } from './report.js';

export type CaseClassifier = Pick<MatchClassifier, 'classify'>;

export interface EvaluationDriverOptions {
  mismatchLogPath: string;
  labelPolicy?: LabelPolicy;
  logger?: Logger;
  write?: ReportWriter;
}

function describeDecodeError(caseId: string, error: MatchResultError): string {
  switch (error.kind) {
    case 'missing-field':
      return `Missing field "${error.field}" in response for case ${caseId}`;
    case 'invalid-field':
      return error.field
        ? `Invalid field "${error.field}" in response for case ${caseId}`
        : `${error.message} in response for case ${caseId}`;
    case 'not-an-object':
      return `Response for case ${caseId} is not a JSON object`;
  }
}

export class EvaluationDriver {
  private classifier: CaseClassifier;
  private mismatchLogPath: string;
  private labelPolicy: LabelPolicy;
  private logger: Logger;
  private write: ReportWriter;

  constructor(classifier: CaseClassifier, options: EvaluationDriverOptions) {
    this.classifier = classifier;
    this.mismatchLogPath = options.mismatchLogPath;
    this.labelPolicy = options.labelPolicy ?? 'lenient';
    this.logger = options.logger ?? createScopedLogger('evaluation');
    this.write = options.write ?? consoleWriter;
  }

  /**
   * Evaluate every case in the input table, in file order.
   *
   * Skipped cases never reach the accuracy denominator. Service and input
   * errors abort the run; the mismatch log is closed either way.
   */
  async run(inputPath: string): Promise<EvaluationSummary> {
    const summary: EvaluationSummary = {
      total: 0,
      correct: 0,
      accuracy: 0,
      mismatches: [],
      skipped: [],
    };

    const log = await MismatchLog.open(this.mismatchLogPath);

    try {
      for await (const testCase of readTestCases(inputPath)) {
        await this.evaluateCase(testCase, log, summary);
      }
    } finally {
      await log.close();
    }

    summary.accuracy = computeAccuracy(summary.correct, summary.total);

    for (const line of formatSummary(summary, this.mismatchLogPath)) {
      this.write(line);
    }

    return summary;
  }

  private async evaluateCase(testCase: TestCase, log: MismatchLog, summary: EvaluationSummary): Promise<void> {
    const { caseId } = testCase;

    const expected = this.resolveExpected(testCase);
    if (expected === null) {
      this.skip(summary, caseId, `Unrecognized expected label "${testCase.matchLabel}" for case ${caseId}, skipping`);
      return;
    }

    this.logger.debug('Classifying case', { caseId });

    const classified = await this.classifier.classify(
      testCase.transactionData,
      testCase.watchlistEntry,
      testCase.watchlistType,
    );

    if (!classified.ok) {
      this.skip(summary, caseId, `Skipping case ${caseId} due to processing error`);
      return;
    }

    const decoded = decodeMatchResult(classified.response);
    if (!decoded.success) {
      this.skip(summary, caseId, describeDecodeError(caseId, decoded.error));
      return;
    }

    const result = decoded.result;

    const predicted = this.resolvePredicted(caseId, result.MatchOutcome);
    if (predicted === null) {
      this.skip(summary, caseId, `Unrecognized match outcome "${result.MatchOutcome}" for case ${caseId}, skipping`);
      return;
    }

    const correct = predicted === expected;
    summary.total++;

    if (correct) {
      summary.correct++;
    } else {
      const record: MismatchRecord = {
        caseId,
        transactionData: testCase.transactionData,
        watchlistEntry: testCase.watchlistEntry,
        watchlistType: testCase.watchlistType,
        expected: outcomeFor(expected),
        predicted: result.MatchOutcome,
        confidence: result.Confidence,
        reason: result.Reason,
        recommendedAction: result.RecommendedAction,
      };

      await log.append(record);
      summary.mismatches.push(record);
    }

    for (const line of formatCaseReport(testCase, expected, result, correct)) {
      this.write(line);
    }
  }

  /**
   * Returns null only under the strict policy, for a label outside TRUE/FALSE
   */
  private resolveExpected(testCase: TestCase): boolean | null {
    const decoded = decodeExpectedLabel(testCase.matchLabel);

    if (decoded.success) {
      return decoded.outcome === MatchOutcome.TrueMatch;
    }

    if (this.labelPolicy === 'strict') {
      return null;
    }

    this.logger.warn(`${decoded.error} for case ${testCase.caseId}, treating as False Match`, {
      caseId: testCase.caseId,
    });
    return isExpectedTrue(testCase.matchLabel);
  }

  private resolvePredicted(caseId: string, outcome: string): boolean | null {
    const decoded = decodeMatchOutcome(outcome);

    if (decoded.success) {
      return decoded.outcome === MatchOutcome.TrueMatch;
    }

    if (this.labelPolicy === 'strict') {
      return null;
    }

    this.logger.warn(`${decoded.error} for case ${caseId}, treating as False Match`, { caseId });
    return isPredictedTrue(outcome);
  }

  private skip(summary: EvaluationSummary, caseId: string, reason: string): void {
    this.logger.warn(reason, { caseId });
    summary.skipped.push({ caseId, reason });
  }
}
