/**
 * @watchlist-eval/evaluations - Evaluation driver, case reader, mismatch log
 */

export { EvaluationDriver } from './evaluation-driver.js';
export { runCli } from './cli.js';
export { USAGE, parseArgs, applyCliOverrides, wantsHelp } from './cli-args.js';
export { readTestCases, parseCaseRow, isBlankRow, CASE_COLUMNS } from './case-reader.js';
export { MismatchLog, encodeMismatchRecord, decodeMismatchRecord, readMismatchLog } from './mismatch-log.js';
export { computeAccuracy, formatAccuracy, formatCaseReport, formatSummary, consoleWriter } from './report.js';

export type { CaseClassifier, EvaluationDriverOptions } from './evaluation-driver.js';
export type { CliDependencies, EvaluationRunner } from './cli.js';
export type { CliOptions } from './cli-args.js';
export type { MismatchDecode } from './mismatch-log.js';
export type { ReportWriter } from './report.js';
