/**
 * Core type definitions for test cases, evaluation results and configuration
 */

import type { MatchOutcome } from './labels.js';

// One labeled row of the input table
export interface TestCase {
  caseId: string;
  transactionData: string;
  watchlistEntry: string;
  watchlistType: string;
  matchLabel: string;
}

// Written to the mismatch log when a prediction disagrees with its label
export interface MismatchRecord {
  caseId: string;
  transactionData: string;
  watchlistEntry: string;
  watchlistType: string;
  expected: MatchOutcome;
  predicted: string;
  confidence: unknown;
  reason: unknown;
  recommendedAction: unknown;
}

export interface SkippedCase {
  caseId: string;
  reason: string;
}

export interface EvaluationSummary {
  total: number;
  correct: number;
  accuracy: number;
  mismatches: MismatchRecord[];
  skipped: SkippedCase[];
}

// Model API types
export interface ModelConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  baseURL?: string;
}

// How labels outside TRUE/FALSE and TRUE MATCH/FALSE MATCH are treated
export type LabelPolicy = 'lenient' | 'strict';

export interface EvaluationConfig {
  inputPath: string;
  mismatchLogPath: string;
  labelPolicy: LabelPolicy;
}
