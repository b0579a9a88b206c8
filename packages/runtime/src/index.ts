/**
 * @watchlist-eval/runtime - Model client, screening prompt, configuration
 */

export { ModelClient } from './model-client.js';
export { MatchClassifier } from './match-classifier.js';
export { ConfigLoader, HARNESS_CONFIG_FILE } from './config.js';
export { SCREENING_PROMPT, buildCaseMessage } from './prompts.js';
export * from './constants.js';

export type { CompletionRequest, CompletionResponse, TextGenerator } from './model-client.js';
export type { ClassifyResult, MatchClassifierOptions } from './match-classifier.js';
