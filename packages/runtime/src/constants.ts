/**
 * Runtime configuration defaults
 */

export const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';

/**
 * Low sampling temperature keeps verdicts close to deterministic across runs
 */
export const DEFAULT_TEMPERATURE = 0.1;

export const DEFAULT_MAX_TOKENS = 1024;

/**
 * Upper bound on a single classification request (milliseconds)
 */
export const DEFAULT_TIMEOUT_MS = 60_000;

export const DEFAULT_INPUT_PATH = 'data/watchlist-cases.csv';

export const DEFAULT_MISMATCH_LOG_PATH = 'mismatches.jsonl';

/**
 * Assistant prefill that forces the reply to start as a JSON object
 */
export const JSON_PREFILL = '{';
