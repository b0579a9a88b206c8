/**
 * Request/response adapter between a test case and the screening model
 */

import { createScopedLogger, type Logger } from '@watchlist-eval/logger';
import type { TextGenerator } from './model-client.js';
import { SCREENING_PROMPT, buildCaseMessage } from './prompts.js';

export type ClassifyResult =
  | { ok: true; response: unknown; raw: string }
  | { ok: false; failure: 'unparsable-response'; raw: string; detail: string };

export interface MatchClassifierOptions {
  systemPrompt?: string;
  logger?: Logger;
}

export class MatchClassifier {
  private generator: TextGenerator;
  private systemPrompt: string;
  private logger: Logger;

  constructor(generator: TextGenerator, options: MatchClassifierOptions = {}) {
    this.generator = generator;
    this.systemPrompt = options.systemPrompt ?? SCREENING_PROMPT;
    this.logger = options.logger ?? createScopedLogger('classifier');
  }

  /**
   * Ask the model for a verdict on one transaction/watchlist pair.
   *
   * The reply is parsed but not validated; service errors propagate.
   */
  async classify(transactionData: string, watchlistEntry: string, watchlistType: string): Promise<ClassifyResult> {
    const completion = await this.generator.complete({
      system: this.systemPrompt,
      user: buildCaseMessage(transactionData, watchlistEntry, watchlistType),
      jsonOnly: true,
    });

    const raw = completion.text;

    try {
      const response: unknown = JSON.parse(raw);
      return { ok: true, response, raw };
    } catch (error: unknown) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.warn('Failed to parse JSON response', { detail });
      return { ok: false, failure: 'unparsable-response', raw, detail };
    }
  }
}
