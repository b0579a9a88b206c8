/**
 * Configuration loader
 *
 * Precedence, lowest first: built-in defaults, configs/harness.json,
 * environment variables. Credentials only ever come from the environment.
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { z } from 'zod';
import type { EvaluationConfig, ModelConfig } from '@watchlist-eval/core';
import {
  DEFAULT_INPUT_PATH,
  DEFAULT_MAX_TOKENS,
  DEFAULT_MISMATCH_LOG_PATH,
  DEFAULT_MODEL,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT_MS,
} from './constants.js';

export const HARNESS_CONFIG_FILE = 'harness.json';

const LabelPolicySchema = z.enum(['lenient', 'strict']);

const HarnessFileSchema = z
  .object({
    model: z
      .object({
        model: z.string().min(1).optional(),
        maxTokens: z.number().int().positive().optional(),
        temperature: z.number().min(0).max(1).optional(),
        timeoutMs: z.number().int().positive().optional(),
        baseURL: z.string().url().optional(),
      })
      .strict()
      .optional(),
    evaluation: z
      .object({
        inputPath: z.string().min(1).optional(),
        mismatchLogPath: z.string().min(1).optional(),
        labelPolicy: LabelPolicySchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_BASE_URL: z.string().url().optional(),
  MATCH_EVAL_MODEL: z.string().optional(),
  MATCH_EVAL_TEMPERATURE: z.coerce.number().min(0).max(1).optional(),
  MATCH_EVAL_MAX_TOKENS: z.coerce.number().int().positive().optional(),
  MATCH_EVAL_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  MATCH_EVAL_LABEL_POLICY: LabelPolicySchema.optional(),
});

type HarnessFile = z.infer<typeof HarnessFileSchema>;
type HarnessEnv = z.infer<typeof EnvSchema>;

function describeIssues(source: string, error: z.ZodError): string {
  const details = error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
  return `Invalid configuration in ${source}: ${details}`;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class ConfigLoader {
  private configDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(configDir: string = './configs', env: NodeJS.ProcessEnv = process.env) {
    this.configDir = configDir;
    this.env = env;
  }

  /**
   * Load model client configuration. Throws when the API key is absent.
   */
  async loadModelConfig(): Promise<ModelConfig> {
    const env = this.readEnv();

    if (!env.ANTHROPIC_API_KEY) {
      throw new Error('ANTHROPIC_API_KEY is not set. Please check your .env file or environment.');
    }

    const file = (await this.readHarnessFile()).model ?? {};

    const modelConfig: ModelConfig = {
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.MATCH_EVAL_MODEL ?? file.model ?? DEFAULT_MODEL,
      maxTokens: env.MATCH_EVAL_MAX_TOKENS ?? file.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: env.MATCH_EVAL_TEMPERATURE ?? file.temperature ?? DEFAULT_TEMPERATURE,
      timeoutMs: env.MATCH_EVAL_TIMEOUT_MS ?? file.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    };

    const baseURL = env.ANTHROPIC_BASE_URL ?? file.baseURL;
    if (baseURL !== undefined) {
      modelConfig.baseURL = baseURL;
    }

    return modelConfig;
  }

  /**
   * Load evaluation run configuration
   */
  async loadEvaluationConfig(): Promise<EvaluationConfig> {
    const env = this.readEnv();
    const file = (await this.readHarnessFile()).evaluation ?? {};

    return {
      inputPath: file.inputPath ?? DEFAULT_INPUT_PATH,
      mismatchLogPath: file.mismatchLogPath ?? DEFAULT_MISMATCH_LOG_PATH,
      labelPolicy: env.MATCH_EVAL_LABEL_POLICY ?? file.labelPolicy ?? 'lenient',
    };
  }

  /**
   * Load both configurations
   */
  async loadAll(): Promise<{ modelConfig: ModelConfig; evaluationConfig: EvaluationConfig }> {
    const [modelConfig, evaluationConfig] = await Promise.all([this.loadModelConfig(), this.loadEvaluationConfig()]);

    return { modelConfig, evaluationConfig };
  }

  private readEnv(): HarnessEnv {
    // Blank assignments in .env count as unset
    const present = Object.fromEntries(
      Object.entries(this.env).filter(([, value]) => value !== undefined && value.trim() !== ''),
    );

    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
      throw new Error(describeIssues('environment', parsed.error));
    }

    return parsed.data;
  }

  private async readHarnessFile(): Promise<HarnessFile> {
    const configPath = resolve(this.configDir, HARNESS_CONFIG_FILE);

    let content: string;
    try {
      content = await readFile(configPath, 'utf-8');
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return {};
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error: unknown) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new Error(`Config file is not valid JSON: ${configPath}: ${detail}`);
    }

    const parsed = HarnessFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(describeIssues(configPath, parsed.error));
    }

    return parsed.data;
  }
}
