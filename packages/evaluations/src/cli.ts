/**
 * Evaluation runner: loads configuration, wires the classifier and runs the driver.
 * Returns the process exit code instead of exiting so it can run in tests.
 */

import type { EvaluationSummary, ModelConfig } from '@watchlist-eval/core';
import { ConfigLoader, MatchClassifier, ModelClient } from '@watchlist-eval/runtime';
import { USAGE, applyCliOverrides, parseArgs, wantsHelp } from './cli-args.js';
import { EvaluationDriver, type EvaluationDriverOptions } from './evaluation-driver.js';
import type { ReportWriter } from './report.js';

export interface EvaluationRunner {
  run(inputPath: string): Promise<EvaluationSummary>;
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  out?: ReportWriter;
  err?: ReportWriter;
  createRunner?: (modelConfig: ModelConfig, options: EvaluationDriverOptions) => EvaluationRunner;
}

function createEvaluationDriver(modelConfig: ModelConfig, options: EvaluationDriverOptions): EvaluationRunner {
  return new EvaluationDriver(new MatchClassifier(new ModelClient(modelConfig)), options);
}

export async function runCli(args: string[], deps: CliDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const out = deps.out ?? ((line: string) => console.log(line));
  const err = deps.err ?? ((line: string) => console.error(line));
  const createRunner = deps.createRunner ?? createEvaluationDriver;

  if (wantsHelp(args)) {
    out(USAGE);
    return 0;
  }

  try {
    const cli = parseArgs(args);
    const loader = new ConfigLoader(cli.configDir, env);
    const { modelConfig, evaluationConfig } = await loader.loadAll();
    const { inputPath, mismatchLogPath, labelPolicy } = applyCliOverrides(evaluationConfig, cli);

    const runner = createRunner(modelConfig, { mismatchLogPath, labelPolicy, write: out });

    out('\n=== Watchlist Screening Evaluation ===');
    out(`Model: ${modelConfig.model} (temperature ${modelConfig.temperature})`);
    out(`Cases: ${inputPath}`);
    out(`Label policy: ${labelPolicy}`);
    out('======================================\n');

    await runner.run(inputPath);
    return 0;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    err(`\nError: ${message}`);
    if (error instanceof Error && error.stack && env.LOG_LEVEL === 'debug') {
      err('\nStack trace:');
      err(error.stack);
    }
    return 1;
  }
}
