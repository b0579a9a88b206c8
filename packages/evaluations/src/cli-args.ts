/**
 * Command-line flags for the evaluation runner
 */

import type { EvaluationConfig, LabelPolicy } from '@watchlist-eval/core';

export const USAGE = `
Watchlist screening prompt evaluation

Usage:
  npm run eval [-- options]

Options:
  --input FILE       Labeled case table (CSV)
  --output FILE      Mismatch log to write (JSON Lines, overwritten)
  --config-dir DIR   Configuration directory (default: ./configs)
  --strict-labels    Skip cases whose label or verdict is not a recognised value
  --help, -h         Show this help message

Configuration:
  1. Copy .env.example to .env and set ANTHROPIC_API_KEY
  2. Optionally copy configs/harness.example.json to configs/harness.json
`;

export interface CliOptions {
  configDir: string;
  inputPath?: string;
  mismatchLogPath?: string;
  labelPolicy?: LabelPolicy;
}

export function wantsHelp(args: string[]): boolean {
  return args.includes('--help') || args.includes('-h');
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { configDir: './configs' };

  const valueOf = (flag: string, index: number): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--input':
        options.inputPath = valueOf('--input', i++);
        break;
      case '--output':
        options.mismatchLogPath = valueOf('--output', i++);
        break;
      case '--config-dir':
        options.configDir = valueOf('--config-dir', i++);
        break;
      case '--strict-labels':
        options.labelPolicy = 'strict';
        break;
      default:
        throw new Error(`Unknown argument: ${args[i]}`);
    }
  }

  return options;
}

/**
 * Flags take precedence over the loaded configuration
 */
export function applyCliOverrides(config: EvaluationConfig, cli: CliOptions): EvaluationConfig {
  return {
    inputPath: cli.inputPath ?? config.inputPath,
    mismatchLogPath: cli.mismatchLogPath ?? config.mismatchLogPath,
    labelPolicy: cli.labelPolicy ?? config.labelPolicy,
  };
}
