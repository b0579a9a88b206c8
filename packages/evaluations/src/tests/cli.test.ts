import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { EvaluationSummary, ModelConfig } from '@watchlist-eval/core';
import { runCli, type CliDependencies, type EvaluationRunner } from '../cli.js';
import type { EvaluationDriverOptions } from '../evaluation-driver.js';

const emptySummary: EvaluationSummary = { total: 0, correct: 0, accuracy: 0, mismatches: [], skipped: [] };

describe('runCli', () => {
  let configDir: string;
  let out: string[];
  let err: string[];
  let run: Mock<EvaluationRunner['run']>;
  let created: { modelConfig: ModelConfig; options: EvaluationDriverOptions }[];

  beforeEach(async () => {
    configDir = await mkdtemp(join(tmpdir(), 'watchlist-eval-cli-'));
    out = [];
    err = [];
    created = [];
    run = vi.fn<EvaluationRunner['run']>().mockResolvedValue(emptySummary);
  });

  afterEach(async () => {
    await rm(configDir, { recursive: true, force: true });
  });

  function deps(env: NodeJS.ProcessEnv = { ANTHROPIC_API_KEY: 'test-secret' }): CliDependencies {
    return {
      env,
      out: (line) => out.push(line),
      err: (line) => err.push(line),
      createRunner: (modelConfig, options) => {
        created.push({ modelConfig, options });
        return { run };
      },
    };
  }

  it('runs with the configured paths and exits 0', async () => {
    await writeFile(
      join(configDir, 'harness.json'),
      JSON.stringify({ evaluation: { inputPath: 'from-config.csv', mismatchLogPath: 'from-config.jsonl' } }),
      'utf-8',
    );

    const code = await runCli(['--config-dir', configDir], deps());

    expect(code).toBe(0);
    expect(run).toHaveBeenCalledWith('from-config.csv');
    expect(created[0].options).toMatchObject({ mismatchLogPath: 'from-config.jsonl', labelPolicy: 'lenient' });
    expect(created[0].modelConfig.apiKey).toBe('test-secret');
    expect(out).toContain('Cases: from-config.csv');
    expect(err).toEqual([]);
  });

  it('lets flags override the configuration file', async () => {
    await writeFile(
      join(configDir, 'harness.json'),
      JSON.stringify({ evaluation: { inputPath: 'from-config.csv', labelPolicy: 'lenient' } }),
      'utf-8',
    );

    const code = await runCli(
      ['--config-dir', configDir, '--input', 'flag.csv', '--output', 'flag.jsonl', '--strict-labels'],
      deps(),
    );

    expect(code).toBe(0);
    expect(run).toHaveBeenCalledWith('flag.csv');
    expect(created[0].options).toMatchObject({ mismatchLogPath: 'flag.jsonl', labelPolicy: 'strict' });
  });

  it('prints usage for --help without loading configuration', async () => {
    const code = await runCli(['--help'], deps({}));

    expect(code).toBe(0);
    expect(out[0]).toContain('--strict-labels');
    expect(created).toEqual([]);
  });

  it('reports an unknown argument and exits 1', async () => {
    const code = await runCli(['--verbose'], deps());

    expect(code).toBe(1);
    expect(err).toEqual(['\nError: Unknown argument: --verbose']);
    expect(run).not.toHaveBeenCalled();
  });

  it('reports a missing API key before touching the input', async () => {
    const code = await runCli(['--config-dir', configDir], deps({}));

    expect(code).toBe(1);
    expect(err).toEqual(['\nError: ANTHROPIC_API_KEY is not set. Please check your .env file or environment.']);
    expect(created).toEqual([]);
  });

  it('exits 1 when the run fails', async () => {
    run.mockRejectedValueOnce(new Error('Connection error.'));

    const code = await runCli(['--config-dir', configDir], deps());

    expect(code).toBe(1);
    expect(err).toEqual(['\nError: Connection error.']);
  });
});
