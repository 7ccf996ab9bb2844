import type { LoggerMethods } from '@tagsense/logger';

import { LLMAuthenticationError } from '@tagsense/shared';
import { writeFile } from 'node:fs/promises';
import { type Mock, beforeEach, describe, expect, test, vi } from 'vitest';

import type { CliContext } from './cli-context';

import { runCli } from './program';
import { runEnrichment } from './runner/enrich-runner';

vi.mock('./runner/enrich-runner', () => ({
  runEnrichment: vi.fn(),
}));

vi.mock('node:fs/promises', async (importOriginal) => ({
  ...(await importOriginal<typeof import('node:fs/promises')>()),
  writeFile: vi.fn(),
}));

const mockRunEnrichment = runEnrichment as Mock;
const mockWriteFile = writeFile as Mock;

const ENRICH_ARGS = [
  'generate-table-summary',
  '-i',
  'in.pdf',
  '-o',
  'out.pdf',
  '--openai-key',
  'test-secret',
];

describe('runCli', () => {
  let stdout: Mock<(text: string) => void>;
  let stderr: Mock<(text: string) => void>;
  let logger: LoggerMethods;
  let context: CliContext;

  function cli(...args: string[]): Promise<number> {
    return runCli(['node', 'tagsense', ...args], context);
  }

  function stderrText(): string {
    return stderr.mock.calls.map(([text]) => text).join('');
  }

  beforeEach(() => {
    stdout = vi.fn();
    stderr = vi.fn();
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const times = [new Date(2024, 0, 5, 7, 3, 9), new Date(2024, 0, 5, 7, 3, 11, 500)];
    context = {
      env: {},
      stdout,
      stderr,
      createLogger: vi.fn(() => logger),
      modelFactory: vi.fn(),
      now: vi.fn(() => times.shift() ?? new Date(2024, 0, 5, 8, 0, 0)),
    };
    mockRunEnrichment.mockResolvedValue({ mode: 'pdf' });
  });

  describe('enrichment subcommands', () => {
    test('validates options and runs the enrichment', async () => {
      const code = await cli(...ENRICH_ARGS);

      expect(code).toBe(0);
      expect(mockRunEnrichment).toHaveBeenCalledTimes(1);
      const [settings, passedLogger, modelFactory] = mockRunEnrichment.mock.calls[0];
      expect(settings).toMatchObject({
        input: 'in.pdf',
        output: 'out.pdf',
        apiKey: 'test-secret',
        request: { operation: 'table-summary', overwrite: false, language: 'en' },
      });
      expect(settings.tagPattern.source).toBe('Table');
      expect(passedLogger).toBe(logger);
      expect(modelFactory).toBe(context.modelFactory);
      expect(context.createLogger).toHaveBeenCalledWith('info');
    });

    test('prints start, finish and elapsed time', async () => {
      await cli(...ENRICH_ARGS);

      expect(stderr.mock.calls).toEqual([
        ['\nProcessing started at: 2024-01-05_07-03-09\n'],
        ['\nProcessing finished at: 2024-01-05_07-03-11. Elapsed time: 2.50 seconds\n'],
      ]);
    });

    test('reads flag values from the command line', async () => {
      await cli(
        'generate-mathml',
        '-i',
        'in.pdf',
        '-o',
        'out.pdf',
        '--mathml-version',
        'mathml-3',
        '--overwrite',
        '--skip-existing-mathml',
        '--tags',
        'Formula|Equation',
        '--tags-count',
        '2',
        '--concurrency',
        '4',
        '--zoom',
        '3',
        '--model',
        'openai/gpt-4.1',
        '--verbose',
      );

      const [settings] = mockRunEnrichment.mock.calls[0];
      expect(settings).toMatchObject({
        modelId: 'openai/gpt-4.1',
        surroundCount: 2,
        concurrency: 4,
        zoom: 3,
        verbose: true,
        request: {
          operation: 'mathml',
          mathMlVersion: 'mathml-3',
          overwrite: true,
          mathMlExisting: 'respect-overwrite',
        },
      });
      expect(settings.tagPattern.source).toBe('Formula|Equation');
      expect(context.createLogger).toHaveBeenCalledWith('debug');
    });

    test('accepts an explicit --overwrite value', async () => {
      await cli(...ENRICH_ARGS, '--overwrite', 'false', '--lang', 'fr');

      const [settings] = mockRunEnrichment.mock.calls[0];
      expect(settings.request.overwrite).toBe(false);
      expect(settings.request.language).toBe('fr');
    });

    test('takes the API key from the environment', async () => {
      context.env = { OPENAI_API_KEY: 'env-secret' };

      await cli('generate-alt-text', '-i', 'figure.png', '-o', 'figure.txt');

      expect(mockRunEnrichment.mock.calls[0][0].apiKey).toBe('env-secret');
    });

    test('exits with 12 when no API key is available', async () => {
      const code = await cli('generate-alt-text', '-i', 'figure.png', '-o', 'figure.txt');

      expect(code).toBe(12);
      expect(mockRunEnrichment).not.toHaveBeenCalled();
      expect(stderrText()).toContain('Invalid or missing OpenAI API key');
      expect(stderrText()).toContain('Elapsed time:');
    });

    test('exits with 10 for an invalid tag pattern', async () => {
      expect(await cli(...ENRICH_ARGS, '--tags', 'Table(')).toBe(10);
    });

    test('exits with 10 for an invalid option value', async () => {
      expect(await cli(...ENRICH_ARGS, '--zoom', 'big')).toBe(10);
      expect(stderrText()).toContain('--zoom');
    });

    test('exits with 10 when a required option is missing', async () => {
      const code = await cli('generate-alt-text', '-o', 'out.pdf');

      expect(code).toBe(10);
      expect(stderrText()).toContain("required option '-i, --input <path>' not specified");
      expect(stderrText()).not.toContain('Processing started');
    });

    test('exits with 11 for an unknown subcommand', async () => {
      expect(await cli('generate-captions')).toBe(11);
    });

    test('exits with 30 when the provider rejects the key', async () => {
      mockRunEnrichment.mockRejectedValue(new LLMAuthenticationError('Invalid API key', 401));

      const code = await cli(...ENRICH_ARGS);

      expect(code).toBe(30);
      expect(stderrText()).toContain('Failed to run the program: Invalid API key');
      expect(stderrText()).toContain('Elapsed time: 2.50 seconds');
    });

    test('exits with 1 for unexpected failures', async () => {
      mockRunEnrichment.mockRejectedValue(new Error('socket hang up'));

      expect(await cli(...ENRICH_ARGS)).toBe(1);
    });
  });

  describe('config', () => {
    test('prints the configuration', async () => {
      const code = await cli('config');

      expect(code).toBe(0);
      expect(stdout).toHaveBeenCalledTimes(1);
      const config = JSON.parse(stdout.mock.calls[0][0]);
      expect(config.name).toBe('tagsense');
      expect(config.actions.map((action: { name: string }) => action.name)).toEqual([
        'generate-alt-text',
        'generate-table-summary',
        'generate-mathml',
      ]);
    });

    test('writes the configuration to a file', async () => {
      mockWriteFile.mockResolvedValue(undefined);

      const code = await cli('config', '-o', 'out/config.json');

      expect(code).toBe(0);
      expect(mockWriteFile).toHaveBeenCalledWith(
        'out/config.json',
        expect.stringContaining('"name": "tagsense"'),
        'utf-8',
      );
      expect(stdout).not.toHaveBeenCalled();
    });

    test('reports a failed write', async () => {
      mockWriteFile.mockRejectedValue(new Error('EACCES: permission denied'));

      const code = await cli('config', '-o', '/root/config.json');

      expect(code).toBe(1);
      expect(stderrText()).toContain(
        'Failed to write configuration to /root/config.json: EACCES: permission denied',
      );
    });
  });

  describe('help', () => {
    test('lists the subcommands and exits with 0', async () => {
      const code = await cli('--help');

      expect(code).toBe(0);
      const help = stdout.mock.calls.map(([text]) => text).join('');
      expect(help).toContain('generate-alt-text');
      expect(help).toContain('generate-table-summary');
      expect(help).toContain('generate-mathml');
      expect(help).toContain('config');
    });
  });
});
