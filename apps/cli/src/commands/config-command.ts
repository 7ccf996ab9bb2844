import type { Command } from 'commander';

import { writeFile } from 'node:fs/promises';

import type { CliContext } from '../cli-context';

import config from '../../config.json';
import { CliError } from '../errors/cli-error';

/**
 * Print the bundled configuration, or write it to `output`
 */
export async function exportConfig(
  output: string | undefined,
  context: CliContext,
): Promise<void> {
  const text = `${JSON.stringify(config, null, 2)}\n`;
  if (!output) {
    context.stdout(text);
    return;
  }

  try {
    await writeFile(output, text, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CliError(`Failed to write configuration to ${output}: ${message}`, {
      cause: error,
    });
  }
}

export function registerConfigCommand(program: Command, context: CliContext): void {
  program
    .command('config')
    .description('Print the default configuration, or save it with --output')
    .option('-o, --output <path>', 'Destination JSON file')
    .action(async (options: { output?: string }) => {
      await exportConfig(options.output, context);
    });
}
