import chalk from 'chalk';
import { Command, CommanderError } from 'commander';

import packageJson from '../package.json';
import { type CliContext, createDefaultCliContext } from './cli-context';
import { registerConfigCommand } from './commands/config-command';
import { registerEnrichCommand } from './commands/enrich-command';
import { EXIT_CODES, exitCodeFor } from './errors/exit-codes';
import { OPERATION_COMMANDS, type OperationCommand } from './options/enrich-options';
import { formatElapsedSeconds, formatTimestamp } from './utils/timing';

function isOperationCommand(name: string): name is OperationCommand {
  return name in OPERATION_COMMANDS;
}

/**
 * Build the commander program with every subcommand registered.
 *
 * Commander never exits the process itself; parse failures surface as
 * CommanderError so that runCli can map them to exit codes.
 */
export function createProgram(context: CliContext): Command {
  const program = new Command()
    .name('tagsense')
    .description('Generate alt text, table summaries and MathML for tagged PDFs with OpenAI')
    .version(packageJson.version)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => context.stdout(text),
      writeErr: (text) => context.stderr(text),
    });

  for (const name of Object.keys(OPERATION_COMMANDS)) {
    if (isOperationCommand(name)) {
      registerEnrichCommand(program, name, context);
    }
  }
  registerConfigCommand(program, context);

  return program;
}

/**
 * Parse `argv`, run the selected subcommand and return the exit code.
 *
 * Start and finish time are written to stderr around every subcommand,
 * whatever its outcome.
 */
export async function runCli(
  argv: readonly string[],
  context: CliContext = createDefaultCliContext(),
): Promise<number> {
  const program = createProgram(context);
  const timing: { startedAt?: Date } = {};

  program.hook('preAction', () => {
    const startedAt = context.now();
    timing.startedAt = startedAt;
    context.stderr(`\nProcessing started at: ${formatTimestamp(startedAt)}\n`);
  });

  try {
    await program.parseAsync([...argv]);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    if (!(error instanceof CommanderError)) {
      const message = error instanceof Error ? error.message : String(error);
      context.stderr(chalk.red(`Failed to run the program: ${message}\n`));
    }
    return exitCodeFor(error);
  } finally {
    const { startedAt } = timing;
    if (startedAt) {
      const finishedAt = context.now();
      context.stderr(
        `\nProcessing finished at: ${formatTimestamp(finishedAt)}. ` +
          `Elapsed time: ${formatElapsedSeconds(startedAt.getTime(), finishedAt.getTime())} seconds\n`,
      );
    }
  }
}
