import type { Command } from 'commander';

import { DEFAULT_TAG_PATTERNS, ENRICHMENT, MATHML } from '@tagsense/tag-enricher';

import type { CliContext } from '../cli-context';

import {
  DEFAULT_LANGUAGE,
  DEFAULT_MODEL,
  OPERATION_COMMANDS,
  type OperationCommand,
  parseEnrichOptions,
} from '../options/enrich-options';
import { runEnrichment } from '../runner/enrich-runner';

const SUPPORTED_IMAGES = 'jpg, jpeg, png, gif, webp';

const DESCRIPTIONS: Record<OperationCommand, string> = {
  'generate-alt-text':
    'Generate alternate text for figures and formulas. ' +
    `Supported: PDF -> PDF, image -> TXT or XML, XML -> TXT, JSON -> JSON. Images: ${SUPPORTED_IMAGES}.`,
  'generate-table-summary':
    'Generate table summaries. ' +
    `Supported: PDF -> PDF, image -> TXT or XML, JSON -> JSON. Images: ${SUPPORTED_IMAGES}.`,
  'generate-mathml':
    'Generate MathML for formulas. ' +
    `Supported: PDF -> PDF, image -> TXT or XML, JSON -> JSON. Images: ${SUPPORTED_IMAGES}.`,
};

/**
 * Register one of the enrichment subcommands
 */
export function registerEnrichCommand(
  program: Command,
  name: OperationCommand,
  context: CliContext,
): void {
  const operation = OPERATION_COMMANDS[name];
  const command = program
    .command(name)
    .description(DESCRIPTIONS[name])
    .requiredOption('-i, --input <path>', 'Input PDF, image, XML or JSON file')
    .requiredOption('-o, --output <path>', 'Output file')
    .option('--openai-key <key>', 'OpenAI API key (default: OPENAI_API_KEY)');

  if (operation === 'mathml') {
    command
      .option('--mathml-version <version>', 'mathml-1 to mathml-4', MATHML.DEFAULT_VERSION)
      .option('--skip-existing-mathml', 'Skip formulas that already embed MathML unless --overwrite is set');
  } else {
    command.option('--lang <language>', 'Language of the generated text', DEFAULT_LANGUAGE);
  }

  command
    .option('--tags <regex>', 'Structure types to process', DEFAULT_TAG_PATTERNS[operation])
    .option('--overwrite [bool]', 'Replace existing content', false)
    .option('--model <id>', 'OpenAI model', DEFAULT_MODEL)
    .option('--prompt <file-or-text>', 'Prompt template file or inline template')
    .option(
      '--tags-count <n>',
      'Number of surrounding tags sent as context',
      String(ENRICHMENT.DEFAULT_SURROUNDING_TAGS),
    )
    .option('--concurrency <n>', 'Parallel requests', String(ENRICHMENT.DEFAULT_CONCURRENCY))
    .option('--zoom <n>', 'Render scale over 72 DPI', String(ENRICHMENT.DEFAULT_ZOOM))
    .option('-v, --verbose', 'Log debug output')
    .action(async (options: Record<string, unknown>) => {
      const settings = parseEnrichOptions(name, options, context.env);
      const logger = context.createLogger(settings.verbose ? 'debug' : 'info');
      await runEnrichment(settings, logger, context.modelFactory);
    });
}
