import type { EnrichmentRequest, OperationKind } from '@tagsense/model';

import {
  DEFAULT_TAG_PATTERNS,
  ENRICHMENT,
  MATHML,
  MATHML_VERSIONS,
  UnknownOperationError,
  compileTagPattern,
} from '@tagsense/tag-enricher';
import { z } from 'zod';

import { MissingApiKeyError, OptionsError } from '../errors/cli-error';

/**
 * Subcommand name for each operation
 */
export const OPERATION_COMMANDS = {
  'generate-alt-text': 'alt-text',
  'generate-table-summary': 'table-summary',
  'generate-mathml': 'mathml',
} as const satisfies Record<string, OperationKind>;

export type OperationCommand = keyof typeof OPERATION_COMMANDS;

export const DEFAULT_MODEL = 'gpt-4o-mini';
export const DEFAULT_LANGUAGE = 'en';

/**
 * @throws UnknownOperationError for a name outside OPERATION_COMMANDS
 */
export function resolveOperation(command: string): OperationKind {
  for (const [name, operation] of Object.entries(OPERATION_COMMANDS)) {
    if (name === command) return operation;
  }
  throw new UnknownOperationError(command);
}

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

/**
 * `--overwrite` alone gives true; `--overwrite <value>` is parsed as a word
 */
const booleanOptionSchema = z
  .union([z.boolean(), z.string()])
  .transform((value, ctx) => {
    if (typeof value === 'boolean') return value;
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) return true;
    if (FALSE_VALUES.has(normalized)) return false;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Expected true or false, got "${value}"`,
    });
    return z.NEVER;
  });

/**
 * Raw options of an enrichment subcommand as commander collects them
 */
export const enrichOptionsSchema = z.object({
  input: z.string().min(1),
  output: z.string().min(1),
  openaiKey: z.string().optional(),
  lang: z.string().min(1).default(DEFAULT_LANGUAGE),
  mathmlVersion: z.enum(MATHML_VERSIONS).default(MATHML.DEFAULT_VERSION),
  tags: z.string().min(1).optional(),
  overwrite: booleanOptionSchema.default(false),
  model: z.string().min(1).default(DEFAULT_MODEL),
  prompt: z.string().default(''),
  tagsCount: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(ENRICHMENT.DEFAULT_SURROUNDING_TAGS),
  concurrency: z.coerce
    .number()
    .int()
    .positive()
    .default(ENRICHMENT.DEFAULT_CONCURRENCY),
  zoom: z.coerce.number().positive().max(10).default(ENRICHMENT.DEFAULT_ZOOM),
  skipExistingMathml: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type EnrichOptions = z.infer<typeof enrichOptionsSchema>;

/**
 * Validated settings for one enrichment run
 */
export interface EnrichSettings {
  input: string;
  output: string;
  apiKey: string;
  modelId: string;
  tagPattern: RegExp;
  surroundCount: number;
  concurrency: number;
  zoom: number;
  verbose: boolean;
  request: EnrichmentRequest;
}

/**
 * Validate raw subcommand options into run settings
 *
 * @throws OptionsError when a value is invalid
 * @throws TagPatternError when `--tags` is not a valid expression
 * @throws MissingApiKeyError when neither `--openai-key` nor
 *   `OPENAI_API_KEY` is set
 */
export function parseEnrichOptions(
  command: OperationCommand,
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): EnrichSettings {
  const parsed = enrichOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `--${toFlagName(issue.path.join('.'))}: ${issue.message}`,
    );
    throw new OptionsError(`Invalid options: ${issues.join('; ')}`, issues, {
      cause: parsed.error,
    });
  }

  const options = parsed.data;
  const operation = OPERATION_COMMANDS[command];
  const tagPattern = compileTagPattern(options.tags ?? DEFAULT_TAG_PATTERNS[operation]);

  const apiKey = (options.openaiKey ?? env.OPENAI_API_KEY ?? '').trim();
  if (!apiKey) {
    throw new MissingApiKeyError();
  }

  return {
    input: options.input,
    output: options.output,
    apiKey,
    modelId: options.model,
    tagPattern,
    surroundCount: options.tagsCount,
    concurrency: options.concurrency,
    zoom: options.zoom,
    verbose: options.verbose,
    request: {
      operation,
      language: options.lang,
      mathMlVersion: options.mathmlVersion,
      overwrite: options.overwrite,
      mathMlExisting: options.skipExistingMathml ? 'respect-overwrite' : 'always',
      promptSource: options.prompt,
    },
  };
}

function toFlagName(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`);
}
