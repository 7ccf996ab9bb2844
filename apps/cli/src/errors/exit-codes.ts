import {
  DocumentOpenError,
  DocumentSaveError,
  NoStructureTreeError,
  PageRenderError,
} from '@tagsense/pdf-document';
import { LLMAuthenticationError } from '@tagsense/shared';
import {
  ImageReadError,
  TagPatternError,
  UnknownOperationError,
  UnsupportedInputError,
} from '@tagsense/tag-enricher';
import { CommanderError } from 'commander';

import { MissingApiKeyError, OptionsError } from './cli-error';

/**
 * Process exit codes
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  UNEXPECTED: 1,
  INVALID_ARGUMENT: 10,
  UNKNOWN_OPERATION: 11,
  MISSING_API_KEY: 12,
  UNSUPPORTED_INPUT: 13,
  IMAGE_READ: 14,
  PAGE_RENDER: 23,
  DOCUMENT_OPEN: 24,
  DOCUMENT_SAVE: 25,
  NO_STRUCTURE_TREE: 26,
  AUTHENTICATION: 30,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map a failure to the exit code reported to the shell
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof CommanderError) {
    if (error.exitCode === 0) return EXIT_CODES.SUCCESS;
    if (error.code === 'commander.unknownCommand') return EXIT_CODES.UNKNOWN_OPERATION;
    return EXIT_CODES.INVALID_ARGUMENT;
  }
  if (error instanceof OptionsError || error instanceof TagPatternError) {
    return EXIT_CODES.INVALID_ARGUMENT;
  }
  if (error instanceof UnknownOperationError) return EXIT_CODES.UNKNOWN_OPERATION;
  if (error instanceof MissingApiKeyError) return EXIT_CODES.MISSING_API_KEY;
  if (error instanceof UnsupportedInputError) return EXIT_CODES.UNSUPPORTED_INPUT;
  if (error instanceof ImageReadError) return EXIT_CODES.IMAGE_READ;
  if (error instanceof PageRenderError) return EXIT_CODES.PAGE_RENDER;
  if (error instanceof DocumentOpenError) return EXIT_CODES.DOCUMENT_OPEN;
  if (error instanceof DocumentSaveError) return EXIT_CODES.DOCUMENT_SAVE;
  if (error instanceof NoStructureTreeError) return EXIT_CODES.NO_STRUCTURE_TREE;
  if (error instanceof LLMAuthenticationError) return EXIT_CODES.AUTHENTICATION;
  return EXIT_CODES.UNEXPECTED;
}
