import {
  DocumentOpenError,
  DocumentSaveError,
  NoStructureTreeError,
  PageRenderError,
} from '@tagsense/pdf-document';
import { LLMAuthenticationError } from '@tagsense/shared';
import {
  ImageReadError,
  TagEnricherError,
  TagPatternError,
  UnknownOperationError,
  UnsupportedInputError,
} from '@tagsense/tag-enricher';
import { CommanderError } from 'commander';
import { describe, expect, test } from 'vitest';

import { MissingApiKeyError, OptionsError } from './cli-error';
import { EXIT_CODES, exitCodeFor } from './exit-codes';

describe('exitCodeFor', () => {
  test.each([
    ['OptionsError', new OptionsError('Invalid options'), 10],
    ['TagPatternError', new TagPatternError('Figure('), 10],
    ['UnknownOperationError', new UnknownOperationError('generate-captions'), 11],
    ['MissingApiKeyError', new MissingApiKeyError(), 12],
    ['UnsupportedInputError', new UnsupportedInputError('a.doc -> b.pdf'), 13],
    ['ImageReadError', new ImageReadError('file is empty'), 14],
    ['PageRenderError', new PageRenderError('render failed', 0), 23],
    ['DocumentOpenError', new DocumentOpenError('cannot open'), 24],
    ['DocumentSaveError', new DocumentSaveError('cannot save'), 25],
    ['NoStructureTreeError', new NoStructureTreeError(), 26],
    ['LLMAuthenticationError', new LLMAuthenticationError('401 Unauthorized', 401), 30],
  ])('maps %s', (_name, error, code) => {
    expect(exitCodeFor(error)).toBe(code);
  });

  test('maps other failures to the unexpected code', () => {
    expect(exitCodeFor(new TagEnricherError('Failed to write output'))).toBe(
      EXIT_CODES.UNEXPECTED,
    );
    expect(exitCodeFor(new Error('boom'))).toBe(1);
    expect(exitCodeFor('boom')).toBe(1);
  });

  test('treats help and version output as success', () => {
    expect(exitCodeFor(new CommanderError(0, 'commander.helpDisplayed', '(outputHelp)'))).toBe(0);
    expect(exitCodeFor(new CommanderError(0, 'commander.version', '0.1.0'))).toBe(0);
  });

  test('maps commander parse failures', () => {
    expect(
      exitCodeFor(new CommanderError(1, 'commander.unknownCommand', "unknown command 'x'")),
    ).toBe(11);
    expect(
      exitCodeFor(
        new CommanderError(
          1,
          'commander.missingMandatoryOptionValue',
          "required option '-i, --input <path>' not specified",
        ),
      ),
    ).toBe(10);
  });
});
