import { describe, expect, test } from 'vitest';

import {
  ImageReadError,
  TagEnricherError,
  TagPatternError,
  UnknownOperationError,
  UnsupportedInputError,
} from './tag-enricher-error';

describe('TagEnricherError', () => {
  test('fromError wraps the cause with context', () => {
    const cause = new Error('disk full');
    const error = TagEnricherError.fromError('Failed to write output', cause);

    expect(error.name).toBe('TagEnricherError');
    expect(error.message).toBe('Failed to write output: disk full');
    expect(error.cause).toBe(cause);
  });

  test('getErrorMessage handles non-error values', () => {
    expect(TagEnricherError.getErrorMessage('oops')).toBe('oops');
    expect(TagEnricherError.getErrorMessage(undefined)).toBe('undefined');
  });
});

describe('subclasses', () => {
  test('TagPatternError keeps the pattern', () => {
    const error = new TagPatternError('Fig(');

    expect(error).toBeInstanceOf(TagEnricherError);
    expect(error.name).toBe('TagPatternError');
    expect(error.pattern).toBe('Fig(');
    expect(error.message).toBe('Invalid tag pattern "Fig("');
  });

  test('UnknownOperationError names the operation', () => {
    const error = new UnknownOperationError('generate-poem');

    expect(error.name).toBe('UnknownOperationError');
    expect(error.message).toBe('Unknown operation "generate-poem"');
  });

  test('UnsupportedInputError and ImageReadError carry their names', () => {
    expect(new UnsupportedInputError('x').name).toBe('UnsupportedInputError');

    const cause = new Error('ENOENT');
    const error = ImageReadError.fromError('Failed to read a.png', cause);
    expect(error.name).toBe('ImageReadError');
    expect(error.message).toBe('Failed to read a.png: ENOENT');
    expect(error).toBeInstanceOf(TagEnricherError);
  });
});
