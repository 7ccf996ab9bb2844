import { TagPatternError } from '../errors/tag-enricher-error';

/**
 * Compile a tag pattern for matching at the start of a type name.
 *
 * The sticky flag anchors each test at index 0 without requiring the whole
 * name to match, so `Table` also accepts `TableOfContents`.
 *
 * @throws TagPatternError when the pattern is not a valid expression
 */
export function compileTagPattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern, 'y');
  } catch (error) {
    throw new TagPatternError(pattern, { cause: error });
  }
}

function matchesAtStart(pattern: RegExp, typeName: string): boolean {
  pattern.lastIndex = 0;
  return pattern.test(typeName);
}

/**
 * Whether the raw or the role-mapped type name matches the pattern
 */
export function matchesTag(
  rawType: string,
  mappedType: string,
  pattern: RegExp,
): boolean {
  return matchesAtStart(pattern, rawType) || matchesAtStart(pattern, mappedType);
}
