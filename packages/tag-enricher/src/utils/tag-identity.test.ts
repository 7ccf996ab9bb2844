import { describe, expect, test } from 'vitest';

import { el } from '../test-utils/structure-fixture';
import { formatTagIdentity, resolveTargetPage } from './tag-identity';

describe('formatTagIdentity', () => {
  test('prints type, object number, element id and one-based page', () => {
    const figure = el('Figure', { elementId: 'fig-1' });

    expect(formatTagIdentity(figure, 2)).toBe(
      `Figure [obj: ${figure.id.objectNumber}, id: fig-1, page: 3]`,
    );
  });

  test('prints a question mark for an unknown page', () => {
    const table = el('Table');

    expect(formatTagIdentity(table, null)).toBe(
      `Table [obj: ${table.id.objectNumber}, id: , page: ?]`,
    );
  });
});

describe('resolveTargetPage', () => {
  test('prefers the element page', () => {
    expect(resolveTargetPage(el('Figure', { pages: [4, 5] }))).toBe(4);
  });

  test('falls back to the first child with a page', () => {
    const figure = el('Figure', {
      children: ['content', el('Span'), el('Span', { pages: [7] }), el('Span', { pages: [1] })],
    });

    expect(resolveTargetPage(figure)).toBe(7);
  });

  test('returns null when nothing resolves', () => {
    expect(resolveTargetPage(el('Figure', { children: ['content'] }))).toBeNull();
  });
});
