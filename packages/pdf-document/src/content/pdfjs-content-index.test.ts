import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { type Mock, beforeEach, describe, expect, test, vi } from 'vitest';

import { MapContentIndex, buildPdfjsContentIndex } from './pdfjs-content-index';

vi.mock('pdfjs-dist/legacy/build/pdf.mjs', () => ({
  getDocument: vi.fn(),
  OPS: {
    save: 10,
    restore: 11,
    transform: 12,
    constructPath: 91,
    fill: 22,
    eoFill: 23,
    stroke: 20,
    fillStroke: 24,
    eoFillStroke: 25,
    closeStroke: 21,
    closeFillStroke: 26,
    closeEOFillStroke: 27,
    endPath: 28,
    paintImageXObject: 85,
    paintInlineImageXObject: 86,
    paintImageMaskXObject: 83,
    paintFormXObjectBegin: 74,
    paintFormXObjectEnd: 75,
    beginMarkedContent: 69,
    beginMarkedContentProps: 70,
    endMarkedContent: 71,
  },
}));

const mockGetDocument = getDocument as Mock;

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

function fakePage(options: { fail?: boolean } = {}) {
  return {
    getOperatorList: vi.fn(async () => {
      if (options.fail) throw new Error('Invalid content stream');
      return {
        fnArray: [70, 12, 85, 71],
        argsArray: [['Figure', 1], [100, 0, 0, 50, 20, 30], ['img'], null],
      };
    }),
    getTextContent: vi.fn(async () => ({
      items: [
        { type: 'beginMarkedContentProps', id: 'p4R_mc0' },
        { str: 'Title', transform: [20, 0, 0, 20, 50, 700], width: 60, height: 20 },
        { type: 'endMarkedContent', id: '' },
      ],
    })),
    cleanup: vi.fn(() => true),
  };
}

describe('buildPdfjsContentIndex', () => {
  let destroy: Mock;

  beforeEach(() => {
    destroy = vi.fn(async () => undefined);
  });

  function mockDocument(pages: Array<ReturnType<typeof fakePage>>) {
    mockGetDocument.mockReturnValue({
      promise: Promise.resolve({
        numPages: pages.length,
        getPage: vi.fn(async (pageNumber: number) => pages[pageNumber - 1]),
      }),
      destroy,
    });
  }

  test('indexes text and graphics of every page by zero-based page', async () => {
    mockDocument([fakePage(), fakePage()]);

    const index = await buildPdfjsContentIndex(new Uint8Array([1, 2, 3]), mockLogger);

    expect(index.lookup(0, 0)).toEqual({
      text: 'Title',
      bounds: { left: 50, bottom: 700, right: 110, top: 720 },
    });
    expect(index.lookup(1, 1)).toEqual({
      text: '',
      bounds: { left: 20, bottom: 30, right: 120, top: 80 },
    });
    expect(index.lookup(2, 0)).toBeUndefined();
    expect(destroy).toHaveBeenCalledTimes(1);
  });

  test('passes a copy of the bytes to pdfjs', async () => {
    mockDocument([]);
    const data = new Uint8Array([1, 2, 3]);

    await buildPdfjsContentIndex(data, mockLogger);

    const options = mockGetDocument.mock.calls[0][0];
    expect(options.data).toEqual(data);
    expect(options.data).not.toBe(data);
    expect(options.isEvalSupported).toBe(false);
  });

  test('logs and skips a page pdfjs cannot read', async () => {
    mockDocument([fakePage({ fail: true }), fakePage()]);

    const index = await buildPdfjsContentIndex(new Uint8Array([1]), mockLogger);

    expect(index.lookup(0, 0)).toBeUndefined();
    expect(index.lookup(1, 0)?.text).toBe('Title');
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[PdfjsContentIndex] Could not read content of page 1: Invalid content stream',
    );
    expect(mockLogger.debug).toHaveBeenCalledWith('[PdfjsContentIndex] Indexed 1/2 pages');
  });
});

describe('MapContentIndex', () => {
  test('returns undefined for unknown pages', () => {
    expect(new MapContentIndex().lookup(0, 0)).toBeUndefined();
  });
});
