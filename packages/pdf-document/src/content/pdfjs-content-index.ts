import type { LoggerMethods } from '@tagsense/logger';

import { OPS, getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';

import {
  type MarkedContent,
  collectGraphicsBounds,
  collectTextContent,
  mergePageContent,
} from './marked-content-bounds';

/**
 * Marked-content lookup used by structure nodes for geometry and text
 */
export interface PageContentIndex {
  /**
   * Content of an MCID on a zero-based page, undefined when the page has
   * no such sequence
   */
  lookup(page: number, mcid: number): MarkedContent | undefined;
}

/**
 * PageContentIndex backed by an in-memory map; also used by tests
 */
export class MapContentIndex implements PageContentIndex {
  constructor(
    private readonly pages: ReadonlyMap<number, ReadonlyMap<number, MarkedContent>> = new Map(),
  ) {}

  lookup(page: number, mcid: number): MarkedContent | undefined {
    return this.pages.get(page)?.get(mcid);
  }
}

/**
 * Build a content index for every page of a PDF with pdfjs-dist.
 *
 * Each page's operator list gives path and image bounds, its text content
 * gives strings and text bounds, both keyed by MCID. A page pdfjs cannot
 * interpret is logged and left out, so tags on it have no geometry.
 */
export async function buildPdfjsContentIndex(
  data: Uint8Array,
  logger: LoggerMethods,
): Promise<MapContentIndex> {
  // pdfjs transfers the buffer to its worker; keep the caller's bytes intact
  const loadingTask = getDocument({
    data: data.slice(),
    isEvalSupported: false,
    useSystemFonts: false,
    verbosity: 0,
  });
  const pdf = await loadingTask.promise;
  const pages = new Map<number, Map<number, MarkedContent>>();

  try {
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      try {
        const page = await pdf.getPage(pageNumber);
        const [operators, textContent] = await Promise.all([
          page.getOperatorList(),
          page.getTextContent({ includeMarkedContent: true }),
        ]);
        pages.set(
          pageNumber - 1,
          mergePageContent(
            collectTextContent(textContent.items),
            collectGraphicsBounds(operators, OPS),
          ),
        );
        page.cleanup();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(
          `[PdfjsContentIndex] Could not read content of page ${pageNumber}: ${message}`,
        );
      }
    }
  } finally {
    await loadingTask.destroy();
  }

  logger.debug(`[PdfjsContentIndex] Indexed ${pages.size}/${pdf.numPages} pages`);
  return new MapContentIndex(pages);
}
