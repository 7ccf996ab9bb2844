import type { LoggerMethods } from '@tagsense/logger';
import type { BoundingBox } from '@tagsense/model';

import { readFile, writeFile } from 'node:fs/promises';
import { PDFArray, PDFDict, PDFDocument, PDFName, PDFRef } from 'pdf-lib';

import {
  type PageContentIndex,
  buildPdfjsContentIndex,
} from '../content/pdfjs-content-index';
import {
  DocumentOpenError,
  DocumentSaveError,
  NoStructureTreeError,
} from '../errors/pdf-document-error';
import { type PdfStructureNode, StructureTree } from './pdf-structure-node';

/**
 * Source of the marked-content index for a loaded document
 */
export type ContentIndexFactory = (
  data: Uint8Array,
  logger: LoggerMethods,
) => Promise<PageContentIndex>;

/**
 * PdfStructureDocument
 *
 * A tagged PDF loaded with pdf-lib. Exposes the first element of the
 * structure tree as a StructureNode, the page media boxes the renderer
 * needs, and writes the modified document back.
 */
export class PdfStructureDocument {
  private tree?: StructureTree;

  private constructor(
    private readonly logger: LoggerMethods,
    readonly path: string,
    private readonly pdf: PDFDocument,
    private readonly contentIndex: PageContentIndex,
  ) {}

  /**
   * Read and parse a PDF, then index its marked content
   *
   * @throws DocumentOpenError when the file cannot be read or parsed
   */
  static async open(
    path: string,
    logger: LoggerMethods,
    indexContent: ContentIndexFactory = buildPdfjsContentIndex,
  ): Promise<PdfStructureDocument> {
    let data: Uint8Array;
    try {
      data = new Uint8Array(await readFile(path));
    } catch (error) {
      throw DocumentOpenError.fromError(path, error);
    }
    return PdfStructureDocument.load(data, path, logger, indexContent);
  }

  /**
   * Parse PDF bytes already in memory
   *
   * @param path - Used in messages only
   */
  static async load(
    data: Uint8Array,
    path: string,
    logger: LoggerMethods,
    indexContent: ContentIndexFactory = buildPdfjsContentIndex,
  ): Promise<PdfStructureDocument> {
    try {
      const pdf = await PDFDocument.load(data, { updateMetadata: false });
      logger.info(`[PdfStructureDocument] Opened ${path} (${pdf.getPageCount()} pages)`);
      const contentIndex = await indexContent(data, logger);
      return new PdfStructureDocument(logger, path, pdf, contentIndex);
    } catch (error) {
      throw DocumentOpenError.fromError(path, error);
    }
  }

  get pageCount(): number {
    return this.pdf.getPageCount();
  }

  /**
   * Media box of a zero-based page in user space
   */
  mediaBox(page: number): BoundingBox {
    const { x, y, width, height } = this.pdf.getPage(page).getMediaBox();
    return { left: x, bottom: y, right: x + width, top: y + height };
  }

  /**
   * First structure element under the structure tree root
   *
   * @throws NoStructureTreeError when the document is untagged or the
   *   tree has no elements
   */
  structureRoot(): PdfStructureNode {
    const tree = this.structureTree();
    const root = this.pdf.catalog.lookup(PDFName.of('StructTreeRoot'));
    if (!(root instanceof PDFDict)) {
      throw new NoStructureTreeError();
    }

    const k = root.get(PDFName.of('K'));
    const resolved = tree.lookup(k);
    const first = resolved instanceof PDFArray ? resolved.get(0) : k;
    const element = tree.lookup(first);
    if (!(element instanceof PDFDict) || !element.has(PDFName.of('S'))) {
      throw new NoStructureTreeError('PDF structure tree has no elements');
    }

    return tree.nodeFor(element, first instanceof PDFRef ? first : undefined, null);
  }

  private structureTree(): StructureTree {
    if (!this.tree) {
      const root = this.pdf.catalog.lookup(PDFName.of('StructTreeRoot'));
      const roleMap =
        root instanceof PDFDict ? root.lookup(PDFName.of('RoleMap')) : undefined;
      this.tree = new StructureTree(
        this.pdf.context,
        this.pdf.getPages().map((page) => page.ref),
        this.contentIndex,
        roleMap instanceof PDFDict ? roleMap : undefined,
      );
    }
    return this.tree;
  }

  async toBytes(): Promise<Uint8Array> {
    return this.pdf.save({ useObjectStreams: false, updateFieldAppearances: false });
  }

  /**
   * @throws DocumentSaveError when serialization or writing fails
   */
  async save(path: string): Promise<void> {
    try {
      await writeFile(path, await this.toBytes());
    } catch (error) {
      throw DocumentSaveError.fromError(path, error);
    }
    this.logger.info(`[PdfStructureDocument] Saved ${path}`);
  }
}
