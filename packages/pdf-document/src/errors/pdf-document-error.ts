/**
 * PdfDocumentError
 *
 * Base error class for failures while reading, rendering or writing a PDF.
 */
export class PdfDocumentError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PdfDocumentError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * DocumentOpenError
 *
 * Error thrown when the input file cannot be read or is not a PDF pdf-lib
 * can parse.
 */
export class DocumentOpenError extends PdfDocumentError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DocumentOpenError';
  }

  static fromError(path: string, error: unknown): DocumentOpenError {
    return new DocumentOpenError(
      `Failed to open PDF ${path}: ${PdfDocumentError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * NoStructureTreeError
 *
 * Error thrown when the document is not tagged.
 */
export class NoStructureTreeError extends PdfDocumentError {
  constructor(message = 'PDF has no structure tree') {
    super(message);
    this.name = 'NoStructureTreeError';
  }
}

/**
 * DocumentSaveError
 */
export class DocumentSaveError extends PdfDocumentError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DocumentSaveError';
  }

  static fromError(path: string, error: unknown): DocumentSaveError {
    return new DocumentSaveError(
      `Failed to save PDF ${path}: ${PdfDocumentError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * PageRenderError
 *
 * Error thrown when ImageMagick fails to produce an image of a page region.
 */
export class PageRenderError extends PdfDocumentError {
  constructor(
    message: string,
    readonly page: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'PageRenderError';
  }

  static fromError(page: number, error: unknown): PageRenderError {
    return new PageRenderError(
      `[MagickRegionRenderer] Failed to render page ${page + 1}: ${PdfDocumentError.getErrorMessage(error)}`,
      page,
      { cause: error },
    );
  }
}
