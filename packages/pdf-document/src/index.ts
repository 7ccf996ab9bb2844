export {
  PdfStructureDocument,
  type ContentIndexFactory,
} from './structure/pdf-structure-document';
export {
  PdfAttributeEntry,
  PdfStructureNode,
  StructureTree,
} from './structure/pdf-structure-node';
export {
  MapContentIndex,
  buildPdfjsContentIndex,
  type PageContentIndex,
} from './content/pdfjs-content-index';
export type { MarkedContent } from './content/marked-content-bounds';
export {
  MagickRegionRenderer,
  toCropGeometry,
  type CropGeometry,
  type MagickRegionRendererOptions,
} from './rendering/magick-region-renderer';
export { RENDERING } from './config/constants';
export {
  DocumentOpenError,
  DocumentSaveError,
  NoStructureTreeError,
  PageRenderError,
  PdfDocumentError,
} from './errors/pdf-document-error';
