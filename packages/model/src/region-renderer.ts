import type { BoundingBox } from './structure-node';

/**
 * Encoded raster image
 */
export interface RenderedImage {
  data: Uint8Array;
  mediaType: string;
}

/**
 * Renders a rectangle of a page to an image.
 */
export interface RegionRenderer {
  /**
   * @param page - Zero-based page index
   * @param box - Region in page user space
   * @param zoom - Scale factor (1 = 72 DPI)
   */
  renderRegion(
    page: number,
    box: BoundingBox,
    zoom: number,
  ): Promise<RenderedImage>;
}
