import type { LoggerMethods } from '@tagsense/logger';
import type {
  BoundingBox,
  RegionRenderer,
  RenderedImage,
} from '@tagsense/model';

import { spawnAsync } from '@tagsense/shared';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { RENDERING } from '../config/constants';
import { PageRenderError } from '../errors/pdf-document-error';

/** Options for region rendering */
export interface MagickRegionRendererOptions {
  /** Kill ImageMagick after this many milliseconds (default: 60000) */
  timeoutMs?: number;
  /** Parent of the per-render temporary directories (default: OS temp) */
  tempRoot?: string;
}

/** ImageMagick crop geometry in device pixels */
export interface CropGeometry {
  width: number;
  height: number;
  x: number;
  y: number;
}

/**
 * Convert a user-space box to a crop rectangle on a page rendered at
 * `zoom` (origin top-left of the media box)
 */
export function toCropGeometry(
  box: BoundingBox,
  mediaBox: BoundingBox,
  zoom: number,
): CropGeometry {
  return {
    width: Math.max(1, Math.ceil((box.right - box.left) * zoom)),
    height: Math.max(1, Math.ceil((box.top - box.bottom) * zoom)),
    x: Math.max(0, Math.floor((box.left - mediaBox.left) * zoom)),
    y: Math.max(0, Math.floor((mediaBox.top - box.top) * zoom)),
  };
}

/**
 * Renders a region of a PDF page to JPEG using ImageMagick.
 *
 * ## System Requirements
 * - ImageMagick (`brew install imagemagick`)
 * - Ghostscript (`brew install ghostscript`)
 */
export class MagickRegionRenderer implements RegionRenderer {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly pdfPath: string,
    private readonly mediaBox: (page: number) => BoundingBox,
    private readonly options: MagickRegionRendererOptions = {},
  ) {}

  /**
   * @param page - Zero-based page index
   * @param zoom - Scale over 72 DPI
   * @throws PageRenderError when ImageMagick fails or produces no image
   */
  async renderRegion(
    page: number,
    box: BoundingBox,
    zoom: number,
  ): Promise<RenderedImage> {
    const density = Math.round(RENDERING.BASE_DPI * zoom);
    const crop = toCropGeometry(box, this.mediaBox(page), zoom);
    const tempDir = await mkdtemp(
      join(this.options.tempRoot ?? tmpdir(), RENDERING.TEMP_DIR_PREFIX),
    );
    const outputPath = join(tempDir, 'region.jpg');

    this.logger.debug(
      `[MagickRegionRenderer] Rendering page ${page + 1} at ${density} DPI, crop ${crop.width}x${crop.height}+${crop.x}+${crop.y}`,
    );

    try {
      const result = await spawnAsync(
        'magick',
        [
          '-density',
          density.toString(),
          `${this.pdfPath}[${page}]`,
          '-crop',
          `${crop.width}x${crop.height}+${crop.x}+${crop.y}`,
          '+repage',
          '-background',
          'white',
          '-alpha',
          'remove',
          '-alpha',
          'off',
          '-quality',
          RENDERING.JPEG_QUALITY.toString(),
          outputPath,
        ],
        { timeout: this.options.timeoutMs ?? RENDERING.DEFAULT_TIMEOUT_MS },
      );

      if (result.code !== 0) {
        const reason = result.signal
          ? `killed by ${result.signal}`
          : result.stderr.trim() || 'Unknown error';
        throw new PageRenderError(
          `[MagickRegionRenderer] Failed to render page ${page + 1}: ${reason}`,
          page,
        );
      }

      const data = new Uint8Array(await readFile(outputPath));
      return { data, mediaType: 'image/jpeg' };
    } catch (error) {
      if (error instanceof PageRenderError) throw error;
      throw PageRenderError.fromError(page, error);
    } finally {
      await rm(tempDir, { recursive: true, force: true });
    }
  }
}
