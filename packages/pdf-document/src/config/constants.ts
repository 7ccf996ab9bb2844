/**
 * Configuration constants for MagickRegionRenderer
 */
export const RENDERING = {
  /**
   * Resolution of PDF user space (1 point = 1/72 inch)
   */
  BASE_DPI: 72,

  /**
   * JPEG quality for rendered regions
   */
  JPEG_QUALITY: 90,

  /**
   * Kill ImageMagick when a single region takes longer than this
   */
  DEFAULT_TIMEOUT_MS: 60000,

  /**
   * Prefix of the per-render temporary directory
   */
  TEMP_DIR_PREFIX: 'tagsense-render-',
} as const;

/**
 * Owner name of layout attribute objects (BBox lives here)
 */
export const LAYOUT_OWNER = 'Layout';
