/**
 * Extraction Type Definitions
 *
 * - ExtractionStrategy: how a file extension is turned into an image
 * - ImagePayload: the single still image handed to the classifier
 * - PdfRasterizer: the external PDF-to-image capability (page 1 only here)
 */

/** How a supported extension is turned into a payload */
export type ExtractionStrategy = 'pdf-first-page' | 'image' | 'unsupported';

/** Encodings the classifier receives. Anything else is re-encoded to PNG. */
export type PayloadMediaType = 'image/png' | 'image/jpeg';

/** Where the pixels came from */
export type PayloadSource = 'pdf-page' | 'image';

/** A single still image extracted from a source file. Never persisted. */
export interface ImagePayload {
  data: Buffer;
  mediaType: PayloadMediaType;
  source: PayloadSource;
  width: number;
  height: number;
}

export interface RasterizeOptions {
  dpi: number;
  /** 1-based page number (default: 1) */
  page?: number;
}

/** Renders one page of a PDF on disk to PNG bytes */
export type PdfRasterizer = (pdfPath: string, options: RasterizeOptions) => Promise<Buffer>;
