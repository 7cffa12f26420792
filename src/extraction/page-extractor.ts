/**
 * Page Extractor
 *
 * Turns a stable file on disk into the single still image the classifier
 * sees:
 * - PDF: page count checked with pdf-lib, then page 1 rendered by the
 *   rasterizer at a fixed DPI
 * - JPEG/PNG: passed through unchanged after a full decode check
 * - TIFF/WebP/GIF: re-encoded to PNG
 * - Anything larger than maxImageDimension on its longest side is downscaled
 *
 * Stateless: a pure function of the file's bytes (plus the rasterizer).
 * Errors: ExtractionError with UNSUPPORTED_TYPE / EMPTY_DOCUMENT /
 * DECODE_FAILED, or TransientFileError if the file cannot be read.
 */

import { readFile as fsReadFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { PDFDocument } from 'pdf-lib';
import sharp from 'sharp';
import {
  ExtractionError,
  TransientFileError,
  errorMessage,
  systemErrorCode,
} from '../errors.js';
import type {
  ExtractionStrategy,
  ImagePayload,
  PayloadSource,
  PdfRasterizer,
} from './types.js';

// ---------------------------------------------------------------------------
// Extension mapping
// ---------------------------------------------------------------------------

/** Every extension the extractor knows how to read */
export const EXTENSION_STRATEGIES = new Map<string, ExtractionStrategy>([
  ['.pdf', 'pdf-first-page'],
  ['.jpg', 'image'],
  ['.jpeg', 'image'],
  ['.png', 'image'],
  ['.tif', 'image'],
  ['.tiff', 'image'],
  ['.webp', 'image'],
  ['.gif', 'image'],
]);

/**
 * Returns the extraction strategy for a path, or 'unsupported' when the
 * extension is unknown or not enabled in the configured list.
 */
export function getExtractionStrategy(
  filePath: string,
  supportedExtensions: readonly string[],
): ExtractionStrategy {
  const ext = extname(filePath).toLowerCase();
  if (!supportedExtensions.includes(ext)) return 'unsupported';
  return EXTENSION_STRATEGIES.get(ext) ?? 'unsupported';
}

// ---------------------------------------------------------------------------
// Extractor
// ---------------------------------------------------------------------------

export interface PageExtractorOptions {
  supportedExtensions: readonly string[];
  pdfRenderDpi: number;
  maxImageDimension: number;
  rasterizer: PdfRasterizer;
  readFile?: (path: string) => Promise<Buffer>;
}

export interface PageExtractor {
  extract(filePath: string): Promise<ImagePayload>;
}

const LOCKED_CODES = new Set(['ENOENT', 'EBUSY', 'EPERM', 'EACCES']);

export function createPageExtractor(options: PageExtractorOptions): PageExtractor {
  const readFile: (path: string) => Promise<Buffer> =
    options.readFile ?? ((path) => fsReadFile(path));

  async function readSource(filePath: string): Promise<Buffer> {
    try {
      return await readFile(filePath);
    } catch (err) {
      const code = systemErrorCode(err);
      if (code !== undefined && LOCKED_CODES.has(code)) {
        throw new TransientFileError(filePath, `Cannot read ${basename(filePath)} (${code})`, {
          cause: err,
        });
      }
      throw new ExtractionError('DECODE_FAILED', `Failed to read ${basename(filePath)}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async function extractPdf(filePath: string): Promise<ImagePayload> {
    const bytes = await readSource(filePath);
    const pageCount = await countPdfPages(bytes, filePath);
    if (pageCount === 0) {
      throw new ExtractionError('EMPTY_DOCUMENT', `${basename(filePath)} has no pages`);
    }

    let raster: Buffer;
    try {
      raster = await options.rasterizer(filePath, { dpi: options.pdfRenderDpi, page: 1 });
    } catch (err) {
      if (err instanceof ExtractionError) throw err;
      throw new ExtractionError(
        'DECODE_FAILED',
        `Failed to render first page of ${basename(filePath)}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    return normalizeImage(raster, 'pdf-page', options.maxImageDimension);
  }

  return {
    async extract(filePath) {
      const strategy = getExtractionStrategy(filePath, options.supportedExtensions);

      switch (strategy) {
        case 'pdf-first-page':
          return extractPdf(filePath);
        case 'image':
          return normalizeImage(await readSource(filePath), 'image', options.maxImageDimension);
        case 'unsupported': {
          const ext = extname(filePath) || '(no extension)';
          throw new ExtractionError('UNSUPPORTED_TYPE', `Unsupported file type: ${ext}`);
        }
      }
    },
  };
}

// ---------------------------------------------------------------------------
// PDF page count
// ---------------------------------------------------------------------------

/**
 * Count pages with pdf-lib. Encrypted files are still counted; whether they
 * render is the rasterizer's problem.
 */
export async function countPdfPages(bytes: Buffer, filePath = 'document'): Promise<number> {
  if (bytes.length === 0) {
    throw new ExtractionError('DECODE_FAILED', `${basename(filePath)} is empty`);
  }
  try {
    // pdf-lib's parser expects a plain Uint8Array, not a Node.js Buffer
    const doc = await PDFDocument.load(new Uint8Array(bytes), { ignoreEncryption: true });
    return doc.getPageCount();
  } catch (err) {
    throw new ExtractionError(
      'DECODE_FAILED',
      `${basename(filePath)} is not a readable PDF: ${errorMessage(err)}`,
      { cause: err },
    );
  }
}

// ---------------------------------------------------------------------------
// Image normalization
// ---------------------------------------------------------------------------

/**
 * Validate that the bytes decode, then return them as JPEG or PNG no larger
 * than `maxDimension` on the longest side. JPEG/PNG within bounds are
 * returned as the same buffer.
 */
export async function normalizeImage(
  buffer: Buffer,
  source: PayloadSource,
  maxDimension: number,
): Promise<ImagePayload> {
  let format: string | undefined;
  let width: number | undefined;
  let height: number | undefined;
  try {
    // stats() forces a full decode, metadata() alone only reads the header
    ({ format, width, height } = await sharp(buffer).metadata());
    await sharp(buffer).stats();
  } catch (err) {
    throw new ExtractionError('DECODE_FAILED', `Image could not be decoded: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  if (!format || !width || !height) {
    throw new ExtractionError('DECODE_FAILED', 'Image has no recognizable format or dimensions');
  }

  const oversized = Math.max(width, height) > maxDimension;
  if (!oversized && (format === 'jpeg' || format === 'png')) {
    return {
      data: buffer,
      mediaType: format === 'png' ? 'image/png' : 'image/jpeg',
      source,
      width,
      height,
    };
  }

  try {
    let pipeline = sharp(buffer);
    if (oversized) {
      pipeline = pipeline.resize({
        width: maxDimension,
        height: maxDimension,
        fit: 'inside',
        withoutEnlargement: true,
      });
    }
    const asJpeg = format === 'jpeg';
    const { data, info } = await (asJpeg ? pipeline.jpeg({ quality: 90 }) : pipeline.png()).toBuffer({
      resolveWithObject: true,
    });
    return {
      data,
      mediaType: asJpeg ? 'image/jpeg' : 'image/png',
      source,
      width: info.width,
      height: info.height,
    };
  } catch (err) {
    throw new ExtractionError('DECODE_FAILED', `Image could not be re-encoded: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}
