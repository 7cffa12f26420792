/**
 * Tests for Page Extractor
 *
 * Tests cover:
 * - Extension -> strategy mapping honours the configured list
 * - JPEG/PNG passthrough (same buffer, no re-encode)
 * - TIFF re-encoded to PNG
 * - Oversized image downscaled to the dimension cap
 * - Corrupt image -> DECODE_FAILED
 * - PDF: first page rendered via the rasterizer at the configured DPI
 * - PDF with zero pages -> EMPTY_DOCUMENT, rasterizer never called
 * - Corrupt PDF -> DECODE_FAILED
 * - Rasterizer failure -> DECODE_FAILED
 * - Unsupported extension -> UNSUPPORTED_TYPE
 * - Unreadable file -> TransientFileError
 *
 * Images are generated with sharp and PDFs with pdf-lib; file reads and the
 * rasterizer are injected.
 */

import { describe, it, expect, vi } from 'vitest';
import { PDFDocument } from 'pdf-lib';
import sharp from 'sharp';
import {
  createPageExtractor,
  getExtractionStrategy,
  normalizeImage,
  countPdfPages,
} from '../page-extractor.js';
import { ExtractionError, TransientFileError } from '../../errors.js';
import type { PdfRasterizer } from '../types.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function solidImage(width: number, height: number) {
  return sharp({
    create: { width, height, channels: 3, background: { r: 255, g: 255, b: 255 } },
  });
}

async function createPdfBuffer(pages: number): Promise<Buffer> {
  const doc = await PDFDocument.create();
  for (let i = 0; i < pages; i++) {
    doc.addPage([200, 300]);
  }
  return Buffer.from(await doc.save());
}

function extractorWith(files: Record<string, Buffer>, rasterizer?: PdfRasterizer) {
  const rasterize = vi.fn<PdfRasterizer>(rasterizer ?? (async () => solidImage(10, 10).png().toBuffer()));
  const extractor = createPageExtractor({
    supportedExtensions: ['.pdf', '.jpg', '.png', '.tif'],
    pdfRenderDpi: 200,
    maxImageDimension: 2048,
    rasterizer: rasterize,
    readFile: async (path) => {
      const data = files[path];
      if (!data) {
        throw Object.assign(new Error(`ENOENT: no such file, open '${path}'`), { code: 'ENOENT' });
      }
      return data;
    },
  });
  return { extractor, rasterize };
}

async function expectExtractionError(promise: Promise<unknown>, reason: string): Promise<void> {
  const err = await promise.catch((e: unknown) => e);
  expect(err).toBeInstanceOf(ExtractionError);
  expect(err).toMatchObject({ code: 'EXTRACTION_FAILED', reason });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('getExtractionStrategy', () => {
  const defaults = ['.pdf', '.jpg', '.png'];

  it('maps PDFs and images case-insensitively', () => {
    expect(getExtractionStrategy('/scans/Scan001.PDF', defaults)).toBe('pdf-first-page');
    expect(getExtractionStrategy('/scans/photo.JPG', defaults)).toBe('image');
    expect(getExtractionStrategy('/scans/photo.png', defaults)).toBe('image');
  });

  it('rejects known formats that are not enabled', () => {
    expect(getExtractionStrategy('/scans/photo.tiff', defaults)).toBe('unsupported');
  });

  it('rejects enabled extensions the extractor cannot read', () => {
    expect(getExtractionStrategy('/scans/notes.docx', ['.docx'])).toBe('unsupported');
  });

  it('rejects files without an extension', () => {
    expect(getExtractionStrategy('/scans/README', defaults)).toBe('unsupported');
  });
});

describe('normalizeImage', () => {
  it('passes a small PNG through as the same buffer', async () => {
    const png = await solidImage(40, 30).png().toBuffer();

    const payload = await normalizeImage(png, 'image', 2048);

    expect(payload.data).toBe(png);
    expect(payload).toMatchObject({ mediaType: 'image/png', source: 'image', width: 40, height: 30 });
  });

  it('passes a small JPEG through as the same buffer', async () => {
    const jpeg = await solidImage(16, 16).jpeg().toBuffer();

    const payload = await normalizeImage(jpeg, 'image', 2048);

    expect(payload.data).toBe(jpeg);
    expect(payload.mediaType).toBe('image/jpeg');
  });

  it('re-encodes TIFF to PNG', async () => {
    const tiff = await solidImage(20, 10).tiff().toBuffer();

    const payload = await normalizeImage(tiff, 'image', 2048);

    expect(payload.mediaType).toBe('image/png');
    expect(payload.data.subarray(1, 4).toString('ascii')).toBe('PNG');
    expect(payload).toMatchObject({ width: 20, height: 10 });
  });

  it('downscales an oversized image to fit the cap, keeping aspect ratio', async () => {
    const png = await solidImage(3000, 1500).png().toBuffer();

    const payload = await normalizeImage(png, 'pdf-page', 2048);

    expect(payload.data).not.toBe(png);
    expect(payload).toMatchObject({ mediaType: 'image/png', source: 'pdf-page', width: 2048, height: 1024 });
  });

  it('keeps JPEG encoding when downscaling a JPEG', async () => {
    const jpeg = await solidImage(600, 300).jpeg().toBuffer();

    const payload = await normalizeImage(jpeg, 'image', 300);

    expect(payload).toMatchObject({ mediaType: 'image/jpeg', width: 300, height: 150 });
  });

  it('throws DECODE_FAILED for bytes that are not an image', async () => {
    await expectExtractionError(
      normalizeImage(Buffer.from('definitely not an image'), 'image', 2048),
      'DECODE_FAILED',
    );
  });
});

describe('countPdfPages', () => {
  it('counts pages of a valid PDF', async () => {
    expect(await countPdfPages(await createPdfBuffer(3))).toBe(3);
  });

  it('throws DECODE_FAILED for an empty buffer', async () => {
    await expectExtractionError(countPdfPages(Buffer.alloc(0)), 'DECODE_FAILED');
  });
});

describe('createPageExtractor', () => {
  it('renders the first page of a PDF at the configured DPI', async () => {
    const pdf = await createPdfBuffer(2);
    const { extractor, rasterize } = extractorWith({ '/scans/bill.pdf': pdf });

    const payload = await extractor.extract('/scans/bill.pdf');

    expect(rasterize).toHaveBeenCalledWith('/scans/bill.pdf', { dpi: 200, page: 1 });
    expect(payload).toMatchObject({ source: 'pdf-page', mediaType: 'image/png', width: 10, height: 10 });
  });

  it('fails with EMPTY_DOCUMENT for a PDF with no pages', async () => {
    const pdf = await createPdfBuffer(0);
    const { extractor, rasterize } = extractorWith({ '/scans/blank.pdf': pdf });

    await expectExtractionError(extractor.extract('/scans/blank.pdf'), 'EMPTY_DOCUMENT');
    expect(rasterize).not.toHaveBeenCalled();
  });

  it('fails with DECODE_FAILED for a corrupt PDF', async () => {
    const { extractor } = extractorWith({ '/scans/broken.pdf': Buffer.from('this is not a pdf') });

    await expectExtractionError(extractor.extract('/scans/broken.pdf'), 'DECODE_FAILED');
  });

  it('wraps rasterizer failures as DECODE_FAILED', async () => {
    const pdf = await createPdfBuffer(1);
    const { extractor } = extractorWith({ '/scans/odd.pdf': pdf }, async () => {
      throw new Error('Syntax Error: Couldn\'t find trailer dictionary');
    });

    await expectExtractionError(extractor.extract('/scans/odd.pdf'), 'DECODE_FAILED');
  });

  it('passes a JPEG scan through untouched', async () => {
    const jpeg = await solidImage(50, 40).jpeg().toBuffer();
    const { extractor, rasterize } = extractorWith({ '/scans/photo.jpg': jpeg });

    const payload = await extractor.extract('/scans/photo.jpg');

    expect(payload.data).toBe(jpeg);
    expect(payload.source).toBe('image');
    expect(rasterize).not.toHaveBeenCalled();
  });

  it('re-encodes an enabled TIFF', async () => {
    const tiff = await solidImage(8, 8).tiff().toBuffer();
    const { extractor } = extractorWith({ '/scans/old.tif': tiff });

    const payload = await extractor.extract('/scans/old.tif');

    expect(payload.mediaType).toBe('image/png');
  });

  it('fails with UNSUPPORTED_TYPE for other extensions', async () => {
    const { extractor } = extractorWith({ '/scans/notes.txt': Buffer.from('hello') });

    await expectExtractionError(extractor.extract('/scans/notes.txt'), 'UNSUPPORTED_TYPE');
  });

  it('reports a missing file as transient', async () => {
    const { extractor } = extractorWith({});

    await expect(extractor.extract('/scans/gone.png')).rejects.toBeInstanceOf(TransientFileError);
  });
});
