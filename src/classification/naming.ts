/**
 * File Naming Module
 *
 * Builds the target filename from a classification:
 *   Documents:    "YYYY-MM-DD - Sender - Summary.ext"
 *   Photos:       "YYYY - Subject - Location.ext"
 *   Unrecognized: "Unprocessed - <original stem>.ext"
 *
 * Examples:
 *   - "2025-12-23 - FloridaPower - Electric Bill.pdf"
 *   - "2003 - Family - Beach Vacation.jpg"
 *   - "Unprocessed - Scan0042.pdf"
 *
 * Pure function: no side effects, no I/O. The same inputs always produce the
 * same name. Unknown dates fall back to the file's creation date in local time.
 */

import { basename, extname } from 'node:path';
import type { CalendarDate, ClassificationResult, TargetFilename } from './types.js';

export const UNPROCESSED_PREFIX = 'Unprocessed - ';
export const FIELD_JOINER = ' - ';

const UNKNOWN_FIELD = 'Unknown';

/** Common filesystems cap a single name at 255 bytes */
export const MAX_NAME_BYTES = 255;
/** Room for a collision suffix up to " (999)" */
const COLLISION_SUFFIX_BYTES = ' (999)'.length;

export interface NamingOptions {
  /** Creation time of the original file; used when the date or year is unknown */
  createdAt: Date;
  /** Upper bound on the full filename in characters, extension included */
  maxLength: number;
}

// ---------------------------------------------------------------------------
// Sanitization
// ---------------------------------------------------------------------------

/**
 * Make a single name field safe on every common filesystem.
 *
 * Replaces: / \ : * ? " < > | and control characters with '-'
 * Collapses runs of dashes and whitespace, trims spaces, dots and dashes
 * from both ends. An empty result becomes "Unknown".
 */
export function sanitizeField(value: string): string {
  const cleaned = value
    .normalize('NFC')
    .replace(/[/\\:*?"<>|\u0000-\u001f\u007f]/g, '-')
    .replace(/\s+/g, ' ')
    .replace(/-{2,}/g, '-')
    .replace(/^[\s.-]+|[\s.-]+$/g, '');
  return cleaned.length > 0 ? cleaned : UNKNOWN_FIELD;
}

/** Cut to at most `maxUnits` UTF-16 code units without splitting a surrogate pair. */
export function truncateText(value: string, maxUnits: number): string {
  let result = '';
  for (const char of value) {
    if (result.length + char.length > maxUnits) break;
    result += char;
  }
  return result;
}

/** Cut to at most `maxBytes` of UTF-8 without splitting a character. */
export function truncateBytes(value: string, maxBytes: number): string {
  let result = '';
  let bytes = 0;
  for (const char of value) {
    const size = Buffer.byteLength(char);
    if (bytes + size > maxBytes) break;
    result += char;
    bytes += size;
  }
  return result;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

export function formatCalendarDate({ year, month, day }: CalendarDate): string {
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

function localCalendarDate(date: Date): CalendarDate {
  return { year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() };
}

function canonicalExtension(originalPath: string, result: ClassificationResult): string {
  const extension = extname(originalPath).toLowerCase();
  if (result.kind === 'photo' && extension === '.jpeg') return '.jpg';
  return extension;
}

// ---------------------------------------------------------------------------
// Length cap
// ---------------------------------------------------------------------------

interface StemLimits {
  maxChars: number;
  maxBytes: number;
}

/** Drop trailing separators a cut leaves behind; keep at least one character. */
function tidyCut(original: string, cut: string): string {
  const trimmed = cut.replace(/[\s.-]+$/, '');
  return trimmed.length > 0 ? trimmed : truncateText(original, 1);
}

/**
 * Join prefix and fields, shortening the last field first and then the middle
 * one until the stem fits both the character and the UTF-8 byte limit. The
 * prefix is never cut.
 */
function fitFields(prefix: string, fields: [string, string], limits: StemLimits): string {
  const parts: [string, string] = [...fields];
  const stem = () => [prefix, ...parts].join(FIELD_JOINER);

  for (const index of [1, 0] as const) {
    const overflow = stem().length - limits.maxChars;
    if (overflow > 0) {
      const keep = Math.max(1, parts[index].length - overflow);
      parts[index] = tidyCut(parts[index], truncateText(parts[index], keep));
    }

    const byteOverflow = Buffer.byteLength(stem()) - limits.maxBytes;
    if (byteOverflow > 0) {
      const keep = Math.max(1, Buffer.byteLength(parts[index]) - byteOverflow);
      parts[index] = tidyCut(parts[index], truncateBytes(parts[index], keep));
    }
  }

  return stem();
}

// ---------------------------------------------------------------------------
// Filename Generation
// ---------------------------------------------------------------------------

/**
 * Build the target filename for a classified file.
 *
 * @param originalPath - Current path of the file (only the name is used)
 * @param result - Classification of the file's first page or image
 */
export function buildTargetFilename(
  originalPath: string,
  result: ClassificationResult,
  { createdAt, maxLength }: NamingOptions,
): TargetFilename {
  const extension = canonicalExtension(originalPath, result);
  const limits: StemLimits = {
    maxChars: Math.max(1, maxLength - extension.length),
    maxBytes: Math.max(1, MAX_NAME_BYTES - Buffer.byteLength(extension) - COLLISION_SUFFIX_BYTES),
  };

  let stem: string;
  switch (result.kind) {
    case 'document': {
      const date = formatCalendarDate(result.date ?? localCalendarDate(createdAt));
      stem = fitFields(date, [sanitizeField(result.sender), sanitizeField(result.summary)], limits);
      break;
    }
    case 'photo': {
      const year = pad(result.year ?? createdAt.getFullYear(), 4);
      stem = fitFields(year, [sanitizeField(result.subject), sanitizeField(result.location)], limits);
      break;
    }
    case 'unrecognized': {
      const originalStem = sanitizeField(basename(originalPath, extname(originalPath)));
      const prefixed = originalStem.startsWith(UNPROCESSED_PREFIX)
        ? originalStem
        : `${UNPROCESSED_PREFIX}${originalStem}`;
      stem = truncateBytes(truncateText(prefixed, limits.maxChars), limits.maxBytes).replace(/[\s.-]+$/, '');
      break;
    }
  }

  return { stem, extension, filename: `${stem}${extension}` };
}
