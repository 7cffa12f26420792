/**
 * Reply Parser
 *
 * Maps the model's free-text reply onto a ClassificationResult. Small vision
 * models rarely answer exactly in template, so the parser accepts:
 * - `<think>` blocks, code fences, wrapping quotes/backticks, markdown emphasis
 * - a leading `Filename:` style label and a trailing file extension
 * - dates as YYYY-MM-DD with `-` `.` `/` `_` separators, optionally bracketed,
 *   and US MM/DD/YYYY
 * - `-`, en/em dashes and `|` between fields
 * - a labeled block (`Category:`, `Date:`, `Sender:`, `Summary:` or
 *   `Year:`, `Subject:`, `Location:`)
 *
 * `0000-00-00` and `0000` mean unknown and map to null. A reply with no
 * recognizable structure becomes `unrecognized`; parsing never throws.
 */

import { CalendarDateSchema } from './types.js';
import type { CalendarDate, ClassificationResult } from './types.js';

// ---------------------------------------------------------------------------
// Patterns
// ---------------------------------------------------------------------------

const THINK_BLOCK = /<think>[\s\S]*?<\/think>/gi;
const CODE_FENCE = /```[a-z]*/gi;
const EMPHASIS = /\*\*|__/g;
const BULLET = /^(?:[-*•]\s+|\d+[.)]\s+)/;
const WRAPPING = /^["'`“”‘’]+|["'`“”‘’]+$/g;
const LEADING_LABEL = /^(?:file\s*name|filename|name|document|photo|answer|result)\s*:\s*/i;
const TRAILING_EXTENSION = /\.(?:pdf|jpe?g|png|tiff?|webp|gif|heic)$/i;

const DATE_PREFIX =
  /^[[(]?\s*(?:(\d{4})[-./_](\d{1,2})[-./_](\d{1,2})|(\d{1,2})[-./](\d{1,2})[-./](\d{4}))\s*[\])]?/;
const YEAR_PREFIX = /^[[(]?(\d{4})[\])]?\s*[-–—|:]\s+/;
const AFTER_DATE = /^(?:\s*[-–—|:_]\s*|\s+)/;
const FIELD_SEPARATOR = /\s+[-–—|]\s+/;
const LABELED_LINE = /^([A-Za-z][A-Za-z ]{0,20}?)\s*:\s*(.*)$/;

const MIN_YEAR = 1800;
const MAX_YEAR = 2199;

type LabelKey = 'category' | 'date' | 'year' | 'sender' | 'summary' | 'subject' | 'location';

const LABEL_ALIASES: Record<string, LabelKey> = {
  category: 'category',
  type: 'category',
  kind: 'category',
  date: 'date',
  year: 'year',
  sender: 'sender',
  from: 'sender',
  issuer: 'sender',
  summary: 'summary',
  description: 'summary',
  title: 'summary',
  subject: 'subject',
  location: 'location',
  place: 'location',
};

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

export function parseClassificationReply(text: string): ClassificationResult {
  const body = stripWrappers(text);
  const lines = body
    .split(/\r?\n/)
    .map(cleanLine)
    .filter((line) => line.length > 0);

  const labeled = parseLabeledBlock(lines);
  if (labeled) return labeled;

  for (const line of lines) {
    const result = parseTemplateLine(line) ?? parseTemplateLine(afterLabel(line));
    if (result) return result;
  }

  return { kind: 'unrecognized', rawText: text.trim() };
}

// ---------------------------------------------------------------------------
// Cleanup
// ---------------------------------------------------------------------------

function stripWrappers(text: string): string {
  let body = text.replace(THINK_BLOCK, '');
  // A reply cut off mid-reasoning can leave only the closing tag
  const closeTag = body.toLowerCase().lastIndexOf('</think>');
  if (closeTag !== -1) body = body.slice(closeTag + '</think>'.length);
  return body.replace(CODE_FENCE, '').replace(EMPHASIS, '');
}

function cleanLine(line: string): string {
  let cleaned = line.trim().replace(BULLET, '').trim();
  cleaned = cleaned.replace(WRAPPING, '').trim();
  cleaned = cleaned.replace(LEADING_LABEL, '').replace(WRAPPING, '').trim();
  cleaned = cleaned.replace(/\.+$/, '').replace(TRAILING_EXTENSION, '').replace(/\.+$/, '');
  return cleaned.trim();
}

/** "Here is the filename: 2025-..." -> "2025-..." */
function afterLabel(line: string): string {
  const match = LABELED_LINE.exec(line);
  return match ? match[2].trim() : '';
}

// ---------------------------------------------------------------------------
// Template lines
// ---------------------------------------------------------------------------

function parseTemplateLine(line: string): ClassificationResult | undefined {
  const dated = matchDatePrefix(line);
  if (dated) {
    const [sender, summary] = splitFields(dated.rest);
    return { kind: 'document', date: dated.date, sender, summary };
  }

  const yearMatch = YEAR_PREFIX.exec(line);
  if (yearMatch) {
    const year = Number(yearMatch[1]);
    if (year !== 0 && (year < MIN_YEAR || year > MAX_YEAR)) return undefined;
    const [subject, location] = splitFields(line.slice(yearMatch[0].length));
    return { kind: 'photo', year: year === 0 ? null : year, subject, location };
  }

  return undefined;
}

function matchDatePrefix(value: string): { date: CalendarDate | null; rest: string } | undefined {
  const match = DATE_PREFIX.exec(value);
  if (!match) return undefined;

  const afterDate = value.slice(match[0].length);
  const separator = AFTER_DATE.exec(afterDate);
  if (afterDate.length > 0 && !separator) return undefined;

  const [year, month, day] =
    match[1] !== undefined
      ? [match[1], match[2], match[3]]
      : [match[6], match[4], match[5]];

  return {
    date: toCalendarDate(Number(year), Number(month), Number(day)),
    rest: separator ? afterDate.slice(separator[0].length) : '',
  };
}

function toCalendarDate(year: number, month: number, day: number): CalendarDate | null {
  const parsed = CalendarDateSchema.safeParse({ year, month, day });
  return parsed.success ? parsed.data : null;
}

/** First field, then everything after it joined back with " - " */
function splitFields(rest: string): [string, string] {
  const parts = rest
    .split(FIELD_SEPARATOR)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
  const [first = '', ...others] = parts;
  return [first, others.join(' - ')];
}

// ---------------------------------------------------------------------------
// Labeled block
// ---------------------------------------------------------------------------

function parseLabeledBlock(lines: string[]): ClassificationResult | undefined {
  const fields = new Map<LabelKey, string>();
  for (const line of lines) {
    const match = LABELED_LINE.exec(line);
    if (!match) continue;
    const key = LABEL_ALIASES[match[1].trim().toLowerCase()];
    if (key && !fields.has(key)) {
      fields.set(key, match[2].replace(WRAPPING, '').replace(/\.+$/, '').trim());
    }
  }

  const recognized = [...fields.keys()].filter((key) => key !== 'category');
  if (recognized.length < 2) return undefined;

  const category = fields.get('category')?.toLowerCase() ?? '';
  const sender = fields.get('sender') ?? '';
  const summary = fields.get('summary') ?? '';
  const subject = fields.get('subject') ?? '';
  const location = fields.get('location') ?? '';

  const looksLikePhoto =
    category.includes('photo') ||
    (!category.includes('document') && !sender && !summary && Boolean(subject || location));

  if (looksLikePhoto) {
    return {
      kind: 'photo',
      year: parseYearValue(fields.get('year') ?? fields.get('date') ?? ''),
      subject,
      location,
    };
  }

  if (sender || summary || category.includes('document')) {
    return {
      kind: 'document',
      date: matchDatePrefix(fields.get('date') ?? '')?.date ?? null,
      sender,
      summary,
    };
  }

  return undefined;
}

function parseYearValue(value: string): number | null {
  const match = /^\d{4}/.exec(value);
  if (!match) return null;
  const year = Number(match[0]);
  return year >= MIN_YEAR && year <= MAX_YEAR ? year : null;
}
