/**
 * Tests for the Reply Parser
 *
 * Tests cover:
 * - Document and photo templates
 * - 0000-00-00 / 0000 as unknown
 * - Noise around the answer: think blocks, fences, quotes, labels, extensions
 * - Date variants: slashes, US order, brackets
 * - Field separators: en dash, pipe
 * - Labeled Category/Date/Sender/Summary and Year/Subject/Location blocks
 * - Anything else -> unrecognized with the raw text
 */

import { describe, it, expect } from 'vitest';
import { parseClassificationReply } from '../response-parser.js';

describe('parseClassificationReply', () => {
  // -------------------------------------------------------------------------
  // Templates
  // -------------------------------------------------------------------------

  describe('templates', () => {
    it('parses a document reply', () => {
      expect(parseClassificationReply('2025-12-23 - FloridaPower - Electric Bill')).toEqual({
        kind: 'document',
        date: { year: 2025, month: 12, day: 23 },
        sender: 'FloridaPower',
        summary: 'Electric Bill',
      });
    });

    it('parses a photo reply', () => {
      expect(parseClassificationReply('2003 - Family - Beach Vacation')).toEqual({
        kind: 'photo',
        year: 2003,
        subject: 'Family',
        location: 'Beach Vacation',
      });
    });

    it('maps 0000-00-00 to an unknown date', () => {
      expect(parseClassificationReply('0000-00-00 - Elm Primary School - Permission Slip')).toEqual({
        kind: 'document',
        date: null,
        sender: 'Elm Primary School',
        summary: 'Permission Slip',
      });
    });

    it('maps 0000 to an unknown year', () => {
      expect(parseClassificationReply('0000 - Person Name - Location Description')).toEqual({
        kind: 'photo',
        year: null,
        subject: 'Person Name',
        location: 'Location Description',
      });
    });

    it('treats an impossible calendar date as unknown', () => {
      expect(parseClassificationReply('2025-02-30 - Sender - Summary')).toMatchObject({
        kind: 'document',
        date: null,
        sender: 'Sender',
      });
    });

    it('keeps extra fields in the summary', () => {
      expect(
        parseClassificationReply('2025-12-23 - FloridaPower - Electric Bill - Final Notice'),
      ).toMatchObject({ sender: 'FloridaPower', summary: 'Electric Bill - Final Notice' });
    });
  });

  // -------------------------------------------------------------------------
  // Noise around the answer
  // -------------------------------------------------------------------------

  describe('noise', () => {
    it('ignores think blocks, quotes and a trailing extension', () => {
      const reply =
        '<think>The image shows a utility bill.</think>\n\n"2025-03-04 - Lakeside Utilities - Water Bill.pdf"';

      expect(parseClassificationReply(reply)).toEqual({
        kind: 'document',
        date: { year: 2025, month: 3, day: 4 },
        sender: 'Lakeside Utilities',
        summary: 'Water Bill',
      });
    });

    it('ignores code fences, markdown and a Filename label', () => {
      const reply = '```\n**Filename:** 2025/03/04 – Lakeside Utilities – Water Bill\n```';

      expect(parseClassificationReply(reply)).toEqual({
        kind: 'document',
        date: { year: 2025, month: 3, day: 4 },
        sender: 'Lakeside Utilities',
        summary: 'Water Bill',
      });
    });

    it('finds the answer after a lead-in sentence', () => {
      expect(
        parseClassificationReply('Here is the filename: 2025-12-23 - FloridaPower - Electric Bill'),
      ).toMatchObject({ kind: 'document', sender: 'FloridaPower', summary: 'Electric Bill' });
    });

    it('strips a numbered bullet and trailing period', () => {
      expect(parseClassificationReply('1. 2003 - Family - Beach Vacation.')).toEqual({
        kind: 'photo',
        year: 2003,
        subject: 'Family',
        location: 'Beach Vacation',
      });
    });
  });

  // -------------------------------------------------------------------------
  // Date and separator variants
  // -------------------------------------------------------------------------

  describe('variants', () => {
    it('reads US month/day/year dates', () => {
      expect(parseClassificationReply('12/23/2025 - FloridaPower - Electric Bill')).toMatchObject({
        date: { year: 2025, month: 12, day: 23 },
      });
    });

    it('reads a bracketed date without a dash after it', () => {
      expect(parseClassificationReply('[2024-01-15] County Clerk - Marriage Certificate')).toEqual({
        kind: 'document',
        date: { year: 2024, month: 1, day: 15 },
        sender: 'County Clerk',
        summary: 'Marriage Certificate',
      });
    });

    it('accepts pipes between fields', () => {
      expect(parseClassificationReply('2024-01-15 | County Clerk | Marriage Certificate')).toMatchObject({
        sender: 'County Clerk',
        summary: 'Marriage Certificate',
      });
    });
  });

  // -------------------------------------------------------------------------
  // Labeled blocks
  // -------------------------------------------------------------------------

  describe('labeled blocks', () => {
    it('reads a document block', () => {
      const reply = 'Category: Document\nDate: 2025-12-23\nSender: FloridaPower\nSummary: Electric Bill';

      expect(parseClassificationReply(reply)).toEqual({
        kind: 'document',
        date: { year: 2025, month: 12, day: 23 },
        sender: 'FloridaPower',
        summary: 'Electric Bill',
      });
    });

    it('reads a photo block without a category', () => {
      const reply = 'Year: 2010\nSubject: Family Beach\nLocation: Summer Vacation';

      expect(parseClassificationReply(reply)).toEqual({
        kind: 'photo',
        year: 2010,
        subject: 'Family Beach',
        location: 'Summer Vacation',
      });
    });
  });

  // -------------------------------------------------------------------------
  // Unrecognized
  // -------------------------------------------------------------------------

  describe('unrecognized', () => {
    it('returns the raw text for prose', () => {
      expect(parseClassificationReply('  I cannot determine what this image shows.  ')).toEqual({
        kind: 'unrecognized',
        rawText: 'I cannot determine what this image shows.',
      });
    });

    it('handles an empty reply', () => {
      expect(parseClassificationReply('')).toEqual({ kind: 'unrecognized', rawText: '' });
    });

    it('rejects a leading number that is not a plausible year', () => {
      expect(parseClassificationReply('1040 - Tax Form - Page One').kind).toBe('unrecognized');
    });

    it('rejects digits run straight into text', () => {
      expect(parseClassificationReply('20251223 Bill').kind).toBe('unrecognized');
    });
  });
});
