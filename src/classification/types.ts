/**
 * Classification Type Definitions
 *
 * - ClassificationResultSchema: zod discriminated union over the three
 *   outcomes of reading a reply (document, photo, unrecognized)
 * - TargetFilename: the name built from a classification
 * - VisionModelClient: the narrow surface the classifier needs from a model
 *   runtime, so tests can substitute a fake
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Classification Result
// ---------------------------------------------------------------------------

/** Plain calendar date; no time zone, no Date object */
export const CalendarDateSchema = z
  .object({
    year: z.number().int().min(1800).max(2199),
    month: z.number().int().min(1).max(12),
    day: z.number().int().min(1).max(31),
  })
  .refine(({ year, month, day }) => day <= daysInMonth(year, month), {
    message: 'Day is out of range for month',
  });

export type CalendarDate = z.infer<typeof CalendarDateSchema>;

export const DocumentClassificationSchema = z.object({
  kind: z.literal('document'),
  /** null when the model answered 0000-00-00 */
  date: CalendarDateSchema.nullable(),
  sender: z.string(),
  summary: z.string(),
});

export const PhotoClassificationSchema = z.object({
  kind: z.literal('photo'),
  /** null when the model answered 0000 */
  year: z.number().int().min(1800).max(2199).nullable(),
  subject: z.string(),
  location: z.string(),
});

export const UnrecognizedClassificationSchema = z.object({
  kind: z.literal('unrecognized'),
  rawText: z.string(),
});

export const ClassificationResultSchema = z.discriminatedUnion('kind', [
  DocumentClassificationSchema,
  PhotoClassificationSchema,
  UnrecognizedClassificationSchema,
]);

export type DocumentClassification = z.infer<typeof DocumentClassificationSchema>;
export type PhotoClassification = z.infer<typeof PhotoClassificationSchema>;
export type UnrecognizedClassification = z.infer<typeof UnrecognizedClassificationSchema>;
export type ClassificationResult = z.infer<typeof ClassificationResultSchema>;

// ---------------------------------------------------------------------------
// Target Filename
// ---------------------------------------------------------------------------

export interface TargetFilename {
  /** Name without extension */
  stem: string;
  /** Lower-cased, including the leading dot (may be empty) */
  extension: string;
  /** stem + extension */
  filename: string;
}

// ---------------------------------------------------------------------------
// Model Client
// ---------------------------------------------------------------------------

export interface VisionPrompt {
  prompt: string;
  /** Base64-encoded image */
  imageBase64: string;
  signal: AbortSignal;
}

/** Minimal model runtime surface used by the classifier */
export interface VisionModelClient {
  /** Send one image with a prompt and return the reply text */
  complete(request: VisionPrompt): Promise<string>;
  /** Names of the models installed on the runtime */
  listModels(): Promise<string[]>;
  /** Release the model from memory */
  unload(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function daysInMonth(year: number, month: number): number {
  // Day 0 of the following month is the last day of this one
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}
