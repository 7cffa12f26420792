/**
 * Classification prompt sent alongside every image.
 *
 * The model is asked for a bare filename in one of two templates; the reply
 * parser is lenient about everything around it.
 */

export const CLASSIFICATION_PROMPT = [
  'Analyze this image and return ONLY a filename. NO explanation. NO reasoning. NO extra text.',
  '',
  'FORMAT:',
  'Documents: YYYY-MM-DD - Sender - Three Word Summary',
  'Photos: Year - Subject - Location',
  '',
  'EXAMPLES:',
  'Water bill from Lakeside Utilities dated Mar 4, 2025 → 2025-03-04 - Lakeside Utilities - Water Bill',
  'Lease renewal from a landlord dated Sep 30, 2023 → 2023-09-30 - Oak Street Rentals - Lease Renewal',
  'Permission slip from a school with no date → 0000-00-00 - Elm Primary School - Permission Slip',
  'Birthday party photo in a garden from 1998 → 1998 - Birthday Party - Back Garden',
  'Old photo with unknown year → 0000 - Person Name - Location Description',
  '',
  'Use 0000-00-00 when a document has no visible date and 0000 when a photo year is unknown.',
  '',
  'Return ONLY the filename:',
].join('\n');
