// ============================================================================
// Classification Module Barrel Export
// ============================================================================
//
// Public API for turning an image payload into a target filename.
// Downstream consumers import from this barrel rather than individual files.
//
// Provides:
// - Type definitions and zod schemas for classification results
// - Classifier (one attempt per call, timeout-bounded)
// - Ollama adapter for the VisionModelClient interface
// - Reply parser (free text -> ClassificationResult)
// - Naming (classification -> sanitized, length-capped filename)

// Types (type-only exports)
export type {
  CalendarDate,
  ClassificationResult,
  DocumentClassification,
  PhotoClassification,
  UnrecognizedClassification,
  TargetFilename,
  VisionModelClient,
  VisionPrompt,
} from './types.js';

// Schemas
export { ClassificationResultSchema, CalendarDateSchema } from './types.js';

// Classifier
export { createClassifier } from './classifier.js';
export type { Classifier, ClassifierOptions } from './classifier.js';
export { OllamaVisionClient } from './ollama-client.js';
export { CLASSIFICATION_PROMPT } from './prompt.js';
export { parseClassificationReply } from './response-parser.js';

// Naming
export {
  buildTargetFilename,
  sanitizeField,
  truncateText,
  UNPROCESSED_PREFIX,
} from './naming.js';
export type { NamingOptions } from './naming.js';
