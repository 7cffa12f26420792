/**
 * Classifier: one image in, one ClassificationResult out
 *
 * Sends the payload with the fixed filename prompt to the vision model and
 * parses the reply. Features:
 * - Hard timeout per request (the model call is aborted when it fires)
 * - Timeout or transport failure -> ModelUnavailableError (retryable)
 * - Replies that match no template -> `unrecognized`, never an error
 * - Zod validation of the parsed result before it leaves this module
 * - No reply text in logs beyond a short preview
 *
 * Retries belong to the watch loop; this module makes exactly one attempt.
 */

import { ModelUnavailableError, errorMessage } from '../errors.js';
import type { ImagePayload } from '../extraction/types.js';
import { CLASSIFICATION_PROMPT } from './prompt.js';
import { parseClassificationReply } from './response-parser.js';
import { ClassificationResultSchema } from './types.js';
import type { ClassificationResult, VisionModelClient } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ClassifierOptions {
  client: VisionModelClient;
  /** Model tag, used to check that the model is installed */
  model: string;
  timeoutMs: number;
}

export interface Classifier {
  classify(payload: ImagePayload): Promise<ClassificationResult>;
  /** True when the configured model is installed on the runtime */
  isModelAvailable(): Promise<boolean>;
  /** Ask the runtime to release the model from memory */
  unloadModel(): Promise<void>;
}

const PREVIEW_LENGTH = 80;

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createClassifier({ client, model, timeoutMs }: ClassifierOptions): Classifier {
  async function requestReply(payload: ImagePayload): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const err = new ModelUnavailableError(
          `Model did not answer within ${Math.round(timeoutMs / 1000)}s`,
        );
        controller.abort(err);
        reject(err);
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        client.complete({
          prompt: CLASSIFICATION_PROMPT,
          imageBase64: payload.data.toString('base64'),
          signal: controller.signal,
        }),
        timeout,
      ]);
    } catch (err) {
      if (err instanceof ModelUnavailableError) throw err;
      throw new ModelUnavailableError(`Model request failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }

  return {
    async classify(payload) {
      const start = Date.now();
      const reply = await requestReply(payload);

      const parsed = ClassificationResultSchema.safeParse(parseClassificationReply(reply));
      const result: ClassificationResult = parsed.success
        ? parsed.data
        : { kind: 'unrecognized', rawText: reply.trim() };

      if (result.kind === 'unrecognized') {
        console.warn('[classifier] Reply matched no filename template', {
          preview: result.rawText.slice(0, PREVIEW_LENGTH),
        });
      } else {
        console.log('[classifier] Classified', { kind: result.kind, elapsedMs: Date.now() - start });
      }
      return result;
    },

    async isModelAvailable() {
      const names = await client.listModels();
      const wanted = model.includes(':') ? model : `${model}:latest`;
      return names.some((name) => name === model || name === wanted);
    },

    async unloadModel() {
      await client.unload();
    },
  };
}
