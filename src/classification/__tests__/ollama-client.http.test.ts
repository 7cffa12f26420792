/**
 * Tests for Ollama request cancellation
 *
 * Runs the real ollama client against an in-process HTTP server that accepts
 * the request and never answers, then checks that a timeout or abort closes
 * the connection instead of leaving the model generating.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServer } from 'node:http';
import type { Server } from 'node:http';
import { createClassifier } from '../classifier.js';
import { OllamaVisionClient } from '../ollama-client.js';
import { ModelUnavailableError } from '../../errors.js';
import type { ImagePayload } from '../../extraction/types.js';

// ---------------------------------------------------------------------------
// Silent server
// ---------------------------------------------------------------------------

let server: Server;
let host: string;
let requestPaths: string[];
let requestArrived: Promise<void>;
let connectionClosed: Promise<void>;

beforeEach(async () => {
  requestPaths = [];
  let arrived: () => void = () => undefined;
  let closed: () => void = () => undefined;
  requestArrived = new Promise((resolve) => {
    arrived = resolve;
  });
  connectionClosed = new Promise((resolve) => {
    closed = resolve;
  });

  server = createServer((req, res) => {
    requestPaths.push(req.url ?? '');
    res.on('close', () => closed());
    arrived();
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }
  host = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

const PAYLOAD: ImagePayload = {
  data: Buffer.from('image'),
  mediaType: 'image/png',
  source: 'image',
  width: 1,
  height: 1,
};

describe('OllamaVisionClient over HTTP', () => {
  it('closes the request when its signal aborts', async () => {
    const client = new OllamaVisionClient({ host, model: 'test-model' });
    const controller = new AbortController();

    const reply = client.complete({ prompt: 'p', imageBase64: 'aW1hZ2U=', signal: controller.signal });
    await requestArrived;
    controller.abort();

    await expect(reply).rejects.toThrow();
    await connectionClosed;
    expect(requestPaths).toEqual(['/api/chat']);
  });

  it('closes the request when the classifier times out', async () => {
    const classifier = createClassifier({
      client: new OllamaVisionClient({ host, model: 'test-model' }),
      model: 'test-model',
      timeoutMs: 300,
    });

    await expect(classifier.classify(PAYLOAD)).rejects.toBeInstanceOf(ModelUnavailableError);
    await connectionClosed;
    expect(requestPaths).toEqual(['/api/chat']);
  });
});
