/**
 * Ollama adapter for the VisionModelClient interface.
 *
 * Each request gets its own Ollama instance whose fetch carries the request's
 * AbortSignal. Aborting closes the HTTP connection, which makes Ollama stop
 * generating; `Ollama.abort()` alone only reaches streamed requests.
 */

import { Ollama } from 'ollama';
import type { VisionModelClient, VisionPrompt } from './types.js';

export interface OllamaVisionClientOptions {
  host: string;
  model: string;
}

export class OllamaVisionClient implements VisionModelClient {
  private readonly host: string;
  private readonly model: string;

  constructor(options: OllamaVisionClientOptions) {
    this.host = options.host;
    this.model = options.model;
  }

  async complete({ prompt, imageBase64, signal }: VisionPrompt): Promise<string> {
    const ollama = new Ollama({
      host: this.host,
      fetch: (input, init) => fetch(input, { ...init, signal }),
    });

    const response = await ollama.chat({
      model: this.model,
      messages: [{ role: 'user', content: prompt, images: [imageBase64] }],
      options: { temperature: 0 },
      stream: false,
    });
    return response.message.content;
  }

  async listModels(): Promise<string[]> {
    const { models } = await new Ollama({ host: this.host }).list();
    return models.map((model) => model.name);
  }

  async unload(): Promise<void> {
    await new Ollama({ host: this.host }).generate({
      model: this.model,
      prompt: '',
      keep_alive: 0,
      stream: false,
    });
  }
}
