/**
 * Tests for the Ollama adapter
 *
 * The ollama package is mocked; no runtime is contacted. Cancellation over
 * HTTP is covered in ollama-client.http.test.ts.
 */

import { describe, it, expect, vi } from 'vitest';

// ---------------------------------------------------------------------------
// Module-level mocks (must be before imports)
// ---------------------------------------------------------------------------

const { mockChat, mockList, mockGenerate, mockConstructor } = vi.hoisted(() => ({
  mockChat: vi.fn(),
  mockList: vi.fn(),
  mockGenerate: vi.fn(),
  mockConstructor: vi.fn(),
}));

vi.mock('ollama', () => ({
  Ollama: class MockOllama {
    chat = mockChat;
    list = mockList;
    generate = mockGenerate;
    constructor(config: unknown) {
      mockConstructor(config);
    }
  },
}));

// ---------------------------------------------------------------------------
// Import after mocks
// ---------------------------------------------------------------------------

import { OllamaVisionClient } from '../ollama-client.js';

const client = new OllamaVisionClient({ host: 'http://127.0.0.1:11434', model: 'qwen3-vl:32b' });

describe('OllamaVisionClient', () => {
  it('sends one user message with the image at temperature 0', async () => {
    mockChat.mockResolvedValue({ message: { role: 'assistant', content: '2003 - Family - Beach' } });

    const reply = await client.complete({
      prompt: 'Return ONLY the filename:',
      imageBase64: 'aW1hZ2U=',
      signal: new AbortController().signal,
    });

    expect(reply).toBe('2003 - Family - Beach');
    expect(mockConstructor).toHaveBeenCalledWith({
      host: 'http://127.0.0.1:11434',
      fetch: expect.any(Function),
    });
    expect(mockChat).toHaveBeenCalledWith({
      model: 'qwen3-vl:32b',
      messages: [{ role: 'user', content: 'Return ONLY the filename:', images: ['aW1hZ2U='] }],
      options: { temperature: 0 },
      stream: false,
    });
  });

  it('lists installed model names', async () => {
    mockList.mockResolvedValue({ models: [{ name: 'qwen3-vl:32b' }, { name: 'llava:latest' }] });

    expect(await client.listModels()).toEqual(['qwen3-vl:32b', 'llava:latest']);
  });

  it('unloads by generating with keep_alive 0', async () => {
    mockGenerate.mockResolvedValue({ response: '' });

    await client.unload();

    expect(mockGenerate).toHaveBeenCalledWith({
      model: 'qwen3-vl:32b',
      prompt: '',
      keep_alive: 0,
      stream: false,
    });
  });
});
