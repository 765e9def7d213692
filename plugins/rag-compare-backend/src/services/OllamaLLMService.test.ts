/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { ConfigReader } from '@backstage/config';
import fetch, { Response } from 'node-fetch';
import { createRootLogger } from '../logging/createRootLogger';
import { ConfigService } from './ConfigService';
import { OllamaLLMService } from './OllamaLLMService';

jest.mock('node-fetch', () => {
  const actual = jest.requireActual<typeof import('node-fetch')>('node-fetch');
  return { ...actual, __esModule: true, default: jest.fn() };
});

const mockFetch = jest.mocked(fetch);

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function sentBody(callIndex = 0): unknown {
  const init = mockFetch.mock.calls[callIndex][1];
  return JSON.parse(String(init?.body));
}

describe('OllamaLLMService', () => {
  let service: OllamaLLMService;

  beforeEach(() => {
    mockFetch.mockReset();
    service = new OllamaLLMService({
      logger: createRootLogger({ silent: true }),
      config: new ConfigService(
        new ConfigReader({ ragCompare: { ollamaBaseUrl: 'http://ollama.test:11434/', defaultModel: 'llama3.2' } })
      ),
    });
  });

  describe('chat', () => {
    it('posts a non-streaming chat request and returns the content', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ message: { role: 'assistant', content: 'Hello there' } }));

      const answer = await service.chat([{ role: 'user', content: 'Hi' }]);

      expect(answer).toBe('Hello there');
      expect(mockFetch.mock.calls[0][0]).toBe('http://ollama.test:11434/api/chat');
      expect(sentBody()).toEqual({
        model: 'llama3.2',
        messages: [{ role: 'user', content: 'Hi' }],
        stream: false,
      });
    });

    it('passes model, temperature and format through', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ message: { role: 'assistant', content: '{"score":"yes"}' } }));

      await service.chat([{ role: 'user', content: 'grade' }], { model: 'qwen2', temperature: 0, format: 'json' });

      expect(sentBody()).toEqual({
        model: 'qwen2',
        messages: [{ role: 'user', content: 'grade' }],
        stream: false,
        format: 'json',
        options: { temperature: 0 },
      });
    });

    it('reports API errors with the status', async () => {
      mockFetch.mockResolvedValueOnce(new Response('model not found', { status: 404 }));

      await expect(service.chat([{ role: 'user', content: 'Hi' }])).rejects.toThrow(
        'Chat completion failed: Ollama API error (404): model not found'
      );
    });

    it('rejects a response without message content', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ done: true }));

      await expect(service.chat([{ role: 'user', content: 'Hi' }])).rejects.toThrow(
        'Chat completion failed: Invalid response format from Ollama'
      );
    });
  });

  describe('generateEmbeddings', () => {
    it('embeds a batch with the embedding model', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ embeddings: [[0.1, 0.2], [0.3, 0.4]] }));

      const vectors = await service.generateEmbeddings(['a', 'b']);

      expect(vectors).toEqual([[0.1, 0.2], [0.3, 0.4]]);
      expect(mockFetch.mock.calls[0][0]).toBe('http://ollama.test:11434/api/embed');
      expect(sentBody()).toEqual({ model: 'all-minilm', input: ['a', 'b'] });
    });

    it('rejects a count mismatch', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ embeddings: [[0.1, 0.2]] }));

      await expect(service.generateEmbeddings(['a', 'b'])).rejects.toThrow(
        'Embedding generation failed: Invalid embeddings response format from Ollama'
      );
    });
  });

  describe('healthCheck', () => {
    it('is healthy when the tags endpoint answers', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ models: [] }));

      await expect(service.healthCheck()).resolves.toBe(true);
      expect(mockFetch.mock.calls[0][0]).toBe('http://ollama.test:11434/api/tags');
    });

    it('is unhealthy when the server is unreachable', async () => {
      mockFetch.mockRejectedValueOnce(new Error('ECONNREFUSED'));

      await expect(service.healthCheck()).resolves.toBe(false);
    });
  });
});
