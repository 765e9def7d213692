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

/**
 * LLM Service implementation for Ollama integration
 * Shared by every strategy for generation, grading and embeddings
 *
 * @packageDocumentation
 */

import fetch from 'node-fetch';
import type { Logger } from 'winston';
import { ILLMService, IConfigService, ServiceDependencies } from '../interfaces';
import { ChatMessage, ChatOptions, OllamaChatResponse, OllamaEmbedResponse } from '../models';
import { describeError } from '../errors';

/**
 * Service for interacting with Ollama LLM
 */
export class OllamaLLMService implements ILLMService {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly baseUrl: string;

  constructor(dependencies: ServiceDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    this.baseUrl = this.configService.getConfig().ollamaBaseUrl.replace(/\/+$/, '');
  }

  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<string> {
    const modelName = options.model || this.configService.getConfig().defaultModel;

    this.logger.debug(`Generating chat completion with model: ${modelName}`);

    try {
      const response = await fetch(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: modelName,
          messages,
          stream: false,
          format: options.format,
          options: options.temperature !== undefined ? { temperature: options.temperature } : undefined,
        }),
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Ollama API error (${response.status}): ${errorText}`);
      }

      const json: OllamaChatResponse = await response.json();

      if (!json.message || typeof json.message.content !== 'string') {
        throw new Error('Invalid response format from Ollama');
      }

      return json.message.content;
    } catch (error) {
      this.logger.error(`Failed to generate chat completion: ${describeError(error)}`);
      throw new Error(`Chat completion failed: ${describeError(error)}`, { cause: error });
    }
  }

  async generateEmbeddings(inputs: string[], model?: string): Promise<number[][]> {
    const modelName = model || this.configService.getConfig().embeddingModel;

    this.logger.debug(`Generating embeddings for ${inputs.length} inputs with model: ${modelName}`);

    try {
      const response = await fetch(`${this.baseUrl}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: modelName,
          input: inputs,
        }),
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Ollama API error (${response.status}): ${errorText}`);
      }

      const json: OllamaEmbedResponse = await response.json();

      if (!Array.isArray(json.embeddings) || json.embeddings.length !== inputs.length) {
        throw new Error('Invalid embeddings response format from Ollama');
      }

      return json.embeddings;
    } catch (error) {
      this.logger.error(`Failed to generate embeddings: ${describeError(error)}`);
      throw new Error(`Embedding generation failed: ${describeError(error)}`, { cause: error });
    }
  }

  /**
   * Health check for Ollama service
   */
  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      return response.ok;
    } catch (error) {
      this.logger.error(`Ollama health check failed: ${describeError(error)}`);
      return false;
    }
  }
}
