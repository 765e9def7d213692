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
 * Service interfaces following SOLID principles
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import {
  ChatMessage,
  ChatOptions,
  DatasetRow,
  EmbeddingVector,
  KnowledgeChunk,
  RagCompareConfig,
  SearchResult,
} from '../models';

/**
 * Interface for LLM service operations
 * Single Responsibility: Handles all LLM-related operations
 */
export interface ILLMService {
  /**
   * Generate a chat completion
   */
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<string>;

  /**
   * Generate embeddings for text inputs
   */
  generateEmbeddings(inputs: string[], model?: string): Promise<number[][]>;
}

/**
 * Interface for vector store operations
 * Single Responsibility: Manages vector storage and retrieval
 */
export interface IVectorStore {
  store(embedding: EmbeddingVector): Promise<void>;

  storeBatch(embeddings: EmbeddingVector[]): Promise<void>;

  /**
   * Search for similar vectors, optionally restricted to one dataset document
   */
  search(queryVector: number[], topK: number, documentId?: string): Promise<SearchResult[]>;

  clear(): Promise<void>;

  count(): Promise<number>;
}

/**
 * Interface for document processing
 * Single Responsibility: Turns dataset rows into indexable chunks
 */
export interface IDocumentProcessor {
  /**
   * Split one dataset row into chunks
   */
  chunkRow(row: DatasetRow, rowIndex: number): KnowledgeChunk[];

  /**
   * Strip markup and normalise whitespace
   */
  extractText(content: string): string;
}

/**
 * Row-addressable question dataset
 */
export interface IQuestionDataset {
  readonly rowCount: number;

  /**
   * Row at a zero-based position; throws RangeError outside `[0, rowCount)`
   */
  row(index: number): DatasetRow;
}

/**
 * Produces the question dataset on demand
 */
export interface IDatasetLoader {
  load(): Promise<IQuestionDataset>;
}

/**
 * Interface for configuration management
 */
export interface IConfigService {
  getConfig(): RagCompareConfig;
}

/**
 * Dependencies for service construction
 */
export interface ServiceDependencies {
  logger: Logger;
  config: IConfigService;
}

/**
 * Backing handles shared by the retrieval strategies
 */
export interface StrategyDependencies extends ServiceDependencies {
  llmService: ILLMService;
  vectorStore: IVectorStore;
}
