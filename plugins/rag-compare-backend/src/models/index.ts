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
 * Domain models and data structures
 *
 * @packageDocumentation
 */

/**
 * Represents a chat message sent to the LLM
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Per-call options for a chat completion
 */
export interface ChatOptions {
  model?: string;
  temperature?: number;
  format?: 'json';
}

/**
 * Where an indexed chunk of knowledge came from
 */
export type ChunkSource = 'question' | 'answer';

/**
 * A piece of dataset knowledge stored in the vector index
 */
export interface KnowledgeChunk {
  id: string;
  documentId: string;
  title: string;
  content: string;
  metadata: {
    source: ChunkSource;
    rowIndex: number;
    chunkIndex: number;
    totalChunks: number;
  };
}

/**
 * Represents an embedding vector with its associated chunk
 */
export interface EmbeddingVector {
  id: string;
  chunkId: string;
  vector: number[];
  chunk: KnowledgeChunk;
}

/**
 * Represents a similarity search result
 */
export interface SearchResult {
  chunk: KnowledgeChunk;
  similarity: number;
}

/**
 * One row of the question dataset. Only `Question` is required;
 * every other column is carried through untouched.
 */
export interface DatasetRow {
  Question: string;
  [column: string]: unknown;
}

/**
 * Ordered mapping from strategy name to generated text, built for one query
 */
export type ResultSet = ReadonlyMap<string, string>;

/**
 * Serializable snapshot of one completed dispatch
 */
export interface ExportRecord {
  readonly query: string;
  readonly results: Readonly<Record<string, string>>;
  readonly timestamp: string;
}

/**
 * A row picked by the random sampler
 */
export interface RandomSample {
  question: string;
  index: number;
}

/**
 * Ollama chat API response structure
 */
export interface OllamaChatResponse {
  model: string;
  created_at: string;
  message: {
    role: string;
    content: string;
  };
  done: boolean;
}

/**
 * Ollama embed API response structure
 */
export interface OllamaEmbedResponse {
  model: string;
  embeddings: number[][];
}

/**
 * Hugging Face datasets-server `/rows` response structure
 */
export interface HuggingFaceRowsResponse {
  rows: Array<{ row_idx: number; row: Record<string, unknown> }>;
  num_rows_total: number;
}

/**
 * PostgreSQL connection configuration
 */
export interface PostgresConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  maxConnections?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

/**
 * Vector store configuration
 */
export interface VectorStoreConfig {
  type: 'memory' | 'postgresql';
  postgresql?: PostgresConfig;
}

export type DatasetConfig =
  | { source: 'file'; path: string }
  | {
      source: 'huggingface';
      name: string;
      config: string;
      split: string;
      maxRows: number;
      baseUrl: string;
    };

export type DispatchFailureMode = 'fail-fast' | 'isolate';

/**
 * Configuration for the comparison service
 */
export interface RagCompareConfig {
  defaultModel: string;
  embeddingModel: string;
  ollamaBaseUrl: string;
  defaultTopK: number;
  chunkSize: number;
  chunkOverlap: number;
  vectorStore: VectorStoreConfig;
  dataset: DatasetConfig;
  indexing: {
    onStartup: boolean;
  };
  dispatch: {
    failureMode: DispatchFailureMode;
    pacingMs: number;
  };
  strategies: {
    enabled?: string[];
    selfRag: { maxRetries: number };
    crag: { minRelevantChunks: number };
  };
  server: {
    port: number;
  };
  logging: {
    level: string;
    format: 'json' | 'pretty';
  };
}
