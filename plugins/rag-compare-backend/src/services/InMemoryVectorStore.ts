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
 * In-memory vector store implementation
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IVectorStore } from '../interfaces';
import { EmbeddingVector, SearchResult } from '../models';

/**
 * In-memory vector store using cosine similarity.
 * Contents live as long as the process; restart means re-indexing.
 */
export class InMemoryVectorStore implements IVectorStore {
  private readonly logger: Logger;
  private readonly vectors: Map<string, EmbeddingVector> = new Map();

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async store(embedding: EmbeddingVector): Promise<void> {
    this.vectors.set(embedding.id, embedding);
  }

  async storeBatch(embeddings: EmbeddingVector[]): Promise<void> {
    for (const embedding of embeddings) {
      this.vectors.set(embedding.id, embedding);
    }
    this.logger.debug(`Stored batch of ${embeddings.length} embeddings`);
  }

  async search(queryVector: number[], topK: number, documentId?: string): Promise<SearchResult[]> {
    const candidates = Array.from(this.vectors.values()).filter(
      embedding => !documentId || embedding.chunk.documentId === documentId
    );

    const results: SearchResult[] = candidates.map(embedding => ({
      chunk: embedding.chunk,
      similarity: cosineSimilarity(queryVector, embedding.vector),
    }));

    results.sort((a, b) => b.similarity - a.similarity);
    const topResults = results.slice(0, Math.max(0, topK));

    this.logger.debug(
      `Found ${topResults.length} results for query (documentId: ${documentId || 'all'})`
    );

    return topResults;
  }

  async clear(): Promise<void> {
    const count = this.vectors.size;
    this.vectors.clear();
    this.logger.info(`Cleared ${count} vectors from store`);
  }

  async count(): Promise<number> {
    return this.vectors.size;
  }
}

/**
 * Cosine similarity of two equal-length vectors; 0 when either is all zeros
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vectors must have the same length (${a.length} vs ${b.length})`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dotProduct / denominator;
}
