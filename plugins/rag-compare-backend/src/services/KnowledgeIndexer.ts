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
 * Indexes the question dataset into the shared vector store
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IDocumentProcessor, ILLMService, IQuestionDataset, IVectorStore } from '../interfaces';
import { EmbeddingVector, KnowledgeChunk } from '../models';

export interface KnowledgeIndexerDependencies {
  logger: Logger;
  llmService: ILLMService;
  vectorStore: IVectorStore;
  documentProcessor: IDocumentProcessor;
  batchSize?: number;
}

export class KnowledgeIndexer {
  private readonly logger: Logger;
  private readonly llmService: ILLMService;
  private readonly vectorStore: IVectorStore;
  private readonly documentProcessor: IDocumentProcessor;
  private readonly batchSize: number;

  constructor(dependencies: KnowledgeIndexerDependencies) {
    this.logger = dependencies.logger;
    this.llmService = dependencies.llmService;
    this.vectorStore = dependencies.vectorStore;
    this.documentProcessor = dependencies.documentProcessor;
    this.batchSize = dependencies.batchSize ?? 32;
  }

  /**
   * Index the dataset only when the store holds nothing yet.
   * Returns the number of chunks written.
   */
  async indexIfEmpty(dataset: IQuestionDataset): Promise<number> {
    const existing = await this.vectorStore.count();
    if (existing > 0) {
      this.logger.info(`Vector store already holds ${existing} vectors, skipping indexing`);
      return 0;
    }
    return this.indexDataset(dataset);
  }

  /**
   * Chunk, embed and store every row. Returns the number of chunks written.
   */
  async indexDataset(dataset: IQuestionDataset): Promise<number> {
    const chunks: KnowledgeChunk[] = [];
    for (let index = 0; index < dataset.rowCount; index++) {
      chunks.push(...this.documentProcessor.chunkRow(dataset.row(index), index));
    }

    this.logger.info(`Indexing ${chunks.length} chunks from ${dataset.rowCount} rows`);

    for (let start = 0; start < chunks.length; start += this.batchSize) {
      const batch = chunks.slice(start, start + this.batchSize);
      const embeddings = await this.llmService.generateEmbeddings(batch.map(chunk => chunk.content));

      const vectors: EmbeddingVector[] = batch.map((chunk, offset) => ({
        id: chunk.id,
        chunkId: chunk.id,
        vector: embeddings[offset],
        chunk,
      }));

      await this.vectorStore.storeBatch(vectors);
      this.logger.debug(`Indexed ${Math.min(start + this.batchSize, chunks.length)}/${chunks.length} chunks`);
    }

    return chunks.length;
  }
}
