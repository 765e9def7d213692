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
 * PostgreSQL vector store implementation with pgvector
 *
 * @packageDocumentation
 */

import { Pool, PoolClient } from 'pg';
import type { Logger } from 'winston';
import { IVectorStore } from '../interfaces';
import { ChunkSource, EmbeddingVector, PostgresConfig, SearchResult } from '../models';

type ChunkRow = {
  id: string;
  chunk_id: string;
  document_id: string;
  title: string;
  content: string;
  source: ChunkSource;
  row_index: number;
  chunk_index: number;
  total_chunks: number;
  similarity: string;
};

const UPSERT_CHUNK = `
  INSERT INTO knowledge_chunks (
    id, chunk_id, document_id, title, embedding,
    content, source, row_index, chunk_index, total_chunks
  ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
  ON CONFLICT (document_id, chunk_id)
  DO UPDATE SET
    embedding = EXCLUDED.embedding,
    content = EXCLUDED.content,
    title = EXCLUDED.title,
    source = EXCLUDED.source,
    row_index = EXCLUDED.row_index,
    chunk_index = EXCLUDED.chunk_index,
    total_chunks = EXCLUDED.total_chunks,
    updated_at = CURRENT_TIMESTAMP
`;

/**
 * PostgreSQL vector store using the pgvector extension.
 * Requires `migrations/001_initial_schema.sql` to have been applied.
 */
export class PgVectorStore implements IVectorStore {
  private readonly logger: Logger;
  private readonly pool: Pool;
  private initialized = false;

  constructor(logger: Logger, config: PostgresConfig, pool?: Pool) {
    this.logger = logger;
    this.pool =
      pool ??
      new Pool({
        host: config.host,
        port: config.port,
        database: config.database,
        user: config.user,
        password: config.password,
        ssl: config.ssl ? { rejectUnauthorized: false } : false,
        max: config.maxConnections || 10,
        idleTimeoutMillis: config.idleTimeoutMillis || 30000,
        connectionTimeoutMillis: config.connectionTimeoutMillis || 5000,
      });

    this.pool.on('error', err => {
      this.logger.error(`Unexpected PostgreSQL pool error: ${err.message}`);
    });
  }

  /**
   * Verify the connection, the pgvector extension and the schema.
   * Must be called before any other operation.
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    try {
      await this.withClient(async client => {
        await client.query('SELECT 1');

        const extension = await client.query<{ installed: boolean }>(
          "SELECT EXISTS(SELECT 1 FROM pg_extension WHERE extname = 'vector') AS installed"
        );
        if (!extension.rows[0]?.installed) {
          throw new Error('pgvector extension is not installed. Please run: CREATE EXTENSION vector;');
        }

        const table = await client.query<{ exists: boolean }>(
          "SELECT EXISTS(SELECT 1 FROM information_schema.tables WHERE table_name = 'knowledge_chunks') AS exists"
        );
        if (!table.rows[0]?.exists) {
          throw new Error('knowledge_chunks table not found. Run migrations first.');
        }
      });

      this.initialized = true;
      this.logger.info('PgVectorStore initialized successfully');
    } catch (error) {
      this.logger.error(`Failed to initialize PgVectorStore: ${error}`);
      throw new Error(`PgVectorStore initialization failed: ${error}`, { cause: error });
    }
  }

  async store(embedding: EmbeddingVector): Promise<void> {
    this.ensureInitialized();
    await this.withClient(client => client.query(UPSERT_CHUNK, this.toParams(embedding)));
  }

  /**
   * Store multiple embeddings in one transaction
   */
  async storeBatch(embeddings: EmbeddingVector[]): Promise<void> {
    this.ensureInitialized();

    if (embeddings.length === 0) {
      return;
    }

    await this.withClient(async client => {
      await client.query('BEGIN');
      try {
        for (const embedding of embeddings) {
          await client.query(UPSERT_CHUNK, this.toParams(embedding));
        }
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        this.logger.error(`Failed to store embedding batch: ${error}`);
        throw error;
      }
    });

    this.logger.debug(`Stored batch of ${embeddings.length} embeddings`);
  }

  /**
   * Cosine similarity search through pgvector's `<=>` operator
   */
  async search(queryVector: number[], topK: number, documentId?: string): Promise<SearchResult[]> {
    this.ensureInitialized();

    const result = await this.withClient(client =>
      client.query<ChunkRow>(
        `
        SELECT
          id, chunk_id, document_id, title, content, source,
          row_index, chunk_index, total_chunks,
          1 - (embedding <=> $1) AS similarity
        FROM knowledge_chunks
        WHERE ($2::TEXT IS NULL OR document_id = $2)
        ORDER BY embedding <=> $1
        LIMIT $3
        `,
        [toVectorLiteral(queryVector), documentId ?? null, topK]
      )
    );

    return result.rows.map(row => ({
      chunk: {
        id: row.id,
        documentId: row.document_id,
        title: row.title,
        content: row.content,
        metadata: {
          source: row.source,
          rowIndex: row.row_index,
          chunkIndex: row.chunk_index,
          totalChunks: row.total_chunks,
        },
      },
      similarity: parseFloat(row.similarity),
    }));
  }

  async clear(): Promise<void> {
    this.ensureInitialized();
    const result = await this.withClient(client => client.query('DELETE FROM knowledge_chunks'));
    this.logger.info(`Cleared ${result.rowCount ?? 0} vectors`);
  }

  async count(): Promise<number> {
    this.ensureInitialized();
    const result = await this.withClient(client =>
      client.query<{ count: string }>('SELECT COUNT(*) AS count FROM knowledge_chunks')
    );
    return parseInt(result.rows[0]?.count ?? '0', 10);
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.logger.info('PgVectorStore connection pool closed');
  }

  private async withClient<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await work(client);
    } finally {
      client.release();
    }
  }

  private toParams(embedding: EmbeddingVector): unknown[] {
    const { chunk } = embedding;
    return [
      embedding.id,
      embedding.chunkId,
      chunk.documentId,
      chunk.title,
      toVectorLiteral(embedding.vector),
      chunk.content,
      chunk.metadata.source,
      chunk.metadata.rowIndex,
      chunk.metadata.chunkIndex,
      chunk.metadata.totalChunks,
    ];
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('PgVectorStore not initialized. Call initialize() first.');
    }
  }
}

/**
 * pgvector text literal, e.g. `[0.1,0.2]`
 */
export function toVectorLiteral(vector: number[]): string {
  return `[${vector.join(',')}]`;
}
