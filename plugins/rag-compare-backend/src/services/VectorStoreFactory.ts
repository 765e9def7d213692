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
 * Factory for creating vector store implementations
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IVectorStore } from '../interfaces';
import { ConfigService } from './ConfigService';
import { InMemoryVectorStore } from './InMemoryVectorStore';
import { PgVectorStore } from './PgVectorStore';

/**
 * Builds the vector store handle the retrieval strategies share.
 *
 * Usage:
 * ```typescript
 * const vectorStore = await VectorStoreFactory.create(configService, logger);
 * ```
 */
export class VectorStoreFactory {
  /**
   * Create a vector store instance based on configuration.
   * A PostgreSQL store that fails to initialize is replaced by an
   * in-memory one.
   */
  static async create(config: ConfigService, logger: Logger): Promise<IVectorStore> {
    try {
      return await VectorStoreFactory.createStrict(config, logger);
    } catch (error) {
      logger.error(`Failed to initialize ${config.getVectorStoreType()} vector store: ${error}`);
      logger.warn('Falling back to in-memory vector store');
      return new InMemoryVectorStore(logger);
    }
  }

  /**
   * Create vector store with strict mode (no fallback)
   *
   * @throws Error if the configured store cannot be initialized
   */
  static async createStrict(config: ConfigService, logger: Logger): Promise<IVectorStore> {
    const vectorStoreType = config.getVectorStoreType();

    logger.info(`Creating vector store: ${vectorStoreType}`);

    switch (vectorStoreType) {
      case 'postgresql': {
        const store = new PgVectorStore(logger, config.getPostgresConfig());
        try {
          await store.initialize();
        } catch (error) {
          await store.close();
          throw error;
        }
        return store;
      }

      case 'memory':
      default:
        return new InMemoryVectorStore(logger);
    }
  }
}
