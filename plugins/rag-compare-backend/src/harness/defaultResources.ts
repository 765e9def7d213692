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
 * Production wiring of the resource cache
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { DatasetLoaderFactory } from '../dataset';
import { ILLMService } from '../interfaces';
import { RAGStrategyFactory } from '../rag';
import { ConfigService, DocumentProcessor, KnowledgeIndexer, VectorStoreFactory } from '../services';
import { ResourceCache } from './ResourceCache';

export interface DefaultResourceOptions {
  logger: Logger;
  configService: ConfigService;
  llmService: ILLMService;
  /**
   * Directory relative dataset paths resolve against
   */
  baseDir?: string;
}

/**
 * Dataset from the configured loader; registry on top of one shared
 * vector store, indexed from the dataset first when `indexing.onStartup`
 * is set and the store is empty. A store that fails to initialize fails
 * the registry build, so the next access retries it.
 */
export function createDefaultResourceCache(options: DefaultResourceOptions): ResourceCache {
  const { logger, configService, llmService, baseDir } = options;
  const appConfig = configService.getConfig();

  return new ResourceCache({
    logger,
    loadDataset: () =>
      DatasetLoaderFactory.create(appConfig.dataset, logger.child({ component: 'dataset' }), baseDir).load(),
    buildRegistry: async cache => {
      const vectorStore = await VectorStoreFactory.createStrict(
        configService,
        logger.child({ component: 'vector-store' })
      );

      if (appConfig.indexing.onStartup) {
        const indexer = new KnowledgeIndexer({
          logger: logger.child({ component: 'indexer' }),
          llmService,
          vectorStore,
          documentProcessor: new DocumentProcessor(logger, configService),
        });
        await indexer.indexIfEmpty(await cache.getDataset());
      }

      return RAGStrategyFactory.createRegistry({
        logger: logger.child({ component: 'strategies' }),
        config: configService,
        llmService,
        vectorStore,
      });
    },
  });
}
