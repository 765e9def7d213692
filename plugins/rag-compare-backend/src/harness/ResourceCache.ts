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
 * Process-wide cache of the expensive resources behind a comparison
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IQuestionDataset } from '../interfaces';
import { LazyResource } from './LazyResource';
import { StrategyRegistry } from './StrategyRegistry';

export interface ResourceCacheOptions {
  logger: Logger;
  loadDataset: () => Promise<IQuestionDataset>;
  /**
   * Receives the cache itself so registry construction can reuse the
   * cached dataset (e.g. to index it).
   */
  buildRegistry: (cache: ResourceCache) => Promise<StrategyRegistry>;
}

/**
 * Holds the dataset and the strategy registry. Each is built at most once,
 * on first access, and kept until the process exits; there is no refresh.
 * A failed build surfaces as ResourceConstructionError and the next call
 * retries it.
 */
export class ResourceCache {
  private readonly logger: Logger;
  private readonly dataset: LazyResource<IQuestionDataset>;
  private readonly registry: LazyResource<StrategyRegistry>;

  constructor(options: ResourceCacheOptions) {
    this.logger = options.logger;
    this.dataset = new LazyResource('dataset', () => this.timed('dataset', options.loadDataset));
    this.registry = new LazyResource('strategy registry', () =>
      this.timed('strategy registry', () => options.buildRegistry(this))
    );
  }

  getDataset(): Promise<IQuestionDataset> {
    return this.dataset.get();
  }

  getRegistry(): Promise<StrategyRegistry> {
    return this.registry.get();
  }

  private async timed<T>(resource: string, build: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();
    this.logger.info(`Constructing ${resource}`);
    try {
      const value = await build();
      this.logger.info(`Constructed ${resource} in ${Date.now() - startedAt}ms`);
      return value;
    } catch (error) {
      this.logger.error(`Failed to construct ${resource}: ${error}`);
      throw error;
    }
  }
}
