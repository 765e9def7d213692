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

import type { Logger } from 'winston';
import { IConfigService, ILLMService, ServiceDependencies } from '../../interfaces';
import { routeQuestion } from '../graders';
import { IRAGStrategy, StrategyResult } from '../types';

export interface AdaptiveRAGDependencies extends ServiceDependencies {
  llmService: ILLMService;
  /**
   * Strategy that handles questions routed to the knowledge index
   */
  retrievalStrategy: IRAGStrategy;
}

/**
 * Adaptive RAG: a router decides per question whether retrieval is worth
 * it. Index questions are delegated; everything else goes straight to
 * the model.
 */
export class AdaptiveRAGStrategy implements IRAGStrategy {
  readonly name = 'AdaptiveRAG';

  private readonly logger: Logger;
  private readonly llmService: ILLMService;
  private readonly configService: IConfigService;
  private readonly retrievalStrategy: IRAGStrategy;

  constructor(dependencies: AdaptiveRAGDependencies) {
    this.logger = dependencies.logger;
    this.llmService = dependencies.llmService;
    this.configService = dependencies.config;
    this.retrievalStrategy = dependencies.retrievalStrategy;
  }

  async run(query: string): Promise<StrategyResult> {
    const { defaultModel } = this.configService.getConfig();
    const route = await routeQuestion(this.llmService, query, defaultModel);
    this.logger.info(`[AdaptiveRAG] Routed question to ${route}`);

    if (route === 'vectorstore') {
      const delegated = await this.retrievalStrategy.run(query);
      return {
        ...delegated,
        route,
        steps: ['route', ...(delegated.steps ?? [])],
      };
    }

    const generation = await this.llmService.chat([{ role: 'user', content: query }], { model: defaultModel });
    return { generation, sources: [], model: defaultModel, route, steps: ['route', 'generate'] };
  }
}
