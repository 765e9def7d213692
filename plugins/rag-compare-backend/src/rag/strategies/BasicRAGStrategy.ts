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
import { IConfigService, ILLMService, IVectorStore, StrategyDependencies } from '../../interfaces';
import { generateAnswer, retrieveChunks } from '../retrieval';
import { IRAGStrategy, StrategyResult } from '../types';

/**
 * Retrieve-then-generate: the top K chunks go straight into the prompt.
 */
export class BasicRAGStrategy implements IRAGStrategy {
  readonly name = 'BasicRAG';

  private readonly logger: Logger;
  private readonly llmService: ILLMService;
  private readonly vectorStore: IVectorStore;
  private readonly configService: IConfigService;

  constructor(dependencies: StrategyDependencies) {
    this.logger = dependencies.logger;
    this.llmService = dependencies.llmService;
    this.vectorStore = dependencies.vectorStore;
    this.configService = dependencies.config;
  }

  async run(query: string): Promise<StrategyResult> {
    const { defaultTopK, defaultModel } = this.configService.getConfig();

    const sources = await retrieveChunks(this.llmService, this.vectorStore, query, defaultTopK);
    this.logger.info(`[BasicRAG] Retrieved ${sources.length} chunks (topK=${defaultTopK})`);

    if (sources.length === 0) {
      this.logger.warn('[BasicRAG] No context found, falling back to direct LLM');
    }

    const generation = await generateAnswer(this.llmService, query, sources, defaultModel);

    return {
      generation,
      sources,
      model: defaultModel,
      steps: ['retrieve', 'generate'],
    };
  }
}
