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
import { KnowledgeChunk } from '../../models';
import { filterRelevantChunks, rewriteQuestion } from '../graders';
import { generateAnswer, retrieveChunks } from '../retrieval';
import { IRAGStrategy, StrategyResult } from '../types';

/**
 * Corrective RAG: retrieved chunks are graded for relevance before they
 * reach the prompt. When too few survive, the question is rewritten and
 * retrieval runs once more; with nothing relevant left the model answers
 * without context.
 */
export class CorrectiveRAGStrategy implements IRAGStrategy {
  readonly name = 'CRAG';

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
    const { defaultTopK, defaultModel, strategies } = this.configService.getConfig();
    const { minRelevantChunks } = strategies.crag;
    const steps = ['retrieve', 'grade'];

    let sources = await this.retrieveRelevant(query, defaultTopK, defaultModel);

    if (sources.length < minRelevantChunks) {
      const rewritten = await rewriteQuestion(this.llmService, query, defaultModel);
      this.logger.info(`[CRAG] Only ${sources.length} relevant chunks, retrying with: ${rewritten}`);
      steps.push('rewrite', 'retrieve', 'grade');
      sources = await this.retrieveRelevant(rewritten, defaultTopK, defaultModel);
    }

    if (sources.length === 0) {
      this.logger.warn('[CRAG] No relevant context after correction, answering directly');
    }

    steps.push('generate');
    const generation = await generateAnswer(this.llmService, query, sources, defaultModel);

    return { generation, sources, model: defaultModel, steps };
  }

  private async retrieveRelevant(question: string, topK: number, model: string): Promise<KnowledgeChunk[]> {
    const retrieved = await retrieveChunks(this.llmService, this.vectorStore, question, topK);
    const relevant = await filterRelevantChunks(this.llmService, question, retrieved, model);
    this.logger.info(`[CRAG] ${relevant.length}/${retrieved.length} retrieved chunks graded relevant`);
    return relevant;
  }
}
