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
import { filterRelevantChunks, gradeAnswerUsefulness, gradeGrounding, rewriteQuestion } from '../graders';
import { generateAnswer, retrieveChunks } from '../retrieval';
import { IRAGStrategy, StrategyResult } from '../types';

/**
 * Self-reflective RAG. Each attempt retrieves, filters, generates and then
 * checks its own answer: it must be grounded in the kept chunks and must
 * address the question. A failed check rewrites the search question and
 * tries again, up to `maxRetries` extra attempts.
 */
export class SelfRAGStrategy implements IRAGStrategy {
  readonly name = 'SelfRAG';

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
    const { maxRetries } = strategies.selfRag;
    const steps: string[] = [];

    let searchQuestion = query;
    let generation = '';
    let sources: KnowledgeChunk[] = [];

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) {
        searchQuestion = await rewriteQuestion(this.llmService, searchQuestion, defaultModel);
        steps.push('rewrite');
      }

      const retrieved = await retrieveChunks(this.llmService, this.vectorStore, searchQuestion, defaultTopK);
      sources = await filterRelevantChunks(this.llmService, searchQuestion, retrieved, defaultModel);
      generation = await generateAnswer(this.llmService, query, sources, defaultModel);
      steps.push('retrieve', 'grade', 'generate');

      if (sources.length > 0 && !(await gradeGrounding(this.llmService, sources, generation, defaultModel))) {
        this.logger.info(`[SelfRAG] Attempt ${attempt + 1}: generation not grounded in context`);
        steps.push('not-grounded');
        continue;
      }

      if (await gradeAnswerUsefulness(this.llmService, query, generation, defaultModel)) {
        steps.push('useful');
        this.logger.info(`[SelfRAG] Accepted generation on attempt ${attempt + 1}`);
        return { generation, sources, model: defaultModel, steps };
      }

      this.logger.info(`[SelfRAG] Attempt ${attempt + 1}: generation does not address the question`);
      steps.push('not-useful');
    }

    this.logger.warn(`[SelfRAG] No generation passed reflection after ${maxRetries + 1} attempts`);
    return { generation, sources, model: defaultModel, steps };
  }
}
