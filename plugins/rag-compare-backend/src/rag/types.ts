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
 * RAG domain types and interfaces
 *
 * @packageDocumentation
 */

import { KnowledgeChunk } from '../models';

/**
 * Result returned by a strategy run. The harness only reads `generation`;
 * everything else is for the strategy's own diagnostics.
 */
export interface StrategyResult {
  generation: string;
  sources?: KnowledgeChunk[];
  model?: string;
  /**
   * Names of the pipeline steps taken, in order
   */
  steps?: string[];
  route?: QuestionRoute;
}

/**
 * Where the adaptive router sends a question
 */
export type QuestionRoute = 'vectorstore' | 'direct';

/**
 * Contract implemented by all RAG strategies.
 */
export interface IRAGStrategy {
  readonly name: string;

  /**
   * Produce a generation for the provided query.
   */
  run(query: string): Promise<StrategyResult>;
}
