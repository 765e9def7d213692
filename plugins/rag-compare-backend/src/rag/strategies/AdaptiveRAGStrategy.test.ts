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

import { describe, expect, it, jest } from '@jest/globals';
import { IRAGStrategy } from '../types';
import { gradientChunk, ScriptedLLM, testConfig, testLogger } from '../__testUtils__/scriptedLlm';
import { AdaptiveRAGStrategy } from './AdaptiveRAGStrategy';

describe('AdaptiveRAGStrategy', () => {
  const retrievalRun = jest.fn<IRAGStrategy['run']>(async () => ({
    generation: 'retrieved answer',
    sources: [gradientChunk],
    model: 'llama3.2',
    steps: ['retrieve', 'grade', 'generate', 'useful'],
  }));
  const retrievalStrategy: IRAGStrategy = { name: 'SelfRAG', run: retrievalRun };

  it('delegates index questions to the retrieval strategy', async () => {
    retrievalRun.mockClear();
    const strategy = new AdaptiveRAGStrategy({
      logger: testLogger,
      config: testConfig(),
      llmService: new ScriptedLLM(),
      retrievalStrategy,
    });

    const result = await strategy.run('What is gradient descent?');

    expect(strategy.name).toBe('AdaptiveRAG');
    expect(retrievalRun).toHaveBeenCalledWith('What is gradient descent?');
    expect(result).toEqual({
      generation: 'retrieved answer',
      sources: [gradientChunk],
      model: 'llama3.2',
      route: 'vectorstore',
      steps: ['route', 'retrieve', 'grade', 'generate', 'useful'],
    });
  });

  it('answers other questions directly', async () => {
    retrievalRun.mockClear();
    const llm = new ScriptedLLM({
      route: () => '{"datasource": "direct"}',
      answer: () => 'Paris.',
    });
    const strategy = new AdaptiveRAGStrategy({
      logger: testLogger,
      config: testConfig(),
      llmService: llm,
      retrievalStrategy,
    });

    const result = await strategy.run('What is the capital of France?');

    expect(retrievalRun).not.toHaveBeenCalled();
    expect(result).toEqual({
      generation: 'Paris.',
      sources: [],
      model: 'llama3.2',
      route: 'direct',
      steps: ['route', 'generate'],
    });
    expect(llm.callsOf('answer')[0].messages).toEqual([{ role: 'user', content: 'What is the capital of France?' }]);
  });
});
