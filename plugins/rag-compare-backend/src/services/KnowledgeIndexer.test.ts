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

import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { ConfigReader } from '@backstage/config';
import { QuestionDataset } from '../dataset/QuestionDataset';
import { ILLMService } from '../interfaces';
import { createRootLogger } from '../logging/createRootLogger';
import { ConfigService } from './ConfigService';
import { DocumentProcessor } from './DocumentProcessor';
import { InMemoryVectorStore } from './InMemoryVectorStore';
import { KnowledgeIndexer } from './KnowledgeIndexer';

const logger = createRootLogger({ silent: true });

const dataset = new QuestionDataset([
  { Question: 'What is a neuron?', Answer: 'A unit that sums weighted inputs.' },
  { Question: 'What is an epoch?', Answer: 'One full pass over the training data.' },
  { Question: 'What is a batch?' },
]);

describe('KnowledgeIndexer', () => {
  let generateEmbeddings: jest.Mock<ILLMService['generateEmbeddings']>;
  let vectorStore: InMemoryVectorStore;
  let indexer: KnowledgeIndexer;

  beforeEach(() => {
    generateEmbeddings = jest.fn<ILLMService['generateEmbeddings']>(async inputs =>
      inputs.map(input => [input.length, 1])
    );
    vectorStore = new InMemoryVectorStore(logger);
    indexer = new KnowledgeIndexer({
      logger,
      llmService: { chat: jest.fn<ILLMService['chat']>(), generateEmbeddings },
      vectorStore,
      documentProcessor: new DocumentProcessor(logger, new ConfigService(new ConfigReader({}))),
      batchSize: 2,
    });
  });

  it('embeds every chunk in batches', async () => {
    const written = await indexer.indexDataset(dataset);

    expect(written).toBe(5);
    expect(await vectorStore.count()).toBe(5);
    expect(generateEmbeddings.mock.calls.map(([inputs]) => inputs.length)).toEqual([2, 2, 1]);
    expect(generateEmbeddings.mock.calls[0][0]).toEqual(['What is a neuron?', 'A unit that sums weighted inputs.']);
  });

  it('skips indexing when the store already has vectors', async () => {
    await indexer.indexDataset(dataset);
    generateEmbeddings.mockClear();

    await expect(indexer.indexIfEmpty(dataset)).resolves.toBe(0);
    expect(generateEmbeddings).not.toHaveBeenCalled();
  });

  it('indexes an empty store', async () => {
    await expect(indexer.indexIfEmpty(dataset)).resolves.toBe(5);
  });
});
