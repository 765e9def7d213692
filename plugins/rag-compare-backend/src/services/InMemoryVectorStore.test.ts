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

import { beforeEach, describe, expect, it } from '@jest/globals';
import { createRootLogger } from '../logging/createRootLogger';
import { EmbeddingVector } from '../models';
import { cosineSimilarity, InMemoryVectorStore } from './InMemoryVectorStore';

function embedding(id: string, documentId: string, vector: number[]): EmbeddingVector {
  return {
    id,
    chunkId: id,
    vector,
    chunk: {
      id,
      documentId,
      title: `Title of ${documentId}`,
      content: `Content of ${id}`,
      metadata: { source: 'answer', rowIndex: 0, chunkIndex: 0, totalChunks: 1 },
    },
  };
}

describe('cosineSimilarity', () => {
  it('is 1 for parallel and 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('is 0 against a zero vector', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('rejects mismatched lengths', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow('Vectors must have the same length (1 vs 2)');
  });
});

describe('InMemoryVectorStore', () => {
  let store: InMemoryVectorStore;

  beforeEach(async () => {
    store = new InMemoryVectorStore(createRootLogger({ silent: true }));
    await store.storeBatch([
      embedding('row-0-0', 'row-0', [1, 0, 0]),
      embedding('row-0-1', 'row-0', [0.7, 0.7, 0]),
      embedding('row-1-0', 'row-1', [0, 1, 0]),
      embedding('row-2-0', 'row-2', [0, 0, 1]),
    ]);
  });

  it('returns the nearest chunks first', async () => {
    const results = await store.search([1, 0.1, 0], 2);

    expect(results.map(result => result.chunk.id)).toEqual(['row-0-0', 'row-0-1']);
    expect(results[0].similarity).toBeGreaterThan(results[1].similarity);
  });

  it('filters by document', async () => {
    const results = await store.search([0, 1, 0], 5, 'row-0');

    expect(results.map(result => result.chunk.id)).toEqual(['row-0-1', 'row-0-0']);
  });

  it('replaces vectors with the same id', async () => {
    await store.store(embedding('row-2-0', 'row-2', [1, 0, 0]));

    expect(await store.count()).toBe(4);
    const [top] = await store.search([1, 0, 0], 1, 'row-2');
    expect(top.similarity).toBeCloseTo(1);
  });

  it('clears everything', async () => {
    await store.clear();

    expect(await store.count()).toBe(0);
    expect(await store.search([1, 0, 0], 3)).toEqual([]);
  });
});
