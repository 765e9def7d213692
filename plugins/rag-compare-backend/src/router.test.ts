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

import { afterAll, afterEach, beforeAll, describe, expect, it, jest } from '@jest/globals';
import express from 'express';
import { Server } from 'http';
import fetch from 'node-fetch';
import { QuestionDataset } from './dataset/QuestionDataset';
import { QueryDispatcher } from './harness/QueryDispatcher';
import { RandomSampler } from './harness/RandomSampler';
import { ResourceCache } from './harness/ResourceCache';
import { ResultExporter } from './harness/ResultExporter';
import { StrategyRegistry } from './harness/StrategyRegistry';
import { ComparisonController } from './host/ComparisonController';
import { createRootLogger } from './logging/createRootLogger';
import { buildComparisonRouter } from './router';

const logger = createRootLogger({ silent: true });

describe('comparison router', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const controller = new ComparisonController({
      logger,
      cache: new ResourceCache({
        logger,
        loadDataset: async () => new QuestionDataset([{ Question: 'What is a kernel trick?' }]),
        buildRegistry: async () =>
          new StrategyRegistry([
            { name: 'BasicRAG', run: async query => ({ generation: `basic: ${query}` }) },
            {
              name: 'CRAG',
              run: async query => {
                if (query === 'explode') {
                  throw new Error('grader offline');
                }
                return { generation: `corrective: ${query}` };
              },
            },
          ]),
      }),
      dispatcher: new QueryDispatcher({ logger }),
      exporter: new ResultExporter(() => new Date(2026, 4, 6, 7, 8, 9)),
      sampler: new RandomSampler(() => 0),
    });

    const app = express();
    app.use('/api/rag-compare', buildComparisonRouter({ logger, controller, healthCheck: async () => false }));

    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (typeof address !== 'object' || address === null) {
      throw new Error('server has no TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}/api/rag-compare`;
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
  });

  const post = (path: string, body?: unknown) =>
    fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

  it('lists strategies in order', async () => {
    const response = await fetch(`${baseUrl}/strategies`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ strategies: ['BasicRAG', 'CRAG'] });
  });

  it('reports the dataset size', async () => {
    const response = await fetch(`${baseUrl}/dataset`);

    expect(await response.json()).toEqual({ totalSamples: 1 });
  });

  it('samples and uses a random question', async () => {
    const sampled = await post('/dataset/random');
    expect(await sampled.json()).toEqual({ question: 'What is a kernel trick?', index: 0 });

    const used = await post('/dataset/random/use');
    const view = await used.json();
    expect(view.draftQuery).toBe('What is a kernel trick?');
  });

  it('has nothing to export before the first comparison', async () => {
    const response = await fetch(`${baseUrl}/export`);

    expect(response.status).toBe(404);
  });

  it('rejects a blank query with 400', async () => {
    const response = await post('/compare', { query: '   ' });

    expect(response.status).toBe(400);
    expect((await response.json()).code).toBe('INVALID_QUERY');
  });

  it('logs a rejected query as a warning and a strategy failure as an error', async () => {
    const warn = jest.spyOn(logger, 'warn');
    const error = jest.spyOn(logger, 'error');

    await post('/compare', { query: '' });
    expect(warn).toHaveBeenCalledWith('Comparison failed: Query must not be empty');
    expect(error).not.toHaveBeenCalled();

    await post('/compare', { query: 'explode' });
    expect(error).toHaveBeenCalledWith('Comparison failed: grader offline');
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('rejects a missing query with 400', async () => {
    const response = await post('/compare', {});

    expect(response.status).toBe(400);
  });

  it('runs a comparison and exports it', async () => {
    const response = await post('/compare', { query: 'What is SVM?' });
    expect(response.status).toBe(200);
    const view = await response.json();
    expect(view.comparison.results).toEqual([
      { strategy: 'BasicRAG', generation: 'basic: What is SVM?', length: 19 },
      { strategy: 'CRAG', generation: 'corrective: What is SVM?', length: 24 },
    ]);

    const exported = await fetch(`${baseUrl}/export`);
    expect(exported.headers.get('content-type')).toMatch(/^application\/json/);
    expect(exported.headers.get('content-disposition')).toMatch(/^attachment; filename="rag_comparison_\d+\.json"$/);
    expect(await exported.text()).toBe(
      '{\n  "query": "What is SVM?",\n  "results": {\n    "BasicRAG": "basic: What is SVM?",\n' +
        '    "CRAG": "corrective: What is SVM?"\n  },\n  "timestamp": "2026-05-06 07:08:09"\n}'
    );
  });

  it('returns the stale session when a comparison fails', async () => {
    const response = await post('/compare', { query: 'explode' });

    expect(response.status).toBe(500);
    const body = await response.json();
    expect(body.message).toBe('grader offline');
    expect(body.session.status).toBe('failed');
    expect(body.session.comparison.stale).toBe(true);

    const session = await fetch(`${baseUrl}/session`);
    expect((await session.json()).error.query).toBe('explode');
  });

  it('reports a degraded model backend', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(await response.json()).toEqual({ status: 'degraded', ollama: false });
  });
});
