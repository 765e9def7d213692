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
import fetch, { Response } from 'node-fetch';
import { createRootLogger } from '../logging/createRootLogger';
import { HuggingFaceDatasetLoader } from './HuggingFaceDatasetLoader';

jest.mock('node-fetch', () => {
  const actual = jest.requireActual<typeof import('node-fetch')>('node-fetch');
  return { ...actual, __esModule: true, default: jest.fn() };
});

const mockFetch = jest.mocked(fetch);

function page(offset: number, length: number, total: number): Response {
  const rows = Array.from({ length }, (_, i) => ({
    row_idx: offset + i,
    row: { Question: `Question ${offset + i}`, Answer: `Answer ${offset + i}` },
  }));
  return new Response(JSON.stringify({ rows, num_rows_total: total }), { status: 200 });
}

function requestedParams(callIndex: number): URLSearchParams {
  return new URL(String(mockFetch.mock.calls[callIndex][0])).searchParams;
}

describe('HuggingFaceDatasetLoader', () => {
  const options = {
    name: 'example/ml-questions',
    config: 'default',
    split: 'train',
    maxRows: 150,
    baseUrl: 'http://datasets.test/',
  };

  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('pages through the rows endpoint up to maxRows', async () => {
    mockFetch.mockResolvedValueOnce(page(0, 100, 400)).mockResolvedValueOnce(page(100, 50, 400));

    const dataset = await new HuggingFaceDatasetLoader(createRootLogger({ silent: true }), options).load();

    expect(dataset.rowCount).toBe(150);
    expect(dataset.row(149).Question).toBe('Question 149');
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(String(mockFetch.mock.calls[0][0])).toMatch(/^http:\/\/datasets\.test\/rows\?/);
    expect(Object.fromEntries(requestedParams(1))).toEqual({
      dataset: 'example/ml-questions',
      config: 'default',
      split: 'train',
      offset: '100',
      length: '50',
    });
  });

  it('stops at the end of a small split', async () => {
    mockFetch.mockResolvedValueOnce(page(0, 30, 30));

    const dataset = await new HuggingFaceDatasetLoader(createRootLogger({ silent: true }), options).load();

    expect(dataset.rowCount).toBe(30);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('reports failed requests', async () => {
    mockFetch.mockResolvedValueOnce(new Response('not found', { status: 404 }));

    await expect(new HuggingFaceDatasetLoader(createRootLogger({ silent: true }), options).load()).rejects.toThrow(
      'Dataset rows request failed (404): not found'
    );
  });
});
