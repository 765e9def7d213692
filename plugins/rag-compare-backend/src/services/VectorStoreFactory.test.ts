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
import { createRootLogger } from '../logging/createRootLogger';
import { ConfigService } from './ConfigService';
import { InMemoryVectorStore } from './InMemoryVectorStore';
import { PgVectorStore } from './PgVectorStore';
import { VectorStoreFactory } from './VectorStoreFactory';

const mockPool = {
  connect: jest.fn<() => Promise<unknown>>(async () => {
    throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
  }),
  end: jest.fn(async () => undefined),
  on: jest.fn(),
};

jest.mock('pg', () => ({
  Pool: jest.fn(() => mockPool),
}));

const logger = createRootLogger({ silent: true });

const postgresConfig = new ConfigService(
  new ConfigReader({ ragCompare: { vectorStore: { type: 'postgresql', postgresql: { password: 'test-secret' } } } })
);

describe('VectorStoreFactory', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('creates the in-memory store by default', async () => {
    const store = await VectorStoreFactory.create(new ConfigService(new ConfigReader({})), logger);

    expect(store).toBeInstanceOf(InMemoryVectorStore);
  });

  it('falls back to memory when postgresql is unreachable', async () => {
    const store = await VectorStoreFactory.create(postgresConfig, logger);

    expect(store).toBeInstanceOf(InMemoryVectorStore);
    expect(mockPool.end).toHaveBeenCalledTimes(1);
  });

  it('fails in strict mode and closes the pool', async () => {
    await expect(VectorStoreFactory.createStrict(postgresConfig, logger)).rejects.toThrow(
      'PgVectorStore initialization failed'
    );
    expect(mockPool.end).toHaveBeenCalledTimes(1);
  });

  it('returns an initialized postgresql store when the schema is present', async () => {
    const client = {
      query: jest
        .fn<() => Promise<{ rows: unknown[] }>>()
        .mockResolvedValueOnce({ rows: [] })
        .mockResolvedValueOnce({ rows: [{ installed: true }] })
        .mockResolvedValueOnce({ rows: [{ exists: true }] }),
      release: jest.fn(),
    };
    mockPool.connect.mockImplementationOnce(async () => client);

    const store = await VectorStoreFactory.createStrict(postgresConfig, logger);

    expect(store).toBeInstanceOf(PgVectorStore);
    expect(mockPool.end).not.toHaveBeenCalled();
  });
});
