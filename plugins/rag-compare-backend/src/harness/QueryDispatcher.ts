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
 * Runs one query against every registered strategy
 *
 * @packageDocumentation
 */

import { setTimeout as delay } from 'timers/promises';
import type { Logger } from 'winston';
import { describeError, InvalidQueryError, StrategyFailureError } from '../errors';
import { ResultSet } from '../models';
import { IRAGStrategy } from '../rag/types';
import { StrategyRegistry } from './StrategyRegistry';

export interface QueryDispatcherOptions {
  logger: Logger;
  /**
   * Pause after each strategy completes. Cosmetic only.
   */
  pacingMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Outcome of an isolated dispatch: every strategy has an entry, failed
 * ones carry a placeholder generation and are listed in `failures`.
 */
export interface IsolatedDispatchResult {
  results: ResultSet;
  failures: StrategyFailureError[];
}

/**
 * Reject empty or whitespace-only queries before anything runs
 */
export function assertValidQuery(query: string): void {
  if (typeof query !== 'string' || query.trim().length === 0) {
    throw new InvalidQueryError();
  }
}

export function failurePlaceholder(name: string, error: unknown): string {
  return `[${name} failed] ${describeError(error)}`;
}

/**
 * Strategies run strictly one after another, in registry order. Results
 * keep that order no matter how long each strategy takes.
 */
export class QueryDispatcher {
  private readonly logger: Logger;
  private readonly pacingMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: QueryDispatcherOptions) {
    this.logger = options.logger;
    this.pacingMs = options.pacingMs ?? 0;
    this.sleep = options.sleep ?? (ms => delay(ms));
  }

  /**
   * Fail-fast dispatch: the first strategy error aborts the whole run and
   * is rethrown unchanged; no partial result set is returned.
   */
  async dispatch(query: string, registry: StrategyRegistry): Promise<ResultSet> {
    assertValidQuery(query);
    const results = new Map<string, string>();

    for (const name of registry.names()) {
      const strategy = registry.get(name);
      try {
        results.set(name, await this.invoke(name, strategy, query));
      } catch (error) {
        this.logger.error(`Strategy ${name} failed, aborting dispatch: ${describeError(error)}`);
        throw error;
      }
      await this.pace();
    }

    return results;
  }

  /**
   * Dispatch that runs every strategy even when some fail. A failure is
   * recorded as a placeholder entry plus a StrategyFailureError.
   */
  async dispatchIsolated(query: string, registry: StrategyRegistry): Promise<IsolatedDispatchResult> {
    assertValidQuery(query);
    const results = new Map<string, string>();
    const failures: StrategyFailureError[] = [];

    for (const name of registry.names()) {
      const strategy = registry.get(name);
      try {
        results.set(name, await this.invoke(name, strategy, query));
      } catch (error) {
        this.logger.error(`Strategy ${name} failed: ${describeError(error)}`);
        failures.push(
          error instanceof StrategyFailureError
            ? error
            : new StrategyFailureError(name, describeError(error), error)
        );
        results.set(name, failurePlaceholder(name, error));
      }
      await this.pace();
    }

    return { results, failures };
  }

  private async invoke(name: string, strategy: IRAGStrategy, query: string): Promise<string> {
    const startedAt = Date.now();
    this.logger.info(`Running strategy ${name}`);

    const result: unknown = await strategy.run(query);
    const generation = readGeneration(result);
    if (generation === undefined) {
      throw new StrategyFailureError(name, 'result has no generation text');
    }

    this.logger.info(`Strategy ${name} finished in ${Date.now() - startedAt}ms`);
    return generation;
  }

  private async pace(): Promise<void> {
    if (this.pacingMs > 0) {
      await this.sleep(this.pacingMs);
    }
  }
}

function readGeneration(result: unknown): string | undefined {
  if (typeof result !== 'object' || result === null || !('generation' in result)) {
    return undefined;
  }
  return typeof result.generation === 'string' ? result.generation : undefined;
}
