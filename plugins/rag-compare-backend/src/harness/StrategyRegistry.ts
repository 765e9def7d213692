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
 * Fixed, ordered collection of named strategies
 *
 * @packageDocumentation
 */

import { InvalidRegistrationError, StrategyNotFoundError } from '../errors';
import { IRAGStrategy } from '../rag/types';

/**
 * Names double as keys of the exported `results` object, so anything that
 * looks like an array index (and would be reordered by JSON) is refused.
 */
const STRATEGY_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_.-]*$/;

/**
 * Strategies keyed by their `name`, in registration order. The set is
 * fixed at construction; dispatch and display both follow `names()`.
 */
export class StrategyRegistry implements Iterable<[string, IRAGStrategy]> {
  private readonly strategies = new Map<string, IRAGStrategy>();
  private readonly orderedNames: readonly string[];

  constructor(strategies: Iterable<IRAGStrategy>) {
    for (const strategy of strategies) {
      if (!STRATEGY_NAME_PATTERN.test(strategy.name)) {
        throw new InvalidRegistrationError(`Invalid strategy name: "${strategy.name}"`);
      }
      if (this.strategies.has(strategy.name)) {
        throw new InvalidRegistrationError(`Strategy registered twice: ${strategy.name}`);
      }
      this.strategies.set(strategy.name, strategy);
    }
    this.orderedNames = Object.freeze(Array.from(this.strategies.keys()));
  }

  get size(): number {
    return this.strategies.size;
  }

  names(): readonly string[] {
    return this.orderedNames;
  }

  has(name: string): boolean {
    return this.strategies.has(name);
  }

  /**
   * @throws StrategyNotFoundError for unregistered names
   */
  get(name: string): IRAGStrategy {
    const strategy = this.strategies.get(name);
    if (!strategy) {
      throw new StrategyNotFoundError(name);
    }
    return strategy;
  }

  [Symbol.iterator](): Iterator<[string, IRAGStrategy]> {
    return this.strategies.entries();
  }
}
