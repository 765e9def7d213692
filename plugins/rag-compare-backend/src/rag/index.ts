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
 * RAG strategies and the factory that wires the default line-up
 *
 * @packageDocumentation
 */

import { InvalidRegistrationError } from '../errors';
import { StrategyRegistry } from '../harness/StrategyRegistry';
import { StrategyDependencies } from '../interfaces';
import { AdaptiveRAGStrategy } from './strategies/AdaptiveRAGStrategy';
import { BasicRAGStrategy } from './strategies/BasicRAGStrategy';
import { CorrectiveRAGStrategy } from './strategies/CorrectiveRAGStrategy';
import { SelfRAGStrategy } from './strategies/SelfRAGStrategy';
import { IRAGStrategy } from './types';

export * from './types';
export { BasicRAGStrategy, CorrectiveRAGStrategy, SelfRAGStrategy, AdaptiveRAGStrategy };
export type { AdaptiveRAGDependencies } from './strategies/AdaptiveRAGStrategy';

/**
 * Builds the strategy registry. Every strategy receives the same LLM
 * client and vector store handle; AdaptiveRAG delegates to the very
 * SelfRAG instance that is registered on its own.
 */
export class RAGStrategyFactory {
  static createRegistry(dependencies: StrategyDependencies): StrategyRegistry {
    const selfRag = new SelfRAGStrategy(dependencies);
    const lineup: IRAGStrategy[] = [
      new BasicRAGStrategy(dependencies),
      new CorrectiveRAGStrategy(dependencies),
      new AdaptiveRAGStrategy({ ...dependencies, retrievalStrategy: selfRag }),
      selfRag,
    ];

    const enabled = dependencies.config.getConfig().strategies.enabled;
    if (!enabled) {
      return new StrategyRegistry(lineup);
    }

    const byName = new Map<string, IRAGStrategy>(lineup.map(strategy => [strategy.name, strategy]));
    return new StrategyRegistry(
      enabled.map(name => {
        const strategy = byName.get(name);
        if (!strategy) {
          throw new InvalidRegistrationError(`Unknown strategy in configuration: ${name}`);
        }
        return strategy;
      })
    );
  }
}
