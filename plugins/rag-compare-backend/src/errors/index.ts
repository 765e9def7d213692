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
 * Error types raised by the comparison harness
 *
 * @packageDocumentation
 */

export type RagCompareErrorCode =
  | 'INVALID_QUERY'
  | 'STRATEGY_FAILURE'
  | 'RESOURCE_CONSTRUCTION_FAILURE'
  | 'NOT_FOUND'
  | 'EMPTY_DATASET'
  | 'INVALID_REGISTRATION';

/**
 * Base class for every error the harness raises on its own.
 */
export class RagCompareError extends Error {
  readonly code: RagCompareErrorCode;

  constructor(code: RagCompareErrorCode, message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'RagCompareError';
    this.code = code;
  }
}

export class InvalidQueryError extends RagCompareError {
  constructor(detail = 'Query must not be empty') {
    super('INVALID_QUERY', detail);
    this.name = 'InvalidQueryError';
  }
}

/**
 * A strategy produced no usable generation, or failed while running in
 * isolated dispatch mode.
 */
export class StrategyFailureError extends RagCompareError {
  readonly strategyName: string;

  constructor(strategyName: string, detail: string, cause?: unknown) {
    super('STRATEGY_FAILURE', `Strategy ${strategyName} failed: ${detail}`, cause);
    this.name = 'StrategyFailureError';
    this.strategyName = strategyName;
  }
}

export class ResourceConstructionError extends RagCompareError {
  readonly resource: string;

  constructor(resource: string, cause: unknown) {
    super(
      'RESOURCE_CONSTRUCTION_FAILURE',
      `Failed to construct ${resource}: ${describeError(cause)}`,
      cause
    );
    this.name = 'ResourceConstructionError';
    this.resource = resource;
  }
}

export class StrategyNotFoundError extends RagCompareError {
  constructor(strategyName: string) {
    super('NOT_FOUND', `Strategy not registered: ${strategyName}`);
    this.name = 'StrategyNotFoundError';
  }
}

export class EmptyDatasetError extends RagCompareError {
  constructor() {
    super('EMPTY_DATASET', 'Cannot sample from an empty dataset');
    this.name = 'EmptyDatasetError';
  }
}

export class InvalidRegistrationError extends RagCompareError {
  constructor(detail: string) {
    super('INVALID_REGISTRATION', detail);
    this.name = 'InvalidRegistrationError';
  }
}

/**
 * Render any thrown value as a single-line message.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
