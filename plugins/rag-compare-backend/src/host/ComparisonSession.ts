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
 * Host-owned session state for the comparison screen
 *
 * The harness never holds this value; the host passes it through these
 * pure transitions and keeps the result.
 *
 * @packageDocumentation
 */

import { describeError, RagCompareError, RagCompareErrorCode } from '../errors';
import { ExportRecord, RandomSample } from '../models';

export type DispatchStatus = 'idle' | 'succeeded' | 'failed';

export interface DispatchFailure {
  query: string;
  code: RagCompareErrorCode;
  message: string;
}

export interface StrategyFailureNote {
  strategy: string;
  message: string;
}

export interface ComparisonSessionState {
  readonly draftQuery: string;
  readonly randomSample?: RandomSample;
  readonly status: DispatchStatus;
  /**
   * Last successful dispatch. Survives later failures.
   */
  readonly lastRecord?: ExportRecord;
  readonly lastFailure?: DispatchFailure;
  /**
   * Strategies that failed inside an otherwise successful isolated dispatch
   */
  readonly strategyFailures: readonly StrategyFailureNote[];
}

export interface ResultView {
  strategy: string;
  generation: string;
  length: number;
}

export interface SessionView {
  status: DispatchStatus;
  draftQuery: string;
  randomSample?: RandomSample;
  comparison?: {
    query: string;
    timestamp: string;
    /**
     * True when a later dispatch failed; these results are not its answer
     */
    stale: boolean;
    results: ResultView[];
  };
  error?: DispatchFailure;
  strategyFailures: StrategyFailureNote[];
}

export function initialSessionState(): ComparisonSessionState {
  return { draftQuery: '', status: 'idle', strategyFailures: [] };
}

export function withRandomSample(state: ComparisonSessionState, sample: RandomSample): ComparisonSessionState {
  return { ...state, randomSample: sample };
}

/**
 * Copy the sampled question into the draft; no-op without a sample
 */
export function withDraftFromSample(state: ComparisonSessionState): ComparisonSessionState {
  if (!state.randomSample) {
    return state;
  }
  return { ...state, draftQuery: state.randomSample.question };
}

export function withDispatchSucceeded(
  state: ComparisonSessionState,
  record: ExportRecord,
  strategyFailures: readonly StrategyFailureNote[] = []
): ComparisonSessionState {
  return {
    ...state,
    draftQuery: record.query,
    status: 'succeeded',
    lastRecord: record,
    lastFailure: undefined,
    strategyFailures,
  };
}

export function withDispatchFailed(
  state: ComparisonSessionState,
  query: string,
  error: unknown
): ComparisonSessionState {
  return {
    ...state,
    draftQuery: query,
    status: 'failed',
    lastFailure: {
      query,
      code: error instanceof RagCompareError ? error.code : 'STRATEGY_FAILURE',
      message: describeError(error),
    },
    strategyFailures: [],
  };
}

export function toSessionView(state: ComparisonSessionState): SessionView {
  const { lastRecord } = state;

  return {
    status: state.status,
    draftQuery: state.draftQuery,
    randomSample: state.randomSample,
    comparison: lastRecord && {
      query: lastRecord.query,
      timestamp: lastRecord.timestamp,
      stale: state.status === 'failed',
      results: Object.entries(lastRecord.results).map(([strategy, generation]) => ({
        strategy,
        generation,
        length: Array.from(generation).length,
      })),
    },
    error: state.status === 'failed' ? state.lastFailure : undefined,
    strategyFailures: [...state.strategyFailures],
  };
}
