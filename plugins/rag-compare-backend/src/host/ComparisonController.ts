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
 * Host-side operations behind the comparison screen
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { assertValidQuery, QueryDispatcher } from '../harness/QueryDispatcher';
import { ResourceCache } from '../harness/ResourceCache';
import { RandomSampler } from '../harness/RandomSampler';
import { EXPORT_MIME_TYPE, ResultExporter } from '../harness/ResultExporter';
import { DispatchFailureMode, RandomSample } from '../models';
import {
  ComparisonSessionState,
  initialSessionState,
  SessionView,
  toSessionView,
  withDispatchFailed,
  withDispatchSucceeded,
  withDraftFromSample,
  withRandomSample,
} from './ComparisonSession';

export interface ComparisonControllerOptions {
  logger: Logger;
  cache: ResourceCache;
  dispatcher: QueryDispatcher;
  exporter?: ResultExporter;
  sampler?: RandomSampler;
  failureMode?: DispatchFailureMode;
}

export interface ExportFile {
  fileName: string;
  mimeType: string;
  body: Buffer;
}

/**
 * Owns the single operator session and drives the harness with it.
 */
export class ComparisonController {
  private readonly logger: Logger;
  private readonly cache: ResourceCache;
  private readonly dispatcher: QueryDispatcher;
  private readonly exporter: ResultExporter;
  private readonly sampler: RandomSampler;
  private readonly failureMode: DispatchFailureMode;
  private session: ComparisonSessionState = initialSessionState();
  private latestDispatch = 0;

  constructor(options: ComparisonControllerOptions) {
    this.logger = options.logger;
    this.cache = options.cache;
    this.dispatcher = options.dispatcher;
    this.exporter = options.exporter ?? new ResultExporter();
    this.sampler = options.sampler ?? new RandomSampler();
    this.failureMode = options.failureMode ?? 'fail-fast';
  }

  get state(): ComparisonSessionState {
    return this.session;
  }

  view(): SessionView {
    return toSessionView(this.session);
  }

  async listStrategies(): Promise<readonly string[]> {
    const registry = await this.cache.getRegistry();
    return registry.names();
  }

  async datasetInfo(): Promise<{ totalSamples: number }> {
    const dataset = await this.cache.getDataset();
    return { totalSamples: dataset.rowCount };
  }

  async sampleRandomQuestion(): Promise<RandomSample> {
    const sample = this.sampler.sample(await this.cache.getDataset());
    this.session = withRandomSample(this.session, sample);
    return sample;
  }

  useRandomQuestion(): SessionView {
    this.session = withDraftFromSample(this.session);
    return this.view();
  }

  /**
   * Run every strategy on the query. An invalid query is rejected without
   * touching the session; any other failure marks the previous results
   * stale and is rethrown. Only the most recently started comparison
   * updates the session; an overtaken one still resolves or rejects.
   */
  async compare(query: string): Promise<SessionView> {
    assertValidQuery(query);
    const dispatchId = ++this.latestDispatch;
    this.logger.info(`Comparing strategies for query: "${query.substring(0, 50)}"`);

    try {
      const registry = await this.cache.getRegistry();

      if (this.failureMode === 'isolate') {
        const { results, failures } = await this.dispatcher.dispatchIsolated(query, registry);
        this.applyIfLatest(dispatchId, query, session =>
          withDispatchSucceeded(
            session,
            this.exporter.build(query, results),
            failures.map(failure => ({ strategy: failure.strategyName, message: failure.message }))
          )
        );
      } else {
        const results = await this.dispatcher.dispatch(query, registry);
        this.applyIfLatest(dispatchId, query, session =>
          withDispatchSucceeded(session, this.exporter.build(query, results))
        );
      }
    } catch (error) {
      this.applyIfLatest(dispatchId, query, session => withDispatchFailed(session, query, error));
      throw error;
    }

    return this.view();
  }

  private applyIfLatest(
    dispatchId: number,
    query: string,
    transition: (session: ComparisonSessionState) => ComparisonSessionState
  ): void {
    if (dispatchId !== this.latestDispatch) {
      this.logger.debug(`Discarding superseded comparison for query: "${query.substring(0, 50)}"`);
      return;
    }
    this.session = transition(this.session);
  }

  /**
   * The last successful comparison as a downloadable file, if any
   */
  exportLatest(): ExportFile | undefined {
    const record = this.session.lastRecord;
    if (!record) {
      return undefined;
    }

    return {
      fileName: this.exporter.fileName(),
      mimeType: EXPORT_MIME_TYPE,
      body: this.exporter.serialize(record),
    };
  }
}
