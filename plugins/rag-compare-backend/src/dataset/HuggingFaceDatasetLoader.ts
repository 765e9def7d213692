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
 * Dataset loader backed by the Hugging Face datasets-server rows API
 *
 * @packageDocumentation
 */

import fetch from 'node-fetch';
import type { Logger } from 'winston';
import { IDatasetLoader, IQuestionDataset } from '../interfaces';
import { HuggingFaceRowsResponse } from '../models';
import { QuestionDataset } from './QuestionDataset';

/**
 * The rows endpoint serves at most this many rows per request
 */
export const HUGGING_FACE_PAGE_SIZE = 100;

export interface HuggingFaceDatasetOptions {
  name: string;
  config: string;
  split: string;
  maxRows: number;
  baseUrl: string;
}

export class HuggingFaceDatasetLoader implements IDatasetLoader {
  private readonly logger: Logger;
  private readonly options: HuggingFaceDatasetOptions;

  constructor(logger: Logger, options: HuggingFaceDatasetOptions) {
    this.logger = logger;
    this.options = options;
  }

  async load(): Promise<IQuestionDataset> {
    const { name, split, maxRows } = this.options;
    this.logger.info(`Loading dataset ${name} (split: ${split}, max rows: ${maxRows})`);

    const records: Record<string, unknown>[] = [];
    let total = Infinity;

    while (records.length < Math.min(total, maxRows)) {
      const length = Math.min(HUGGING_FACE_PAGE_SIZE, maxRows - records.length);
      const page = await this.fetchPage(records.length, length);
      total = page.num_rows_total;

      if (page.rows.length === 0) {
        break;
      }
      records.push(...page.rows.map(entry => entry.row));
    }

    const dataset = QuestionDataset.fromRecords(records, name);
    this.logger.info(`Loaded ${dataset.rowCount} of ${total} rows from ${name}`);
    return dataset;
  }

  private async fetchPage(offset: number, length: number): Promise<HuggingFaceRowsResponse> {
    const { name, config, split, baseUrl } = this.options;
    const params = new URLSearchParams({
      dataset: name,
      config,
      split,
      offset: String(offset),
      length: String(length),
    });

    const response = await fetch(`${baseUrl.replace(/\/+$/, '')}/rows?${params.toString()}`);

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Dataset rows request failed (${response.status}): ${errorText}`);
    }

    const json: HuggingFaceRowsResponse = await response.json();

    if (!Array.isArray(json.rows) || typeof json.num_rows_total !== 'number') {
      throw new Error('Invalid rows response format from datasets server');
    }

    return json;
  }
}
