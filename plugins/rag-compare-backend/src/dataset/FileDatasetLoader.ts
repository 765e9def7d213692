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

import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from 'winston';
import { IDatasetLoader, IQuestionDataset } from '../interfaces';
import { QuestionDataset } from './QuestionDataset';

/**
 * Loads question rows from a JSON file holding either an array of rows or
 * an object with a `rows` array.
 */
export class FileDatasetLoader implements IDatasetLoader {
  private readonly logger: Logger;
  private readonly filePath: string;

  constructor(logger: Logger, filePath: string, baseDir: string = process.cwd()) {
    this.logger = logger;
    this.filePath = path.resolve(baseDir, filePath);
  }

  async load(): Promise<IQuestionDataset> {
    this.logger.info(`Loading dataset from ${this.filePath}`);

    const text = await fs.promises.readFile(this.filePath, 'utf8');
    const parsed: unknown = JSON.parse(text);
    const records = extractRecords(parsed);

    if (!records) {
      throw new Error(`${this.filePath}: expected an array of rows or an object with a rows array`);
    }

    const dataset = QuestionDataset.fromRecords(records, this.filePath);
    this.logger.info(`Loaded ${dataset.rowCount} dataset rows`);
    return dataset;
  }
}

function extractRecords(parsed: unknown): unknown[] | undefined {
  if (Array.isArray(parsed)) {
    return parsed;
  }
  if (typeof parsed === 'object' && parsed !== null && 'rows' in parsed && Array.isArray(parsed.rows)) {
    return parsed.rows;
  }
  return undefined;
}
