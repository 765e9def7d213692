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

import { IQuestionDataset } from '../interfaces';
import { DatasetRow } from '../models';

export function isDatasetRow(value: unknown): value is DatasetRow {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    'Question' in value &&
    typeof value.Question === 'string'
  );
}

/**
 * Immutable in-memory table of question rows
 */
export class QuestionDataset implements IQuestionDataset {
  private readonly rows: readonly DatasetRow[];

  constructor(rows: readonly DatasetRow[]) {
    this.rows = Object.freeze(rows.map(row => Object.freeze({ ...row })));
  }

  /**
   * Validate raw records and build a dataset. `origin` names the source in
   * error messages.
   */
  static fromRecords(records: readonly unknown[], origin: string): QuestionDataset {
    const rows = records.map((record, index) => {
      if (!isDatasetRow(record)) {
        throw new Error(`${origin}: row ${index} has no Question text`);
      }
      return record;
    });
    return new QuestionDataset(rows);
  }

  get rowCount(): number {
    return this.rows.length;
  }

  row(index: number): DatasetRow {
    if (!Number.isInteger(index) || index < 0 || index >= this.rows.length) {
      throw new RangeError(`Row index ${index} outside [0, ${this.rows.length})`);
    }
    return this.rows[index];
  }
}
