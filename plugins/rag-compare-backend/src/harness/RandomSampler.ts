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

import { EmptyDatasetError } from '../errors';
import { IQuestionDataset } from '../interfaces';
import { RandomSample } from '../models';

/**
 * Picks a dataset row uniformly at random
 */
export class RandomSampler {
  private readonly random: () => number;

  /**
   * @param random - source of floats in [0, 1)
   */
  constructor(random: () => number = Math.random) {
    this.random = random;
  }

  sample(dataset: IQuestionDataset): RandomSample {
    const rowCount = dataset.rowCount;
    if (rowCount === 0) {
      throw new EmptyDatasetError();
    }

    const index = Math.min(rowCount - 1, Math.max(0, Math.floor(this.random() * rowCount)));
    return {
      question: dataset.row(index).Question,
      index,
    };
  }
}
