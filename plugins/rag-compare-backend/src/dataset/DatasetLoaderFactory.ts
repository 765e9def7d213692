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

import type { Logger } from 'winston';
import { IDatasetLoader } from '../interfaces';
import { DatasetConfig } from '../models';
import { FileDatasetLoader } from './FileDatasetLoader';
import { HuggingFaceDatasetLoader } from './HuggingFaceDatasetLoader';

/**
 * Picks the dataset loader for the configured source
 */
export class DatasetLoaderFactory {
  static create(config: DatasetConfig, logger: Logger, baseDir?: string): IDatasetLoader {
    switch (config.source) {
      case 'huggingface':
        return new HuggingFaceDatasetLoader(logger, config);
      case 'file':
        return new FileDatasetLoader(logger, config.path, baseDir);
    }
  }
}
