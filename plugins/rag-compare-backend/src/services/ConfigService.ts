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
 * Configuration service implementation
 * Resolves the `ragCompare` section into a typed configuration
 *
 * @packageDocumentation
 */

import { Config } from '@backstage/config';
import { IConfigService } from '../interfaces';
import {
  DatasetConfig,
  DispatchFailureMode,
  PostgresConfig,
  RagCompareConfig,
  VectorStoreConfig,
} from '../models';

export const DEFAULT_DATASET_PATH = 'data/sample-questions.json';

/**
 * Configuration service that wraps Backstage Config
 * Follows Single Responsibility Principle
 */
export class ConfigService implements IConfigService {
  private readonly config: Config;
  private readonly cachedConfig: RagCompareConfig;

  constructor(config: Config) {
    this.config = config;
    this.cachedConfig = this.loadConfig();
  }

  private loadConfig(): RagCompareConfig {
    const enabled = this.config.getOptionalStringArray('ragCompare.strategies.enabled');

    return {
      defaultModel: this.config.getOptionalString('ragCompare.defaultModel') || 'llama3.2',
      embeddingModel: this.config.getOptionalString('ragCompare.embeddingModel') || 'all-minilm',
      ollamaBaseUrl: this.config.getOptionalString('ragCompare.ollamaBaseUrl') || 'http://localhost:11434',
      defaultTopK: this.config.getOptionalNumber('ragCompare.defaultTopK') || 4,
      chunkSize: this.config.getOptionalNumber('ragCompare.chunkSize') || 256,
      chunkOverlap: this.config.getOptionalNumber('ragCompare.chunkOverlap') ?? 32,
      vectorStore: this.loadVectorStoreConfig(),
      dataset: this.loadDatasetConfig(),
      indexing: {
        onStartup: this.config.getOptionalBoolean('ragCompare.indexing.onStartup') ?? true,
      },
      dispatch: {
        failureMode: this.loadFailureMode(),
        pacingMs: this.config.getOptionalNumber('ragCompare.dispatch.pacingMs') ?? 0,
      },
      strategies: {
        enabled: enabled && enabled.length > 0 ? enabled : undefined,
        selfRag: {
          maxRetries: this.config.getOptionalNumber('ragCompare.strategies.selfRag.maxRetries') ?? 2,
        },
        crag: {
          minRelevantChunks:
            this.config.getOptionalNumber('ragCompare.strategies.crag.minRelevantChunks') ?? 1,
        },
      },
      server: {
        port: this.config.getOptionalNumber('ragCompare.server.port') || 7007,
      },
      logging: {
        level: this.config.getOptionalString('ragCompare.logging.level') || 'info',
        format: this.config.getOptionalString('ragCompare.logging.format') === 'json' ? 'json' : 'pretty',
      },
    };
  }

  private loadFailureMode(): DispatchFailureMode {
    const mode = this.config.getOptionalString('ragCompare.dispatch.failureMode') ?? 'fail-fast';
    if (mode !== 'fail-fast' && mode !== 'isolate') {
      throw new Error(`Unsupported dispatch failure mode: ${mode}`);
    }
    return mode;
  }

  private loadDatasetConfig(): DatasetConfig {
    const source = this.config.getOptionalString('ragCompare.dataset.source') ?? 'file';

    if (source === 'huggingface') {
      return {
        source,
        name: this.config.getString('ragCompare.dataset.name'),
        config: this.config.getOptionalString('ragCompare.dataset.config') || 'default',
        split: this.config.getOptionalString('ragCompare.dataset.split') || 'train',
        maxRows: this.config.getOptionalNumber('ragCompare.dataset.maxRows') || 1000,
        baseUrl:
          this.config.getOptionalString('ragCompare.dataset.huggingFaceBaseUrl') ||
          'https://datasets-server.huggingface.co',
      };
    }

    if (source !== 'file') {
      throw new Error(`Unsupported dataset source: ${source}`);
    }

    return {
      source,
      path: this.config.getOptionalString('ragCompare.dataset.path') || DEFAULT_DATASET_PATH,
    };
  }

  private loadVectorStoreConfig(): VectorStoreConfig {
    const type = this.config.getOptionalString('ragCompare.vectorStore.type');

    if (type === 'postgresql') {
      return {
        type: 'postgresql',
        postgresql: this.loadPostgresConfig(),
      };
    }

    return {
      type: 'memory',
    };
  }

  private loadPostgresConfig(): PostgresConfig {
    const prefix = 'ragCompare.vectorStore.postgresql';
    const password = this.config.getOptionalString(`${prefix}.password`) || '';

    if (!password) {
      throw new Error('PostgreSQL password is required when using postgresql vector store');
    }

    return {
      host: this.config.getOptionalString(`${prefix}.host`) || 'localhost',
      port: this.config.getOptionalNumber(`${prefix}.port`) || 5432,
      database: this.config.getOptionalString(`${prefix}.database`) || 'rag_compare',
      user: this.config.getOptionalString(`${prefix}.user`) || 'rag_compare',
      password,
      ssl: this.config.getOptionalBoolean(`${prefix}.ssl`) ?? false,
      maxConnections: this.config.getOptionalNumber(`${prefix}.maxConnections`) || 10,
      idleTimeoutMillis: this.config.getOptionalNumber(`${prefix}.idleTimeoutMillis`) || 30000,
      connectionTimeoutMillis: this.config.getOptionalNumber(`${prefix}.connectionTimeoutMillis`) || 5000,
    };
  }

  getConfig(): RagCompareConfig {
    return this.cachedConfig;
  }

  getVectorStoreType(): VectorStoreConfig['type'] {
    return this.cachedConfig.vectorStore.type;
  }

  /**
   * Get PostgreSQL configuration
   * Throws error if not configured
   */
  getPostgresConfig(): PostgresConfig {
    const { vectorStore } = this.cachedConfig;
    if (vectorStore.type !== 'postgresql' || !vectorStore.postgresql) {
      throw new Error('PostgreSQL vector store is not configured');
    }
    return vectorStore.postgresql;
  }
}
