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
 * Standalone entry point
 *
 * @packageDocumentation
 */

import express from 'express';
import { loadAppConfig } from './config/loadAppConfig';
import { createRootLogger } from './logging/createRootLogger';
import { createRagCompareRouter } from './router';
import { ConfigService } from './services';

export const API_BASE_PATH = '/api/rag-compare';

async function main(): Promise<void> {
  const configRoot = process.cwd();
  const config = await loadAppConfig({ configRoot });
  const { logging, server: serverConfig } = new ConfigService(config).getConfig();
  const logger = createRootLogger(logging);

  const app = express();
  app.use(API_BASE_PATH, await createRagCompareRouter({ logger, config, baseDir: configRoot }));

  const server = app.listen(serverConfig.port, () => {
    logger.info(`RAG comparison service listening on port ${serverConfig.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close(error => {
      if (error) {
        logger.error(`Error while closing server: ${error.message}`);
        process.exitCode = 1;
      }
    });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(error => {
  process.stderr.write(`Failed to start: ${error instanceof Error ? error.stack : String(error)}\n`);
  process.exit(1);
});
