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
 * Express router for the RAG comparison service
 *
 * @packageDocumentation
 */

import express, { Request, Response, Router } from 'express';
import { Config } from '@backstage/config';
import type { Logger } from 'winston';
import {
  describeError,
  EmptyDatasetError,
  InvalidQueryError,
  RagCompareError,
  StrategyNotFoundError,
} from './errors';
import { createDefaultResourceCache, QueryDispatcher } from './harness';
import { ComparisonController } from './host/ComparisonController';
import { ConfigService, OllamaLLMService } from './services';

/**
 * Plugin environment interface
 */
export interface RouterEnvironment {
  logger: Logger;
  config: Config;
  /**
   * Directory relative dataset paths resolve against
   */
  baseDir?: string;
}

export interface ComparisonRouterOptions {
  logger: Logger;
  controller: ComparisonController;
  healthCheck?: () => Promise<boolean>;
}

function statusFor(error: unknown): number {
  if (error instanceof InvalidQueryError) {
    return 400;
  }
  if (error instanceof StrategyNotFoundError) {
    return 404;
  }
  if (error instanceof EmptyDatasetError) {
    return 409;
  }
  return 500;
}

/**
 * Create the router with the production services
 */
export async function createRagCompareRouter(env: RouterEnvironment): Promise<Router> {
  const { logger, config, baseDir } = env;

  const configService = new ConfigService(config);
  const appConfig = configService.getConfig();
  const llmService = new OllamaLLMService({ logger: logger.child({ component: 'ollama' }), config: configService });

  const controller = new ComparisonController({
    logger: logger.child({ component: 'controller' }),
    cache: createDefaultResourceCache({ logger, configService, llmService, baseDir }),
    dispatcher: new QueryDispatcher({
      logger: logger.child({ component: 'dispatcher' }),
      pacingMs: appConfig.dispatch.pacingMs,
    }),
    failureMode: appConfig.dispatch.failureMode,
  });

  return buildComparisonRouter({
    logger,
    controller,
    healthCheck: () => llmService.healthCheck(),
  });
}

/**
 * Mount the HTTP surface over an existing controller
 */
export function buildComparisonRouter(options: ComparisonRouterOptions): Router {
  const { logger, controller, healthCheck } = options;
  const router = Router();
  router.use(express.json());

  const sendError = (res: Response, action: string, error: unknown) => {
    const status = statusFor(error);
    if (status >= 500) {
      logger.error(`${action}: ${describeError(error)}`);
    } else {
      logger.warn(`${action}: ${describeError(error)}`);
    }
    res.status(status).json({
      error: action,
      code: error instanceof RagCompareError ? error.code : 'INTERNAL',
      message: describeError(error),
    });
  };

  /**
   * GET /strategies
   * Registered strategy names in dispatch order
   */
  router.get('/strategies', async (_req: Request, res: Response) => {
    try {
      res.json({ strategies: await controller.listStrategies() });
    } catch (error) {
      sendError(res, 'Failed to list strategies', error);
    }
  });

  /**
   * GET /dataset
   */
  router.get('/dataset', async (_req: Request, res: Response) => {
    try {
      res.json(await controller.datasetInfo());
    } catch (error) {
      sendError(res, 'Failed to load dataset', error);
    }
  });

  /**
   * POST /dataset/random
   * Pick a random dataset question
   */
  router.post('/dataset/random', async (_req: Request, res: Response) => {
    try {
      res.json(await controller.sampleRandomQuestion());
    } catch (error) {
      sendError(res, 'Failed to sample a question', error);
    }
  });

  /**
   * POST /dataset/random/use
   * Copy the sampled question into the draft query
   */
  router.post('/dataset/random/use', (_req: Request, res: Response) => {
    res.json(controller.useRandomQuestion());
  });

  /**
   * POST /compare
   * Run every strategy against `{ query }`
   */
  router.post('/compare', async (req: Request, res: Response) => {
    const query: unknown = req.body?.query;

    if (typeof query !== 'string') {
      sendError(res, 'Comparison rejected', new InvalidQueryError('query is required'));
      return;
    }

    try {
      res.json(await controller.compare(query));
    } catch (error) {
      const status = statusFor(error);
      if (status >= 500) {
        logger.error(`Comparison failed: ${describeError(error)}`);
      } else {
        logger.warn(`Comparison failed: ${describeError(error)}`);
      }
      res.status(status).json({
        error: 'Comparison failed',
        code: error instanceof RagCompareError ? error.code : 'STRATEGY_FAILURE',
        message: describeError(error),
        session: controller.view(),
      });
    }
  });

  /**
   * GET /session
   */
  router.get('/session', (_req: Request, res: Response) => {
    res.json(controller.view());
  });

  /**
   * GET /export
   * Download the last successful comparison as JSON
   */
  router.get('/export', (_req: Request, res: Response) => {
    const file = controller.exportLatest();
    if (!file) {
      res.status(404).json({ error: 'No comparison to export' });
      return;
    }

    res.setHeader('Content-Type', file.mimeType);
    res.setHeader('Content-Disposition', `attachment; filename="${file.fileName}"`);
    res.send(file.body);
  });

  /**
   * GET /health
   */
  router.get('/health', async (_req: Request, res: Response) => {
    try {
      const ollama = healthCheck ? await healthCheck() : true;
      res.json({ status: ollama ? 'healthy' : 'degraded', ollama });
    } catch (error) {
      sendError(res, 'Health check failed', error);
    }
  });

  return router;
}
