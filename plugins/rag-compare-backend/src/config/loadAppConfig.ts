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
import { ConfigReader } from '@backstage/config';
import { loadConfig } from '@backstage/config-loader';

export interface LoadAppConfigOptions {
  /**
   * Directory holding `app-config.yaml`
   */
  configRoot: string;
  /**
   * Extra config files, applied after the defaults
   */
  extraPaths?: string[];
}

/**
 * Load `app-config.yaml`, then `app-config.local.yaml` when it exists,
 * then any extra files (including those listed, comma separated, in
 * `RAG_COMPARE_CONFIG`). Later files override earlier ones and
 * `${ENV_VAR}` references are substituted.
 */
export async function loadAppConfig(options: LoadAppConfigOptions): Promise<ConfigReader> {
  const { configRoot } = options;
  const fromEnv = (process.env.RAG_COMPARE_CONFIG ?? '')
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);

  const candidates = [
    path.resolve(configRoot, 'app-config.yaml'),
    path.resolve(configRoot, 'app-config.local.yaml'),
  ].filter(candidate => fs.existsSync(candidate));

  const configPaths = [...candidates, ...(options.extraPaths ?? []), ...fromEnv].map(configPath =>
    path.resolve(configRoot, configPath)
  );

  const { appConfigs } = await loadConfig({
    configRoot,
    configTargets: configPaths.map(configPath => ({ path: configPath })),
  });

  return ConfigReader.fromConfigs(appConfigs);
}
