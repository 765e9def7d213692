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

import { createLogger, format, Logger, transports } from 'winston';

export interface RootLoggerOptions {
  level?: string;
  format?: 'json' | 'pretty';
  silent?: boolean;
}

const prettyFormat = format.printf(info => {
  const { timestamp, level, message, component, stack } = info;
  const prefix = typeof component === 'string' ? ` ${component}` : '';
  const trace = typeof stack === 'string' ? `\n${stack}` : '';
  return `${String(timestamp)} ${level}${prefix} ${String(message)}${trace}`;
});

/**
 * Root logger for the standalone service. Components get children of it
 * with a `component` label.
 */
export function createRootLogger(options: RootLoggerOptions = {}): Logger {
  const output =
    options.format === 'json'
      ? format.json()
      : format.combine(format.colorize(), prettyFormat);

  return createLogger({
    level: options.level ?? 'info',
    format: format.combine(format.timestamp(), format.errors({ stack: true }), output),
    defaultMeta: { service: 'rag-compare' },
    transports: [new transports.Console({ silent: options.silent ?? false })],
  });
}
