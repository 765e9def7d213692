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
 * Packages a dispatch into an export record and serializes it
 *
 * @packageDocumentation
 */

import { ExportRecord, ResultSet } from '../models';

export const EXPORT_MIME_TYPE = 'application/json';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export class ResultExporter {
  private readonly clock: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this.clock = clock;
  }

  /**
   * Snapshot a query and its result set. The timestamp is taken now, not
   * when the record is later serialized.
   */
  build(query: string, resultSet: ResultSet): ExportRecord {
    const results: Record<string, string> = {};
    for (const [name, generation] of resultSet) {
      results[name] = generation;
    }

    return Object.freeze({
      query,
      results: Object.freeze(results),
      timestamp: formatTimestamp(this.clock()),
    });
  }

  /**
   * UTF-8 JSON with keys in the order query, results, timestamp
   */
  serialize(record: ExportRecord): Buffer {
    const ordered = {
      query: record.query,
      results: record.results,
      timestamp: record.timestamp,
    };
    return Buffer.from(JSON.stringify(ordered, null, 2), 'utf8');
  }

  /**
   * `rag_comparison_<unix-epoch-seconds>.json`
   */
  fileName(now: Date = this.clock()): string {
    return `rag_comparison_${Math.floor(now.getTime() / 1000)}.json`;
  }
}
