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

import { ResourceConstructionError } from '../errors';

/**
 * A value built on first request and then held for the life of the
 * process. Concurrent first requests share one construction; a failed
 * construction is forgotten so the next request starts over.
 */
export class LazyResource<T> {
  private pending: Promise<T> | undefined;

  constructor(
    readonly name: string,
    private readonly build: () => Promise<T>
  ) {}

  get(): Promise<T> {
    if (!this.pending) {
      this.pending = this.construct().catch((error: unknown) => {
        this.pending = undefined;
        throw new ResourceConstructionError(this.name, error);
      });
    }
    return this.pending;
  }

  /**
   * Whether a construction has started (and not failed)
   */
  get started(): boolean {
    return this.pending !== undefined;
  }

  // async so a synchronous throw from build still arrives as a rejection
  private async construct(): Promise<T> {
    return this.build();
  }
}
