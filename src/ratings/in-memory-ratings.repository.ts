/*
 * Copyright (C) 2025 OurTextScores Contributors
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU Affero General Public License as published
 * by the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU Affero General Public License for more details.
 *
 * You should have received a copy of the GNU Affero General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

import { Injectable } from '@nestjs/common';
import { RatingsRepository } from './ratings.repository';
import { compareRatingEvents, userSubstringPattern } from './rating.types';
import type { FlaggedImage, RatingEvent, RatingFilter, UserMatch } from './rating.types';
import { DuplicateRatingError, StorageUnavailableError } from './ratings.errors';

function pairKey(imageId: string, userIdentifier: string): string {
  return JSON.stringify([imageId, userIdentifier]);
}

function copyEvent(event: RatingEvent): RatingEvent {
  return { ...event, timestamp: new Date(event.timestamp.getTime()) };
}

/**
 * Process-local store for development and tests. Every method does its check
 * and mutation synchronously, so concurrent callers cannot interleave inside
 * an insert.
 */
@Injectable()
export class InMemoryRatingsRepository extends RatingsRepository {
  private readonly events = new Map<string, RatingEvent>();
  private readonly pairs = new Map<string, string>();

  async insert(event: RatingEvent): Promise<void> {
    const key = pairKey(event.imageId, event.userIdentifier);
    if (this.pairs.has(key)) {
      throw new DuplicateRatingError(event.imageId, event.userIdentifier);
    }
    if (this.events.has(event.id)) {
      throw new StorageUnavailableError(`rating id ${event.id} is already in use`);
    }
    this.events.set(event.id, copyEvent(event));
    this.pairs.set(key, event.id);
  }

  async findImageIdsByUser(userIdentifier: string): Promise<string[]> {
    return this.sorted()
      .filter((event) => event.userIdentifier === userIdentifier)
      .map((event) => event.imageId);
  }

  async find(filter: RatingFilter): Promise<RatingEvent[]> {
    const imageIds = filter.imageIds ? new Set(filter.imageIds) : undefined;
    return this.sorted()
      .filter((event) => !filter.valueKind || event.value.kind === filter.valueKind)
      .filter((event) => !imageIds || imageIds.has(event.imageId))
      .map(copyEvent);
  }

  async countFlagsByImage(): Promise<FlaggedImage[]> {
    const counts = new Map<string, number>();
    for (const event of this.events.values()) {
      if (event.value.kind === 'flagged') {
        counts.set(event.imageId, (counts.get(event.imageId) ?? 0) + 1);
      }
    }
    return Array.from(counts, ([imageId, flagCount]) => ({ imageId, flagCount })).sort(
      (a, b) => b.flagCount - a.flagCount || (a.imageId < b.imageId ? -1 : a.imageId > b.imageId ? 1 : 0)
    );
  }

  async deleteByImage(imageId: string): Promise<number> {
    return this.deleteWhere((event) => event.imageId === imageId);
  }

  async findLatestByUser(userIdentifier: string): Promise<RatingEvent | null> {
    const own = this.sorted().filter((event) => event.userIdentifier === userIdentifier);
    const latest = own[own.length - 1];
    return latest ? copyEvent(latest) : null;
  }

  async deleteById(id: string): Promise<boolean> {
    return this.deleteWhere((event) => event.id === id) === 1;
  }

  async findUserIdentifiers(match: UserMatch): Promise<string[]> {
    const needle = userSubstringPattern(match.pattern);
    const users = new Set<string>();
    for (const event of this.events.values()) {
      const matches = match.exactMatch
        ? event.userIdentifier === match.pattern
        : needle.test(event.userIdentifier);
      if (matches) users.add(event.userIdentifier);
    }
    return Array.from(users).sort();
  }

  async deleteByUsers(userIdentifiers: string[]): Promise<number> {
    const targets = new Set(userIdentifiers);
    return this.deleteWhere((event) => targets.has(event.userIdentifier));
  }

  private sorted(): RatingEvent[] {
    return Array.from(this.events.values()).sort(compareRatingEvents);
  }

  private deleteWhere(predicate: (event: RatingEvent) => boolean): number {
    let removed = 0;
    for (const [id, event] of this.events) {
      if (predicate(event)) {
        this.events.delete(id);
        this.pairs.delete(pairKey(event.imageId, event.userIdentifier));
        removed += 1;
      }
    }
    return removed;
  }
}
