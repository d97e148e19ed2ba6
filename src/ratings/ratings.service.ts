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

import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { RatingsRepository } from './ratings.repository';
import { decodeRatingValue } from './rating-value';
import { ValidationError } from './ratings.errors';
import type { FlaggedImage, PurgeUsersResult, RatingEvent, RatingFilter } from './rating.types';

@Injectable()
export class RatingsService {
  private readonly logger = new Logger(RatingsService.name);

  constructor(private readonly repository: RatingsRepository) {}

  /**
   * Records one response of a user to an image. The duplicate check happens
   * inside the repository insert, so two concurrent submissions for the same
   * pair cannot both succeed.
   *
   * @throws ValidationError for blank identifiers or an out-of-domain value
   * @throws DuplicateRatingError when the user already rated the image
   * @throws StorageUnavailableError when the backend fails
   */
  async submitRating(imageId: string, value: number, userIdentifier: string): Promise<RatingEvent> {
    const event: RatingEvent = {
      id: randomUUID(),
      imageId: this.requireIdentifier(imageId, 'imageId'),
      value: decodeRatingValue(value),
      userIdentifier: this.requireIdentifier(userIdentifier, 'userIdentifier'),
      timestamp: new Date()
    };
    await this.repository.insert(event);
    return event;
  }

  async getRatedImageIds(userIdentifier: string): Promise<Set<string>> {
    const normalized = (userIdentifier || '').trim();
    if (!normalized) return new Set();
    return new Set(await this.repository.findImageIdsByUser(normalized));
  }

  async getAllRatings(filter: RatingFilter = {}): Promise<RatingEvent[]> {
    const imageIds = filter.imageIds ? Array.from(filter.imageIds) : undefined;
    if (imageIds && imageIds.length === 0) return [];
    return this.repository.find({ valueKind: filter.valueKind, imageIds });
  }

  async getFlaggedImageIds(): Promise<FlaggedImage[]> {
    return this.repository.countFlagsByImage();
  }

  /** Removes every event of an image. Unknown images remove nothing. */
  async purgeImage(imageId: string): Promise<number> {
    const normalized = this.requireIdentifier(imageId, 'imageId');
    const removed = await this.repository.deleteByImage(normalized);
    this.logger.log(`Purged ${removed} rating(s) for image ${normalized}`);
    return removed;
  }

  async undoLastRating(userIdentifier: string): Promise<RatingEvent | null> {
    const normalized = this.requireIdentifier(userIdentifier, 'userIdentifier');
    const latest = await this.repository.findLatestByUser(normalized);
    if (!latest) return null;

    // Lost to a concurrent undo or purge
    if (!(await this.repository.deleteById(latest.id))) return null;

    this.logger.log(`Undid rating ${latest.id} of ${normalized} on image ${latest.imageId}`);
    return latest;
  }

  /**
   * Deletes all events of the users whose identifier matches `pattern`:
   * case-sensitive equality with `exactMatch`, case-insensitive substring otherwise.
   */
  async purgeUsers(pattern: string, options: { exactMatch?: boolean } = {}): Promise<PurgeUsersResult> {
    const normalized = this.requireIdentifier(pattern, 'pattern');
    const users = await this.repository.findUserIdentifiers({
      pattern: normalized,
      exactMatch: options.exactMatch ?? false
    });
    if (users.length === 0) {
      return { usersRemoved: 0, ratingsRemoved: 0 };
    }

    const ratingsRemoved = await this.repository.deleteByUsers(users);
    this.logger.warn(`Purged ${ratingsRemoved} rating(s) from ${users.length} user(s) matching "${normalized}"`);
    return { usersRemoved: users.length, ratingsRemoved };
  }

  private requireIdentifier(input: string, field: string): string {
    const normalized = typeof input === 'string' ? input.trim() : '';
    if (!normalized) {
      throw new ValidationError(`${field} is required`);
    }
    return normalized;
  }
}
