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

import type { FlaggedImage, RatingEvent, RatingFilter, UserMatch } from './rating.types';

/**
 * Persistence port of the rating store. Implementations enforce the
 * one-rating-per-(image, user) rule atomically inside `insert` and report
 * backend failures as StorageUnavailableError.
 */
export abstract class RatingsRepository {
  /** Appends the event, or throws DuplicateRatingError when the pair exists. */
  abstract insert(event: RatingEvent): Promise<void>;

  abstract findImageIdsByUser(userIdentifier: string): Promise<string[]>;

  /** Events matching the filter, ordered by timestamp then id. */
  abstract find(filter: RatingFilter): Promise<RatingEvent[]>;

  /** Flag totals per image, highest first, ties by imageId. */
  abstract countFlagsByImage(): Promise<FlaggedImage[]>;

  abstract deleteByImage(imageId: string): Promise<number>;

  /** The user's most recent event (latest timestamp, then highest id). */
  abstract findLatestByUser(userIdentifier: string): Promise<RatingEvent | null>;

  abstract deleteById(id: string): Promise<boolean>;

  /** Distinct user identifiers matching the pattern, sorted ascending. */
  abstract findUserIdentifiers(match: UserMatch): Promise<string[]>;

  abstract deleteByUsers(userIdentifiers: string[]): Promise<number>;
}
