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

import type { RatingValue, RatingValueKind } from './rating-value';

export interface RatingEvent {
  id: string;
  imageId: string;
  value: RatingValue;
  userIdentifier: string;
  timestamp: Date;
}

export interface RatingFilter {
  valueKind?: RatingValueKind;
  imageIds?: Iterable<string>;
}

export interface FlaggedImage {
  imageId: string;
  flagCount: number;
}

export interface UserMatch {
  pattern: string;
  exactMatch: boolean;
}

export interface PurgeUsersResult {
  usersRemoved: number;
  ratingsRemoved: number;
}

export function escapeRegex(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive substring match for user purges. Both stores use an
 * escaped pattern with the `i` flag; Unicode case folding may still differ
 * between the JavaScript and MongoDB regex engines for non-ASCII letters.
 */
export function userSubstringPattern(pattern: string): RegExp {
  return new RegExp(escapeRegex(pattern), 'i');
}

/** Ordering used by every listing of events: oldest first, ties by id. */
export function compareRatingEvents(a: RatingEvent, b: RatingEvent): number {
  const byTime = a.timestamp.getTime() - b.timestamp.getTime();
  if (byTime !== 0) return byTime;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
