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

/**
 * Errors raised by the rating store. Each carries a stable `code` that the
 * HTTP layer exposes unchanged.
 */
export abstract class RatingStoreError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed input: empty identifiers or a value outside the rating domain. */
export class ValidationError extends RatingStoreError {
  readonly code = 'validation_failed';
}

/** The (image, user) pair already has a rating. Show another image; do not retry. */
export class DuplicateRatingError extends RatingStoreError {
  readonly code = 'duplicate_rating';

  constructor(
    readonly imageId: string,
    readonly userIdentifier: string,
    options?: ErrorOptions
  ) {
    super(`image ${imageId} was already rated by ${userIdentifier}`, options);
  }
}

/**
 * The backing store could not be reached or failed mid-operation. A write that
 * ends with this error is unconfirmed.
 */
export class StorageUnavailableError extends RatingStoreError {
  readonly code = 'storage_unavailable';
}

/** A stored row cannot be decoded into a rating event; the data needs repair. */
export class CorruptRatingError extends RatingStoreError {
  readonly code = 'corrupt_rating';

  constructor(
    readonly ratingId: string,
    options?: ErrorOptions
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`stored rating ${ratingId} is unreadable${reason}`, options);
  }
}
