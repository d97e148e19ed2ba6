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

import { ValidationError } from './ratings.errors';

export const MIN_SCORE = 1.0;
export const MAX_SCORE = 10.0;

/** Stored sentinel for "user found the image ambiguous". */
export const SKIP_SENTINEL = -1;
/** Stored sentinel for "user reported the image". */
export const FLAG_SENTINEL = -2;

export type RatingValue =
  | { kind: 'valid'; score: number }
  | { kind: 'skipped' }
  | { kind: 'flagged' };

export type RatingValueKind = RatingValue['kind'];

export const RATING_VALUE_KINDS: readonly RatingValueKind[] = ['valid', 'skipped', 'flagged'];

export function isRatingValueKind(input: string): input is RatingValueKind {
  return (RATING_VALUE_KINDS as readonly string[]).includes(input);
}

export function validScore(score: number): RatingValue {
  return { kind: 'valid', score };
}

export const SKIPPED: RatingValue = { kind: 'skipped' };
export const FLAGGED: RatingValue = { kind: 'flagged' };

/**
 * Decodes the flat numeric encoding used in storage and exports.
 * Throws ValidationError for anything outside [1.0, 10.0] ∪ {-1, -2}.
 */
export function decodeRatingValue(raw: number): RatingValue {
  if (typeof raw !== 'number' || !Number.isFinite(raw)) {
    throw new ValidationError(`rating must be a finite number, got ${String(raw)}`);
  }
  if (raw === SKIP_SENTINEL) return SKIPPED;
  if (raw === FLAG_SENTINEL) return FLAGGED;
  if (raw < MIN_SCORE || raw > MAX_SCORE) {
    throw new ValidationError(
      `rating must be between ${MIN_SCORE.toFixed(1)} and ${MAX_SCORE.toFixed(1)}, or ${SKIP_SENTINEL} (skip) / ${FLAG_SENTINEL} (flag); got ${raw}`
    );
  }
  return validScore(raw);
}

export function encodeRatingValue(value: RatingValue): number {
  switch (value.kind) {
    case 'valid':
      return value.score;
    case 'skipped':
      return SKIP_SENTINEL;
    case 'flagged':
      return FLAG_SENTINEL;
  }
}

export function isExtremeScore(score: number): boolean {
  return score === MIN_SCORE || score === MAX_SCORE;
}
