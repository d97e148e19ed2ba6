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

import {
  FLAGGED,
  SKIPPED,
  decodeRatingValue,
  encodeRatingValue,
  isExtremeScore,
  isRatingValueKind,
  validScore
} from './rating-value';
import { ValidationError } from './ratings.errors';

describe('rating values', () => {
  it.each([1.0, 5.5, 10.0, 7.3])('decodes %p as a valid score', (raw) => {
    expect(decodeRatingValue(raw)).toEqual({ kind: 'valid', score: raw });
  });

  it('decodes the sentinels', () => {
    expect(decodeRatingValue(-1)).toEqual({ kind: 'skipped' });
    expect(decodeRatingValue(-2)).toEqual({ kind: 'flagged' });
  });

  it.each([0, 0.5, 10.1, -3, -1.5, 100, Number.NaN, Number.POSITIVE_INFINITY])('rejects %p', (raw) => {
    expect(() => decodeRatingValue(raw)).toThrow(ValidationError);
  });

  it('explains the allowed values when rejecting', () => {
    expect(() => decodeRatingValue(10.1)).toThrow(
      'rating must be between 1.0 and 10.0, or -1 (skip) / -2 (flag); got 10.1'
    );
  });

  it('encodes back to the flat numeric form', () => {
    expect(encodeRatingValue(validScore(6.5))).toBe(6.5);
    expect(encodeRatingValue(SKIPPED)).toBe(-1);
    expect(encodeRatingValue(FLAGGED)).toBe(-2);
  });

  it('treats only the scale ends as extreme', () => {
    expect(isExtremeScore(1)).toBe(true);
    expect(isExtremeScore(10)).toBe(true);
    expect(isExtremeScore(9.9)).toBe(false);
    expect(isExtremeScore(1.1)).toBe(false);
  });

  it('recognises value kinds', () => {
    expect(isRatingValueKind('flagged')).toBe(true);
    expect(isRatingValueKind('deleted')).toBe(false);
  });
});
