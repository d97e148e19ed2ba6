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

export interface SuspicionThresholds {
  /** Share of 1.0/10.0 scores above which a rater looks careless. */
  extremityRatio: number;
  /** Share of flags above which a rater looks like a serial flagger. */
  flagRatio: number;
  /** Both rules stay silent below this many ratings (or submissions). */
  minSubmissions: number;
}

export const DEFAULT_SUSPICION_THRESHOLDS: SuspicionThresholds = {
  extremityRatio: 0.8,
  flagRatio: 0.5,
  minSubmissions: 5
};

export interface SuspicionSignals {
  totalSubmissions: number;
  validCount: number;
  flagRatio: number;
  extremityRatio: number;
}

export function hasExtremeRatingPattern(
  signals: SuspicionSignals,
  thresholds: SuspicionThresholds = DEFAULT_SUSPICION_THRESHOLDS
): boolean {
  return signals.extremityRatio > thresholds.extremityRatio && signals.validCount >= thresholds.minSubmissions;
}

export function hasExcessiveFlagging(
  signals: SuspicionSignals,
  thresholds: SuspicionThresholds = DEFAULT_SUSPICION_THRESHOLDS
): boolean {
  return signals.flagRatio > thresholds.flagRatio && signals.totalSubmissions >= thresholds.minSubmissions;
}

/** Advisory only: nothing is removed on the strength of this signal. */
export function isSuspicious(
  signals: SuspicionSignals,
  thresholds: SuspicionThresholds = DEFAULT_SUSPICION_THRESHOLDS
): boolean {
  return hasExtremeRatingPattern(signals, thresholds) || hasExcessiveFlagging(signals, thresholds);
}
