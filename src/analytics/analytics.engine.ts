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

import { MAX_SCORE, MIN_SCORE, encodeRatingValue, isExtremeScore } from '../ratings/rating-value';
import { compareRatingEvents } from '../ratings/rating.types';
import type { RatingEvent } from '../ratings/rating.types';
import { DEFAULT_SUSPICION_THRESHOLDS, SuspicionThresholds, isSuspicious } from './suspicion';

// Pure read-side computations. Every listing has a total order so that the
// same events always produce the same output.

export const HISTOGRAM_STEP = 0.5;
export const HISTOGRAM_BUCKET_COUNT = Math.round((MAX_SCORE - MIN_SCORE) / HISTOGRAM_STEP);

export interface HistogramBucket {
  lower: number;
  upper: number;
  count: number;
}

export interface Overview {
  total: number;
  validCount: number;
  skipCount: number;
  flagCount: number;
  uniqueImages: number;
  uniqueRaters: number;
  /** null when there is no valid rating */
  mean: number | null;
  stddev: number;
  histogram: HistogramBucket[];
}

export interface ImageStatistic {
  imageId: string;
  totalCount: number;
  validCount: number;
  skipCount: number;
  flagCount: number;
  mean: number | null;
  variance: number | null;
  stddev: number | null;
  minScore: number | null;
  maxScore: number | null;
}

export type RatedImageStatistic = ImageStatistic & { mean: number; variance: number };

export interface RankingOptions {
  limit?: number;
  minValidCount?: number;
}

export interface UserStatistic {
  userIdentifier: string;
  totalSubmissions: number;
  validCount: number;
  skipCount: number;
  flagCount: number;
  flagRatio: number;
  extremityRatio: number;
  meanScore: number | null;
  firstRatedAt: Date;
  lastRatedAt: Date;
  suspicious: boolean;
}

export type ExportFilter = 'all' | 'validOnly';

export const EXPORT_FILTERS: readonly ExportFilter[] = ['all', 'validOnly'];

export function isExportFilter(input: string): input is ExportFilter {
  return (EXPORT_FILTERS as readonly string[]).includes(input);
}

export interface ExportRow {
  id: string;
  image_id: string;
  rating: number;
  user_identifier: string;
  timestamp: string;
}

export const EXPORT_COLUMNS = ['id', 'image_id', 'rating', 'user_identifier', 'timestamp'] as const;

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

interface ScoreSummary {
  mean: number;
  variance: number;
}

/** Mean and sample variance (n - 1); a single score has variance 0. */
export function summarizeScores(scores: readonly number[]): ScoreSummary | null {
  if (scores.length === 0) return null;

  let sum = 0;
  for (const score of scores) sum += score;
  const mean = sum / scores.length;
  if (scores.length === 1) return { mean, variance: 0 };

  let squares = 0;
  for (const score of scores) squares += (score - mean) ** 2;
  return { mean, variance: squares / (scores.length - 1) };
}

export function histogramBucketIndex(score: number): number {
  const index = Math.floor((score - MIN_SCORE) / HISTOGRAM_STEP);
  return Math.min(Math.max(index, 0), HISTOGRAM_BUCKET_COUNT - 1);
}

export function computeOverview(events: readonly RatingEvent[]): Overview {
  const histogram: HistogramBucket[] = Array.from({ length: HISTOGRAM_BUCKET_COUNT }, (_, i) => ({
    lower: MIN_SCORE + i * HISTOGRAM_STEP,
    upper: MIN_SCORE + (i + 1) * HISTOGRAM_STEP,
    count: 0
  }));
  const scores: number[] = [];
  const images = new Set<string>();
  const raters = new Set<string>();
  let skipCount = 0;
  let flagCount = 0;

  for (const event of events) {
    images.add(event.imageId);
    raters.add(event.userIdentifier);
    switch (event.value.kind) {
      case 'valid':
        scores.push(event.value.score);
        histogram[histogramBucketIndex(event.value.score)].count += 1;
        break;
      case 'skipped':
        skipCount += 1;
        break;
      case 'flagged':
        flagCount += 1;
        break;
    }
  }

  const summary = summarizeScores(scores);
  return {
    total: events.length,
    validCount: scores.length,
    skipCount,
    flagCount,
    uniqueImages: images.size,
    uniqueRaters: raters.size,
    mean: summary ? summary.mean : null,
    stddev: summary ? Math.sqrt(summary.variance) : 0,
    histogram
  };
}

interface Tally {
  total: number;
  skips: number;
  flags: number;
  scores: number[];
  /** Lowest and highest valid score; Infinity / -Infinity until one is seen. */
  min: number;
  max: number;
  first: Date;
  last: Date;
}

function tallyBy(events: readonly RatingEvent[], key: (event: RatingEvent) => string): Map<string, Tally> {
  const groups = new Map<string, Tally>();
  for (const event of events) {
    const id = key(event);
    let tally = groups.get(id);
    if (!tally) {
      tally = { total: 0, skips: 0, flags: 0, scores: [], min: Infinity, max: -Infinity, first: event.timestamp, last: event.timestamp };
      groups.set(id, tally);
    }
    tally.total += 1;
    if (event.timestamp < tally.first) tally.first = event.timestamp;
    if (event.timestamp > tally.last) tally.last = event.timestamp;
    if (event.value.kind === 'valid') {
      tally.scores.push(event.value.score);
      if (event.value.score < tally.min) tally.min = event.value.score;
      if (event.value.score > tally.max) tally.max = event.value.score;
    } else if (event.value.kind === 'skipped') tally.skips += 1;
    else tally.flags += 1;
  }
  return groups;
}

/**
 * Per-image statistics, busiest images first (ties by imageId). Images with
 * no valid rating are kept, with null mean and variance.
 */
export function computeImageStatistics(events: readonly RatingEvent[]): ImageStatistic[] {
  const stats: ImageStatistic[] = [];
  for (const [imageId, tally] of tallyBy(events, (event) => event.imageId)) {
    const summary = summarizeScores(tally.scores);
    stats.push({
      imageId,
      totalCount: tally.total,
      validCount: tally.scores.length,
      skipCount: tally.skips,
      flagCount: tally.flags,
      mean: summary ? summary.mean : null,
      variance: summary ? summary.variance : null,
      stddev: summary ? Math.sqrt(summary.variance) : null,
      minScore: summary ? tally.min : null,
      maxScore: summary ? tally.max : null
    });
  }
  return stats.sort((a, b) => b.totalCount - a.totalCount || compareIds(a.imageId, b.imageId));
}

function rankable(stats: readonly ImageStatistic[], options: RankingOptions): RatedImageStatistic[] {
  const minValid = Math.max(options.minValidCount ?? 1, 1);
  return stats.filter(
    (stat): stat is RatedImageStatistic => stat.mean !== null && stat.variance !== null && stat.validCount >= minValid
  );
}

function rank(
  stats: readonly ImageStatistic[],
  options: RankingOptions,
  primary: (a: RatedImageStatistic, b: RatedImageStatistic) => number
): RatedImageStatistic[] {
  const ranked = rankable(stats, options).sort(
    (a, b) => primary(a, b) || b.validCount - a.validCount || compareIds(a.imageId, b.imageId)
  );
  return options.limit !== undefined ? ranked.slice(0, Math.max(options.limit, 0)) : ranked;
}

export function rankTopRated(stats: readonly ImageStatistic[], options: RankingOptions = {}): RatedImageStatistic[] {
  return rank(stats, options, (a, b) => b.mean - a.mean);
}

export function rankLowestRated(stats: readonly ImageStatistic[], options: RankingOptions = {}): RatedImageStatistic[] {
  return rank(stats, options, (a, b) => a.mean - b.mean);
}

export function rankMostControversial(
  stats: readonly ImageStatistic[],
  options: RankingOptions = {}
): RatedImageStatistic[] {
  return rank(stats, options, (a, b) => b.variance - a.variance);
}

/** Per-rater quality signals, most active raters first (ties by identifier). */
export function computeUserStatistics(
  events: readonly RatingEvent[],
  thresholds: SuspicionThresholds = DEFAULT_SUSPICION_THRESHOLDS
): UserStatistic[] {
  const stats: UserStatistic[] = [];
  for (const [userIdentifier, tally] of tallyBy(events, (event) => event.userIdentifier)) {
    const validCount = tally.scores.length;
    const extremes = tally.scores.filter(isExtremeScore).length;
    const summary = summarizeScores(tally.scores);
    const signals = {
      totalSubmissions: tally.total,
      validCount,
      flagRatio: tally.total > 0 ? tally.flags / tally.total : 0,
      extremityRatio: validCount > 0 ? extremes / validCount : 0
    };
    stats.push({
      userIdentifier,
      ...signals,
      skipCount: tally.skips,
      flagCount: tally.flags,
      meanScore: summary ? summary.mean : null,
      firstRatedAt: new Date(tally.first.getTime()),
      lastRatedAt: new Date(tally.last.getTime()),
      suspicious: isSuspicious(signals, thresholds)
    });
  }
  return stats.sort(
    (a, b) => b.totalSubmissions - a.totalSubmissions || compareIds(a.userIdentifier, b.userIdentifier)
  );
}

/** Flat rows in store order (timestamp, then id); sentinels stay -1 / -2. */
export function exportRows(events: readonly RatingEvent[], filter: ExportFilter = 'all'): ExportRow[] {
  return events
    .filter((event) => filter === 'all' || event.value.kind === 'valid')
    .sort(compareRatingEvents)
    .map((event) => ({
      id: event.id,
      image_id: event.imageId,
      rating: encodeRatingValue(event.value),
      user_identifier: event.userIdentifier,
      timestamp: event.timestamp.toISOString()
    }));
}

function csvCell(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(rows: readonly ExportRow[]): string {
  const lines = [EXPORT_COLUMNS.join(',')];
  for (const row of rows) {
    lines.push(EXPORT_COLUMNS.map((column) => csvCell(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}
