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
import { ConfigService } from '@nestjs/config';
import { RatingsService } from '../ratings/ratings.service';
import type { FlaggedImage } from '../ratings/rating.types';
import {
  ExportFilter,
  ImageStatistic,
  Overview,
  RankingOptions,
  RatedImageStatistic,
  UserStatistic,
  computeImageStatistics,
  computeOverview,
  computeUserStatistics,
  exportRows,
  rankLowestRated,
  rankMostControversial,
  rankTopRated,
  toCsv
} from './analytics.engine';
import { DEFAULT_SUSPICION_THRESHOLDS, SuspicionThresholds } from './suspicion';

function readNumber(config: ConfigService, key: string, fallback: number): number {
  const raw = config.get<string>(key);
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${key} must be a number, got "${raw}"`);
  }
  return parsed;
}

function readCount(config: ConfigService, key: string, fallback: number): number {
  const value = readNumber(config, key, fallback);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${key} must be a non-negative integer, got "${config.get<string>(key)}"`);
  }
  return value;
}

export function resolveSuspicionThresholds(config: ConfigService): SuspicionThresholds {
  return {
    extremityRatio: readNumber(config, 'SUSPICIOUS_EXTREMITY_RATIO', DEFAULT_SUSPICION_THRESHOLDS.extremityRatio),
    flagRatio: readNumber(config, 'SUSPICIOUS_FLAG_RATIO', DEFAULT_SUSPICION_THRESHOLDS.flagRatio),
    minSubmissions: readCount(config, 'SUSPICIOUS_MIN_SUBMISSIONS', DEFAULT_SUSPICION_THRESHOLDS.minSubmissions)
  };
}

/**
 * Recomputes every view from a fresh read of the store; nothing is cached
 * between calls.
 */
@Injectable()
export class AnalyticsService {
  private readonly thresholds: SuspicionThresholds;

  constructor(
    private readonly ratings: RatingsService,
    config: ConfigService
  ) {
    this.thresholds = resolveSuspicionThresholds(config);
  }

  async overview(): Promise<Overview> {
    return computeOverview(await this.ratings.getAllRatings());
  }

  async imageStatistics(): Promise<ImageStatistic[]> {
    return computeImageStatistics(await this.ratings.getAllRatings());
  }

  async topRated(options: RankingOptions = {}): Promise<RatedImageStatistic[]> {
    return rankTopRated(await this.imageStatistics(), options);
  }

  async lowestRated(options: RankingOptions = {}): Promise<RatedImageStatistic[]> {
    return rankLowestRated(await this.imageStatistics(), options);
  }

  async mostControversial(options: RankingOptions = {}): Promise<RatedImageStatistic[]> {
    return rankMostControversial(await this.imageStatistics(), options);
  }

  async userStatistics(): Promise<UserStatistic[]> {
    return computeUserStatistics(await this.ratings.getAllRatings(), this.thresholds);
  }

  async flaggedImages(): Promise<FlaggedImage[]> {
    return this.ratings.getFlaggedImageIds();
  }

  async exportCsv(filter: ExportFilter = 'all'): Promise<string> {
    const events = await this.ratings.getAllRatings(filter === 'validOnly' ? { valueKind: 'valid' } : {});
    return toCsv(exportRows(events, filter));
  }
}
