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

import { BadRequestException, Controller, Get, Header, Query, UseGuards } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AnalyticsService } from './analytics.service';
import { isExportFilter } from './analytics.engine';
import type { ImageStatistic, Overview, RankingOptions, RatedImageStatistic, UserStatistic } from './analytics.engine';
import type { FlaggedImage } from '../ratings/rating.types';
import { DASHBOARD_PASSWORD_HEADER, DashboardAccessGuard } from '../common/guards/dashboard-access.guard';

export function parseRankingOptions(limit?: string, minValidCount?: string): RankingOptions {
  const parsedLimit = limit ? parseInt(limit, 10) : NaN;
  const parsedMin = minValidCount ? parseInt(minValidCount, 10) : NaN;
  return {
    limit: Number.isNaN(parsedLimit) ? undefined : Math.min(Math.max(parsedLimit, 0), 100),
    minValidCount: Number.isNaN(parsedMin) ? undefined : parsedMin
  };
}

@ApiTags('analytics')
@ApiHeader({ name: DASHBOARD_PASSWORD_HEADER, required: true, description: 'Dashboard password' })
@ApiResponse({ status: 401, description: 'Missing or incorrect dashboard password' })
@Controller('analytics')
@UseGuards(DashboardAccessGuard)
export class AnalyticsController {
  constructor(private readonly analytics: AnalyticsService) {}

  @Get('overview')
  @ApiOperation({
    summary: 'Rating distribution',
    description: 'Counts per value class, mean and sample standard deviation of valid ratings, and a 0.5-wide histogram.'
  })
  overview(): Promise<Overview> {
    return this.analytics.overview();
  }

  @Get('images')
  @ApiOperation({ summary: 'Per-image statistics', description: 'Most answered images first.' })
  images(): Promise<ImageStatistic[]> {
    return this.analytics.imageStatistics();
  }

  @Get('images/top')
  @ApiOperation({ summary: 'Highest rated images' })
  @ApiQuery({ name: 'limit', required: false, example: 3 })
  @ApiQuery({ name: 'minValidCount', required: false, example: 2 })
  topRated(
    @Query('limit') limit?: string,
    @Query('minValidCount') minValidCount?: string
  ): Promise<RatedImageStatistic[]> {
    return this.analytics.topRated(parseRankingOptions(limit, minValidCount));
  }

  @Get('images/lowest')
  @ApiOperation({ summary: 'Lowest rated images' })
  @ApiQuery({ name: 'limit', required: false, example: 3 })
  @ApiQuery({ name: 'minValidCount', required: false, example: 2 })
  lowestRated(
    @Query('limit') limit?: string,
    @Query('minValidCount') minValidCount?: string
  ): Promise<RatedImageStatistic[]> {
    return this.analytics.lowestRated(parseRankingOptions(limit, minValidCount));
  }

  @Get('images/controversial')
  @ApiOperation({ summary: 'Most controversial images', description: 'Ordered by variance of valid ratings.' })
  @ApiQuery({ name: 'limit', required: false, example: 10 })
  @ApiQuery({ name: 'minValidCount', required: false, example: 2 })
  controversial(
    @Query('limit') limit?: string,
    @Query('minValidCount') minValidCount?: string
  ): Promise<RatedImageStatistic[]> {
    return this.analytics.mostControversial(parseRankingOptions(limit, minValidCount));
  }

  @Get('users')
  @ApiOperation({
    summary: 'Per-rater quality signals',
    description: 'Flag ratio, extremity ratio and the advisory suspicious marker for every rater.'
  })
  users(): Promise<UserStatistic[]> {
    return this.analytics.userStatistics();
  }

  @Get('flagged-images')
  @ApiOperation({ summary: 'Images reported by raters, with flag counts' })
  flagged(): Promise<FlaggedImage[]> {
    return this.analytics.flaggedImages();
  }

  @Get('export.csv')
  @Header('Content-Type', 'text/csv; charset=utf-8')
  @Header('Content-Disposition', 'attachment; filename="image_ratings_export.csv"')
  @ApiOperation({
    summary: 'Download ratings as CSV',
    description: 'Columns id,image_id,rating,user_identifier,timestamp; skips are -1 and flags -2 in the rating column.'
  })
  @ApiQuery({ name: 'filter', required: false, enum: ['all', 'validOnly'] })
  exportCsv(@Query('filter') filter?: string): Promise<string> {
    const chosen = filter ?? 'all';
    if (!isExportFilter(chosen)) {
      throw new BadRequestException('filter must be "all" or "validOnly"');
    }
    return this.analytics.exportCsv(chosen);
  }
}
