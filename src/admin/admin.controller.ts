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

import { Controller, Delete, Param, Query, UseGuards } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiParam, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { RatingsService } from '../ratings/ratings.service';
import type { PurgeUsersResult } from '../ratings/rating.types';
import { DASHBOARD_PASSWORD_HEADER, DashboardAccessGuard } from '../common/guards/dashboard-access.guard';

@ApiTags('admin')
@ApiHeader({ name: DASHBOARD_PASSWORD_HEADER, required: true, description: 'Dashboard password' })
@ApiResponse({ status: 401, description: 'Missing or incorrect dashboard password' })
@Controller('admin')
@UseGuards(DashboardAccessGuard)
export class AdminController {
  constructor(private readonly ratings: RatingsService) {}

  @Delete('images/:imageId')
  @ApiOperation({
    summary: 'Purge an image',
    description: 'Irreversibly deletes every rating of the image. Unknown images remove nothing.'
  })
  @ApiParam({ name: 'imageId', description: 'Image identifier from the external catalog' })
  async purgeImage(@Param('imageId') imageId: string): Promise<{ imageId: string; removed: number }> {
    const removed = await this.ratings.purgeImage(imageId);
    return { imageId, removed };
  }

  @Delete('users')
  @ApiOperation({
    summary: 'Purge users by identifier',
    description: 'Deletes all ratings of matching users: exact case-sensitive match, or case-insensitive substring.'
  })
  @ApiQuery({ name: 'pattern', required: true, example: 'test' })
  @ApiQuery({ name: 'exact', required: false, example: 'false' })
  purgeUsers(@Query('pattern') pattern: string, @Query('exact') exact?: string): Promise<PurgeUsersResult> {
    return this.ratings.purgeUsers(pattern, { exactMatch: exact === 'true' });
  }
}
