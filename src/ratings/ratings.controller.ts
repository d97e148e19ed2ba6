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

import { Body, Controller, Delete, Get, HttpCode, NotFoundException, Param, Post } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { RatingsService } from './ratings.service';
import { encodeRatingValue } from './rating-value';
import type { RatingValueKind } from './rating-value';
import type { RatingEvent } from './rating.types';

export interface RatingView {
  id: string;
  imageId: string;
  rating: number;
  kind: RatingValueKind;
  userIdentifier: string;
  timestamp: string;
}

export function toRatingView(event: RatingEvent): RatingView {
  return {
    id: event.id,
    imageId: event.imageId,
    rating: encodeRatingValue(event.value),
    kind: event.value.kind,
    userIdentifier: event.userIdentifier,
    timestamp: event.timestamp.toISOString()
  };
}

/** Accepts JSON numbers and numeric strings; everything else becomes NaN and fails validation. */
export function parseRatingInput(raw: unknown): number {
  if (typeof raw === 'number') return raw;
  if (typeof raw === 'string' && raw.trim() !== '') return Number(raw);
  return Number.NaN;
}

@ApiTags('ratings')
@Controller('ratings')
export class RatingsController {
  constructor(private readonly ratings: RatingsService) {}

  @Post()
  @ApiOperation({
    summary: 'Submit a rating',
    description: 'Stores one response of a user to an image: a score from 1.0 to 10.0, -1 to skip or -2 to flag.'
  })
  @ApiBody({
    schema: {
      type: 'object',
      required: ['imageId', 'rating', 'userIdentifier'],
      properties: {
        imageId: { type: 'string', example: 'face_0042.jpg' },
        rating: { type: 'number', example: 6.5 },
        userIdentifier: { type: 'string', example: 'rater-17' }
      }
    }
  })
  @ApiResponse({ status: 201, description: 'Rating stored' })
  @ApiResponse({ status: 400, description: 'Blank identifier or rating outside the allowed values' })
  @ApiResponse({ status: 409, description: 'The user already rated this image' })
  @ApiResponse({ status: 503, description: 'Rating storage unavailable; submission unconfirmed' })
  async submit(
    @Body('imageId') imageId: string,
    @Body('rating') rating: unknown,
    @Body('userIdentifier') userIdentifier: string
  ): Promise<RatingView> {
    const event = await this.ratings.submitRating(imageId, parseRatingInput(rating), userIdentifier);
    return toRatingView(event);
  }

  @Get('users/:userIdentifier/rated-images')
  @ApiOperation({
    summary: 'Images already answered by a user',
    description: 'Includes skipped and flagged images. Unknown users get an empty list.'
  })
  @ApiParam({ name: 'userIdentifier', description: 'Free-text rater identifier' })
  async ratedImages(@Param('userIdentifier') userIdentifier: string): Promise<{ imageIds: string[] }> {
    const imageIds = await this.ratings.getRatedImageIds(userIdentifier);
    return { imageIds: Array.from(imageIds) };
  }

  @Delete('users/:userIdentifier/last')
  @HttpCode(200)
  @ApiOperation({ summary: "Undo a user's most recent rating" })
  @ApiParam({ name: 'userIdentifier', description: 'Free-text rater identifier' })
  @ApiResponse({ status: 200, description: 'The removed rating' })
  @ApiResponse({ status: 404, description: 'The user has no ratings' })
  async undoLast(@Param('userIdentifier') userIdentifier: string): Promise<RatingView> {
    const removed = await this.ratings.undoLastRating(userIdentifier);
    if (!removed) {
      throw new NotFoundException('no rating to undo');
    }
    return toRatingView(removed);
  }
}
