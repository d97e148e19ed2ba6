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

import { Controller, Get, Inject } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Throttle } from '@nestjs/throttler';
import { RATINGS_STORE_KIND } from '../ratings/ratings.module';
import type { RatingsStoreKind } from '../ratings/ratings.module';

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(@Inject(RATINGS_STORE_KIND) private readonly store: RatingsStoreKind) {}

  @Get()
  @Throttle({ default: { limit: 200, ttl: 60000 } }) // generous for monitoring
  @ApiOperation({
    summary: 'Health check',
    description: 'Returns the health status of the API server and the kind of rating store in use'
  })
  @ApiResponse({
    status: 200,
    description: 'Server is healthy',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'ok' },
        store: { type: 'string', enum: ['mongo', 'memory'], example: 'mongo' },
        time: { type: 'string', format: 'date-time', example: '2025-11-08T12:00:00.000Z' }
      }
    }
  })
  get() {
    return {
      status: 'ok',
      store: this.store,
      time: new Date().toISOString()
    };
  }
}
