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

import { ExceptionFilter, Catch, ArgumentsHost, HttpStatus } from '@nestjs/common';
import { ThrottlerException } from '@nestjs/throttler';
import type { Response, Request } from 'express';

/**
 * Renders rate-limit rejections as 429 with the configured window, so rating
 * clients know when to resubmit.
 */
@Catch(ThrottlerException)
export class ThrottlerExceptionFilter implements ExceptionFilter {
  constructor(
    private readonly ttlMs: number = 60000,
    private readonly limit: number = 100
  ) {}

  catch(_exception: ThrottlerException, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const retryAfterSeconds = Math.ceil(this.ttlMs / 1000);

    response.setHeader('retry-after', String(retryAfterSeconds));
    response.status(HttpStatus.TOO_MANY_REQUESTS).json({
      message: 'You have exceeded the rate limit. Please try again later.',
      code: 'rate_limited',
      details: {
        limit: this.limit,
        retryAfter: retryAfterSeconds,
        retryAfterMs: this.ttlMs
      },
      timestamp: new Date().toISOString(),
      path: request.url
    });
  }
}
