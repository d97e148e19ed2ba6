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

import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import type { Response } from 'express';
import { REQUEST_ID_HEADER, RequestWithId } from './middleware/request-id.middleware';
import {
  CorruptRatingError,
  DuplicateRatingError,
  RatingStoreError,
  StorageUnavailableError,
  ValidationError
} from '../ratings/ratings.errors';

interface ErrorPayload {
  message?: string | string[];
  error?: string;
  code?: string;
}

function isErrorPayload(value: unknown): value is ErrorPayload {
  return typeof value === 'object' && value !== null;
}

@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();
    const req = ctx.getRequest<RequestWithId>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal server error';
    let code = 'internal_error';

    if (exception instanceof RatingStoreError) {
      status = this.mapDomainErrorToStatus(exception);
      message = exception.message;
      code = exception.code;
    } else if (exception instanceof HttpException) {
      status = exception.getStatus();
      const payload = exception.getResponse();
      if (typeof payload === 'string') {
        message = payload;
        code = this.mapStatusToCode(status);
      } else if (isErrorPayload(payload)) {
        message = (Array.isArray(payload.message) ? payload.message.join(', ') : payload.message) || payload.error || message;
        code = payload.code || this.mapStatusToCode(status);
      } else {
        code = this.mapStatusToCode(status);
      }
    } else if (exception instanceof Error) {
      message = exception.message || message;
    }

    const header = req?.headers?.[REQUEST_ID_HEADER];
    const requestId = req?.requestId || (typeof header === 'string' ? header : '');
    res.status(status).json({
      message,
      code,
      requestId: requestId || undefined,
      timestamp: new Date().toISOString()
    });
  }

  private mapDomainErrorToStatus(error: RatingStoreError): number {
    if (error instanceof ValidationError) return HttpStatus.BAD_REQUEST;
    if (error instanceof DuplicateRatingError) return HttpStatus.CONFLICT;
    if (error instanceof StorageUnavailableError) return HttpStatus.SERVICE_UNAVAILABLE;
    if (error instanceof CorruptRatingError) return HttpStatus.INTERNAL_SERVER_ERROR;
    return HttpStatus.INTERNAL_SERVER_ERROR;
  }

  private mapStatusToCode(status: number): string {
    switch (status) {
      case 400:
        return 'bad_request';
      case 401:
        return 'unauthorized';
      case 403:
        return 'forbidden';
      case 404:
        return 'not_found';
      case 409:
        return 'conflict';
      case 422:
        return 'unprocessable_entity';
      case 503:
        return 'service_unavailable';
      default:
        return 'error';
    }
  }
}
