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

import type { NextFunction, Response } from 'express';
import { REQUEST_ID_HEADER, RequestWithId } from './request-id.middleware';

function getClientIp(req: RequestWithId): string {
  const forwarded = req.headers['x-forwarded-for'];
  if (typeof forwarded === 'string' && forwarded.trim()) {
    return forwarded.split(',')[0].trim();
  }
  if (Array.isArray(forwarded) && forwarded.length) {
    return forwarded[0];
  }
  return req.ip || '';
}

function bodyField(body: unknown, field: string): string | undefined {
  if (typeof body !== 'object' || body === null || !(field in body)) return undefined;
  const value: unknown = Reflect.get(body, field);
  return typeof value === 'string' ? value : undefined;
}

/** One JSON line per request; rating submissions carry image and rater. */
export function requestLogMiddleware(req: RequestWithId, res: Response, next: NextFunction): void {
  const startedAt = process.hrtime.bigint();
  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1_000_000;
    const header = req.headers[REQUEST_ID_HEADER];

    const payload = {
      level: res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info',
      message: 'http_request',
      timestamp: new Date().toISOString(),
      requestId: req.requestId || (typeof header === 'string' ? header : undefined),
      method: req.method,
      path: req.originalUrl || req.url,
      status: res.statusCode,
      durationMs: Number(durationMs.toFixed(2)),
      ip: getClientIp(req),
      imageId: bodyField(req.body, 'imageId'),
      userIdentifier: bodyField(req.body, 'userIdentifier'),
      userAgent: req.get('user-agent') || undefined
    };

    const line = `${JSON.stringify(payload)}\n`;
    if (res.statusCode >= 500) {
      process.stderr.write(line);
      return;
    }
    process.stdout.write(line);
  });

  next();
}
