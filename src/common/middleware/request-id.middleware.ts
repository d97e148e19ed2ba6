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

import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';

export const REQUEST_ID_HEADER = 'x-request-id';

const MAX_INCOMING_ID_LENGTH = 128;
const SAFE_ID = /^[A-Za-z0-9._:-]+$/;

export interface RequestWithId extends Request {
  requestId?: string;
}

/** Reuses a caller-supplied id when it is short and printable, otherwise mints one. */
export function resolveRequestId(incoming: string | undefined): string {
  const trimmed = incoming ? incoming.trim() : '';
  if (trimmed && trimmed.length <= MAX_INCOMING_ID_LENGTH && SAFE_ID.test(trimmed)) {
    return trimmed;
  }
  return randomUUID();
}

export function requestIdMiddleware(req: RequestWithId, res: Response, next: NextFunction): void {
  const requestId = resolveRequestId(req.header(REQUEST_ID_HEADER));
  req.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);
  next();
}
