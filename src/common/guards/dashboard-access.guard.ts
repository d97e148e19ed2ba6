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

import {
  CanActivate,
  ExecutionContext,
  Injectable,
  ServiceUnavailableException,
  UnauthorizedException
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash, timingSafeEqual } from 'node:crypto';
import type { Request } from 'express';

export const DASHBOARD_PASSWORD_HEADER = 'x-dashboard-password';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Shared-password gate for analytics and administrative routes. The rating
 * store itself has no access control; this is the collaborator that puts one
 * in front of it over HTTP.
 */
@Injectable()
export class DashboardAccessGuard implements CanActivate {
  constructor(private readonly config: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const expected = this.config.get<string>('DASHBOARD_PASSWORD');
    if (!expected) {
      throw new ServiceUnavailableException('Dashboard password is not configured');
    }

    const req = context.switchToHttp().getRequest<Request>();
    const header = req.headers[DASHBOARD_PASSWORD_HEADER];
    const provided = Array.isArray(header) ? header[0] : header;
    if (!provided || !timingSafeEqual(digest(provided), digest(expected))) {
      throw new UnauthorizedException('Incorrect dashboard password');
    }

    return true;
  }
}
