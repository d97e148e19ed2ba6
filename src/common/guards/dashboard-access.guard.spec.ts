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

import { ExecutionContext, ServiceUnavailableException, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DashboardAccessGuard } from './dashboard-access.guard';

describe('DashboardAccessGuard', () => {
  const contextWith = (headers: Record<string, string | string[]>): ExecutionContext =>
    ({
      switchToHttp: () => ({
        getRequest: () => ({ headers })
      })
    }) as unknown as ExecutionContext;

  const guard = new DashboardAccessGuard(new ConfigService({ DASHBOARD_PASSWORD: 'test-secret' }));

  it('lets the correct password through', () => {
    expect(guard.canActivate(contextWith({ 'x-dashboard-password': 'test-secret' }))).toBe(true);
  });

  it('uses the first value of a repeated header', () => {
    expect(guard.canActivate(contextWith({ 'x-dashboard-password': ['test-secret', 'other'] }))).toBe(true);
  });

  it('rejects a wrong password', () => {
    expect(() => guard.canActivate(contextWith({ 'x-dashboard-password': 'test-secrets' }))).toThrow(
      UnauthorizedException
    );
  });

  it('rejects a missing password', () => {
    expect(() => guard.canActivate(contextWith({}))).toThrow('Incorrect dashboard password');
  });

  it('fails closed when no password is configured', () => {
    const open = new DashboardAccessGuard(new ConfigService({}));
    expect(() => open.canActivate(contextWith({ 'x-dashboard-password': '' }))).toThrow(ServiceUnavailableException);
  });
});
