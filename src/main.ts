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

import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { HttpErrorFilter } from './common/http-error.filter';
import { ThrottlerExceptionFilter } from './common/throttler/throttler-exception.filter';
import { requestIdMiddleware } from './common/middleware/request-id.middleware';
import { requestLogMiddleware } from './common/middleware/request-log.middleware';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn']
  });
  const config = app.get(ConfigService);

  app.enableCors({ origin: true });
  app.setGlobalPrefix('api');
  app.use(requestIdMiddleware);
  app.use(requestLogMiddleware);
  // Filters are checked last-registered first: the throttler filter claims 429s.
  app.useGlobalFilters(
    new HttpErrorFilter(),
    new ThrottlerExceptionFilter(
      parseInt(config.get<string>('RATE_LIMIT_TTL', '60000'), 10),
      parseInt(config.get<string>('RATE_LIMIT_MAX', '100'), 10)
    )
  );

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Image Rating API')
      .setDescription(
        'Collects attractiveness ratings for a fixed pool of images and derives analytics from them.\n\n' +
        '## Values\n' +
        '- 1.0 to 10.0: a rating\n' +
        '- -1: the rater skipped the image\n' +
        '- -2: the rater flagged the image\n\n' +
        'Analytics and admin routes require the `x-dashboard-password` header.'
      )
      .setVersion('0.1.0')
      .setLicense('AGPL-3.0', 'https://www.gnu.org/licenses/agpl-3.0.html')
      .addTag('health', 'Health check endpoints')
      .addTag('ratings', 'Rating submission')
      .addTag('analytics', 'Distribution, image and rater statistics, CSV export')
      .addTag('admin', 'Purging images and test users')
      .build()
  );
  SwaggerModule.setup('api-docs', app, document);

  await app.listen(parseInt(config.get<string>('PORT', '4000'), 10));
}

bootstrap().catch((error) => {
  // eslint-disable-next-line no-console
  console.error('Failed to bootstrap Nest application', error);
  process.exit(1);
});
