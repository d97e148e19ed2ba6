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
import { Logger } from '@nestjs/common';
import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { AppModule } from './app.module';
import { AnalyticsService } from './analytics/analytics.service';
import { isExportFilter } from './analytics/analytics.engine';

/**
 * Writes the ratings CSV to a file.
 * Usage: npm run export:csv -- <output.csv> [all|validOnly]
 */
async function bootstrap() {
  const logger = new Logger('RatingsExport');
  const [output, filter = 'all'] = process.argv.slice(2);
  if (!output || !isExportFilter(filter)) {
    logger.error('Usage: export-ratings <output.csv> [all|validOnly]');
    process.exitCode = 1;
    return;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'error', 'warn']
  });
  try {
    const analytics = app.get(AnalyticsService);
    const csv = await analytics.exportCsv(filter);
    const target = resolve(output);
    await writeFile(target, csv, 'utf8');
    logger.log(`Exported ${filter} ratings to ${target}`);
  } finally {
    await app.close();
  }
}

bootstrap().catch((error) => {
  // eslint-disable-next-line no-console
  console.error('Ratings export failed', error);
  process.exit(1);
});
