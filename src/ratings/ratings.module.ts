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

import { DynamicModule, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import { Rating, RatingSchema } from './schemas/rating.schema';
import { RatingsController } from './ratings.controller';
import { RatingsRepository } from './ratings.repository';
import { RatingsService } from './ratings.service';
import { MongoRatingsRepository } from './mongo-ratings.repository';
import { InMemoryRatingsRepository } from './in-memory-ratings.repository';

export type RatingsStoreKind = 'mongo' | 'memory';

export const RATINGS_STORE_KIND = 'RATINGS_STORE_KIND';

export interface RatingsModuleOptions {
  store: RatingsStoreKind;
}

export function resolveRatingsStore(value: string | undefined): RatingsStoreKind {
  const normalized = (value || '').trim().toLowerCase();
  if (!normalized || normalized === 'mongo') return 'mongo';
  if (normalized === 'memory') return 'memory';
  throw new Error(`Unknown RATINGS_STORE "${value}"; expected "mongo" or "memory"`);
}

@Module({})
export class RatingsModule {
  static forRoot(options: RatingsModuleOptions): DynamicModule {
    if (options.store === 'memory') {
      return {
        global: true,
        module: RatingsModule,
        controllers: [RatingsController],
        providers: [
          RatingsService,
          { provide: RatingsRepository, useClass: InMemoryRatingsRepository },
          { provide: RATINGS_STORE_KIND, useValue: options.store }
        ],
        exports: [RatingsService, RATINGS_STORE_KIND]
      };
    }

    return {
      global: true,
      module: RatingsModule,
      imports: [
        MongooseModule.forRootAsync({
          inject: [ConfigService],
          useFactory: (config: ConfigService) => ({
            uri: config.get<string>('MONGO_URI', 'mongodb://localhost:27017/image-ratings'),
            autoIndex: config.get<string>('MONGO_AUTO_INDEX', 'false') === 'true',
            serverSelectionTimeoutMS: parseInt(config.get<string>('MONGO_SERVER_SELECTION_TIMEOUT_MS', '5000'), 10)
          })
        }),
        MongooseModule.forFeature([{ name: Rating.name, schema: RatingSchema }])
      ],
      controllers: [RatingsController],
      providers: [
        RatingsService,
        { provide: RatingsRepository, useClass: MongoRatingsRepository },
        { provide: RATINGS_STORE_KIND, useValue: options.store }
      ],
      exports: [RatingsService, RATINGS_STORE_KIND]
    };
  }
}
