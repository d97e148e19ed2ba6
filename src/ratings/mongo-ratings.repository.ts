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

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model } from 'mongoose';
import { Rating, RatingDocument } from './schemas/rating.schema';
import { RatingsRepository } from './ratings.repository';
import { escapeRegex } from './rating.types';
import type { FlaggedImage, RatingEvent, RatingFilter, UserMatch } from './rating.types';
import {
  FLAG_SENTINEL,
  MAX_SCORE,
  MIN_SCORE,
  RatingValue,
  RatingValueKind,
  SKIP_SENTINEL,
  decodeRatingValue,
  encodeRatingValue
} from './rating-value';
import {
  CorruptRatingError,
  DuplicateRatingError,
  RatingStoreError,
  StorageUnavailableError
} from './ratings.errors';

const DUPLICATE_KEY_CODE = 11000;

export function isDuplicateKeyError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === DUPLICATE_KEY_CODE;
}

export function toStorageError(error: unknown, operation: string): RatingStoreError {
  if (error instanceof RatingStoreError) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new StorageUnavailableError(`ratings ${operation} failed: ${reason}`, { cause: error });
}

function ratingCondition(kind: RatingValueKind): FilterQuery<Rating>['rating'] {
  switch (kind) {
    case 'valid':
      return { $gte: MIN_SCORE, $lte: MAX_SCORE };
    case 'skipped':
      return SKIP_SENTINEL;
    case 'flagged':
      return FLAG_SENTINEL;
  }
}

@Injectable()
export class MongoRatingsRepository extends RatingsRepository implements OnModuleInit {
  private readonly logger = new Logger(MongoRatingsRepository.name);

  constructor(
    @InjectModel(Rating.name)
    private readonly ratingModel: Model<RatingDocument>
  ) {
    super();
  }

  // The unique (imageId, userIdentifier) index must exist even with autoIndex off.
  async onModuleInit(): Promise<void> {
    await this.run('index creation', () => this.ratingModel.createIndexes());
    this.logger.log('Rating indexes ensured');
  }

  async insert(event: RatingEvent): Promise<void> {
    try {
      await this.ratingModel.create({
        ratingId: event.id,
        imageId: event.imageId,
        rating: encodeRatingValue(event.value),
        userIdentifier: event.userIdentifier,
        timestamp: event.timestamp
      });
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new DuplicateRatingError(event.imageId, event.userIdentifier, { cause: error });
      }
      throw toStorageError(error, 'insert');
    }
  }

  async findImageIdsByUser(userIdentifier: string): Promise<string[]> {
    const docs = await this.run('lookup', () =>
      this.ratingModel.find({ userIdentifier }, { imageId: 1, _id: 0 }).lean().exec()
    );
    return docs.map((doc) => doc.imageId);
  }

  async find(filter: RatingFilter): Promise<RatingEvent[]> {
    const query: FilterQuery<Rating> = {};
    if (filter.valueKind) {
      query.rating = ratingCondition(filter.valueKind);
    }
    if (filter.imageIds) {
      query.imageId = { $in: Array.from(filter.imageIds) };
    }
    const docs = await this.run('scan', () =>
      this.ratingModel.find(query).sort({ timestamp: 1, ratingId: 1 }).lean().exec()
    );
    return docs.map((doc) => this.toEvent(doc));
  }

  async countFlagsByImage(): Promise<FlaggedImage[]> {
    const rows = await this.run('flag aggregation', () =>
      this.ratingModel
        .aggregate<{ _id: string; flagCount: number }>([
          { $match: { rating: FLAG_SENTINEL } },
          { $group: { _id: '$imageId', flagCount: { $sum: 1 } } },
          { $sort: { flagCount: -1, _id: 1 } }
        ])
        .exec()
    );
    return rows.map((row) => ({ imageId: row._id, flagCount: row.flagCount }));
  }

  async deleteByImage(imageId: string): Promise<number> {
    const result = await this.run('purge', () => this.ratingModel.deleteMany({ imageId }).exec());
    return result.deletedCount;
  }

  async findLatestByUser(userIdentifier: string): Promise<RatingEvent | null> {
    const doc = await this.run('lookup', () =>
      this.ratingModel.findOne({ userIdentifier }).sort({ timestamp: -1, ratingId: -1 }).lean().exec()
    );
    return doc ? this.toEvent(doc) : null;
  }

  async deleteById(id: string): Promise<boolean> {
    const result = await this.run('delete', () => this.ratingModel.deleteOne({ ratingId: id }).exec());
    return result.deletedCount === 1;
  }

  async findUserIdentifiers(match: UserMatch): Promise<string[]> {
    // Same escaped pattern and flag as the in-memory store
    const condition = match.exactMatch
      ? match.pattern
      : { $regex: escapeRegex(match.pattern), $options: 'i' };
    const docs = await this.run('lookup', () =>
      this.ratingModel.find({ userIdentifier: condition }, { userIdentifier: 1, _id: 0 }).lean().exec()
    );
    return Array.from(new Set(docs.map((doc) => doc.userIdentifier))).sort();
  }

  async deleteByUsers(userIdentifiers: string[]): Promise<number> {
    if (userIdentifiers.length === 0) return 0;
    const result = await this.run('purge', () =>
      this.ratingModel.deleteMany({ userIdentifier: { $in: userIdentifiers } }).exec()
    );
    return result.deletedCount;
  }

  private toEvent(doc: Rating): RatingEvent {
    let value: RatingValue;
    try {
      value = decodeRatingValue(doc.rating);
    } catch (error) {
      this.logger.error(`Stored rating ${doc.ratingId} holds ${doc.rating}, outside the rating domain`);
      throw new CorruptRatingError(doc.ratingId, { cause: error });
    }
    return {
      id: doc.ratingId,
      imageId: doc.imageId,
      value,
      userIdentifier: doc.userIdentifier,
      timestamp: new Date(doc.timestamp)
    };
  }

  private async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      throw toStorageError(error, operation);
    }
  }
}
