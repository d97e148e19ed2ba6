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

import { Model } from 'mongoose';
import { MongoRatingsRepository, isDuplicateKeyError, toStorageError } from './mongo-ratings.repository';
import { RatingDocument } from './schemas/rating.schema';
import { CorruptRatingError, DuplicateRatingError, StorageUnavailableError, ValidationError } from './ratings.errors';
import type { RatingEvent } from './rating.types';

function query<T>(result: T) {
  const q = {
    sort: jest.fn(),
    lean: jest.fn(),
    exec: jest.fn().mockResolvedValue(result)
  };
  q.sort.mockReturnValue(q);
  q.lean.mockReturnValue(q);
  return q;
}

describe('MongoRatingsRepository', () => {
  const model = {
    create: jest.fn(),
    find: jest.fn(),
    findOne: jest.fn(),
    aggregate: jest.fn(),
    deleteMany: jest.fn(),
    deleteOne: jest.fn(),
    createIndexes: jest.fn()
  };
  let repo: MongoRatingsRepository;

  const at = new Date('2025-03-01T10:00:00.000Z');
  const event: RatingEvent = {
    id: 'r-1',
    imageId: 'img-1.jpg',
    value: { kind: 'flagged' },
    userIdentifier: 'alice',
    timestamp: at
  };

  beforeEach(() => {
    jest.resetAllMocks();
    repo = new MongoRatingsRepository(model as unknown as Model<RatingDocument>);
  });

  it('creates indexes on startup', async () => {
    model.createIndexes.mockResolvedValue(undefined);
    await repo.onModuleInit();
    expect(model.createIndexes).toHaveBeenCalledTimes(1);
  });

  it('reports an unreachable database during index creation as storage unavailable', async () => {
    model.createIndexes.mockRejectedValue(new Error('Server selection timed out after 5000 ms'));
    await expect(repo.onModuleInit()).rejects.toThrow(
      'ratings index creation failed: Server selection timed out after 5000 ms'
    );
  });

  it('stores the sentinel encoding of the value', async () => {
    model.create.mockResolvedValue({});
    await repo.insert(event);
    expect(model.create).toHaveBeenCalledWith({
      ratingId: 'r-1',
      imageId: 'img-1.jpg',
      rating: -2,
      userIdentifier: 'alice',
      timestamp: at
    });
  });

  it('turns a duplicate key violation into DuplicateRatingError', async () => {
    const driverError = Object.assign(new Error('E11000 duplicate key error'), { code: 11000 });
    model.create.mockRejectedValue(driverError);

    const error = await repo.insert(event).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DuplicateRatingError);
    expect(error).toMatchObject({ imageId: 'img-1.jpg', userIdentifier: 'alice', cause: driverError });
  });

  it('turns other write failures into StorageUnavailableError', async () => {
    model.create.mockRejectedValue(new Error('connection reset'));

    const error = await repo.insert(event).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StorageUnavailableError);
    expect(error).toHaveProperty('message', 'ratings insert failed: connection reset');
  });

  it('queries by value class and images in store order', async () => {
    const q = query([{ ratingId: 'r-2', imageId: 'img-1.jpg', rating: 6.5, userIdentifier: 'bob', timestamp: at }]);
    model.find.mockReturnValue(q);

    const events = await repo.find({ valueKind: 'valid', imageIds: new Set(['img-1.jpg']) });

    expect(model.find).toHaveBeenCalledWith({ rating: { $gte: 1, $lte: 10 }, imageId: { $in: ['img-1.jpg'] } });
    expect(q.sort).toHaveBeenCalledWith({ timestamp: 1, ratingId: 1 });
    expect(events).toEqual([
      { id: 'r-2', imageId: 'img-1.jpg', value: { kind: 'valid', score: 6.5 }, userIdentifier: 'bob', timestamp: at }
    ]);
  });

  it('matches sentinels exactly for skipped and flagged', async () => {
    model.find.mockReturnValue(query([]));
    await repo.find({ valueKind: 'skipped' });
    await repo.find({ valueKind: 'flagged' });
    await repo.find({});

    expect(model.find).toHaveBeenNthCalledWith(1, { rating: -1 });
    expect(model.find).toHaveBeenNthCalledWith(2, { rating: -2 });
    expect(model.find).toHaveBeenNthCalledWith(3, {});
  });

  it('reports stored values outside the rating domain as corrupt rows', async () => {
    model.find.mockReturnValue(
      query([
        { ratingId: 'r-2', imageId: 'img-1.jpg', rating: 6.5, userIdentifier: 'bob', timestamp: at },
        { ratingId: 'r-3', imageId: 'img-1.jpg', rating: 55, userIdentifier: 'bob', timestamp: at }
      ])
    );

    const error = await repo.find({}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CorruptRatingError);
    expect(error).not.toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ code: 'corrupt_rating', ratingId: 'r-3' });
    expect(error).toHaveProperty(
      'message',
      'stored rating r-3 is unreadable: rating must be between 1.0 and 10.0, or -1 (skip) / -2 (flag); got 55'
    );
    expect(error).toHaveProperty('cause', expect.any(ValidationError));
  });

  it('reports a corrupt latest row of a user the same way', async () => {
    model.findOne.mockReturnValue(
      query({ ratingId: 'r-9', imageId: 'img-2.jpg', rating: 0, userIdentifier: 'bob', timestamp: at })
    );
    await expect(repo.findLatestByUser('bob')).rejects.toThrow(CorruptRatingError);
  });

  it('lists image ids of a user', async () => {
    model.find.mockReturnValue(query([{ imageId: 'a.jpg' }, { imageId: 'b.jpg' }]));
    expect(await repo.findImageIdsByUser('alice')).toEqual(['a.jpg', 'b.jpg']);
    expect(model.find).toHaveBeenCalledWith({ userIdentifier: 'alice' }, { imageId: 1, _id: 0 });
  });

  it('aggregates flag counts', async () => {
    model.aggregate.mockReturnValue(query([{ _id: 'img-9.jpg', flagCount: 4 }]));
    expect(await repo.countFlagsByImage()).toEqual([{ imageId: 'img-9.jpg', flagCount: 4 }]);
    expect(model.aggregate).toHaveBeenCalledWith([
      { $match: { rating: -2 } },
      { $group: { _id: '$imageId', flagCount: { $sum: 1 } } },
      { $sort: { flagCount: -1, _id: 1 } }
    ]);
  });

  it('reports deleted counts', async () => {
    model.deleteMany.mockReturnValue(query({ deletedCount: 3 }));
    model.deleteOne.mockReturnValue(query({ deletedCount: 0 }));

    expect(await repo.deleteByImage('img-1.jpg')).toBe(3);
    expect(model.deleteMany).toHaveBeenCalledWith({ imageId: 'img-1.jpg' });
    expect(await repo.deleteById('r-1')).toBe(false);
    expect(model.deleteOne).toHaveBeenCalledWith({ ratingId: 'r-1' });
  });

  it('finds the latest event of a user', async () => {
    const q = query({ ratingId: 'r-7', imageId: 'x.jpg', rating: -1, userIdentifier: 'alice', timestamp: at });
    model.findOne.mockReturnValue(q);

    expect(await repo.findLatestByUser('alice')).toEqual({
      id: 'r-7',
      imageId: 'x.jpg',
      value: { kind: 'skipped' },
      userIdentifier: 'alice',
      timestamp: at
    });
    expect(q.sort).toHaveBeenCalledWith({ timestamp: -1, ratingId: -1 });

    model.findOne.mockReturnValue(query(null));
    expect(await repo.findLatestByUser('bob')).toBeNull();
  });

  it('escapes substring patterns and de-duplicates users', async () => {
    model.find.mockReturnValue(
      query([{ userIdentifier: 'test.b' }, { userIdentifier: 'a-test.b' }, { userIdentifier: 'test.b' }])
    );

    expect(await repo.findUserIdentifiers({ pattern: 'test.b', exactMatch: false })).toEqual(['a-test.b', 'test.b']);
    expect(model.find).toHaveBeenCalledWith(
      { userIdentifier: { $regex: 'test\\.b', $options: 'i' } },
      { userIdentifier: 1, _id: 0 }
    );
  });

  it('uses equality for exact user matches', async () => {
    model.find.mockReturnValue(query([]));
    await repo.findUserIdentifiers({ pattern: 'Alice', exactMatch: true });
    expect(model.find).toHaveBeenCalledWith({ userIdentifier: 'Alice' }, { userIdentifier: 1, _id: 0 });
  });

  it('skips the delete for an empty user list', async () => {
    expect(await repo.deleteByUsers([])).toBe(0);
    expect(model.deleteMany).not.toHaveBeenCalled();
  });

  it('wraps read failures', async () => {
    const q = query([]);
    q.exec.mockRejectedValue(new Error('socket closed'));
    model.find.mockReturnValue(q);
    await expect(repo.find({})).rejects.toThrow('ratings scan failed: socket closed');
  });
});

describe('mongo error helpers', () => {
  it('detects duplicate key errors by code', () => {
    expect(isDuplicateKeyError({ code: 11000 })).toBe(true);
    expect(isDuplicateKeyError({ code: 121 })).toBe(false);
    expect(isDuplicateKeyError(null)).toBe(false);
  });

  it('passes store errors through and wraps the rest', () => {
    const known = new ValidationError('bad');
    expect(toStorageError(known, 'scan')).toBe(known);
    expect(toStorageError('boom', 'scan')).toBeInstanceOf(StorageUnavailableError);
    expect(toStorageError('boom', 'scan').message).toBe('ratings scan failed: boom');
  });
});
