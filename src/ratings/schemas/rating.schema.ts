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

import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

@Schema({
  collection: 'ratings',
  versionKey: false
})
export class Rating {
  @Prop({ required: true, unique: true })
  ratingId!: string;

  @Prop({ required: true, trim: true })
  imageId!: string;

  // 1.0-10.0, or -1 (skip) / -2 (flag)
  @Prop({ required: true })
  rating!: number;

  @Prop({ required: true, index: true, trim: true })
  userIdentifier!: string;

  @Prop({ type: Date, required: true })
  timestamp!: Date;
}

export type RatingDocument = HydratedDocument<Rating>;
export const RatingSchema = SchemaFactory.createForClass(Rating);

// One rating per user per image
RatingSchema.index({ imageId: 1, userIdentifier: 1 }, { unique: true });
// Ordered scans for listings and exports
RatingSchema.index({ timestamp: 1, ratingId: 1 });
