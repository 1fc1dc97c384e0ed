import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, isValidObjectId } from 'mongoose';

import { BusinessContext } from '../synthesis/synthesis.types';
import {
  AdvisorySession,
  AdvisorySessionDocument,
} from './schemas/advisory-session.schema';

@Injectable()
export class AdvisorySessionRepository {
  constructor(
    @InjectModel(AdvisorySession.name)
    private readonly model: Model<AdvisorySessionDocument>,
  ) {}

  create(context: BusinessContext): Promise<AdvisorySessionDocument> {
    return this.model.create({ context: { ...context }, contextVersion: 1 });
  }

  /** Null for unknown ids and for strings that are not ObjectIds. */
  async findById(id: string): Promise<AdvisorySessionDocument | null> {
    if (!isValidObjectId(id)) return null;
    return this.model.findById(id).exec();
  }

  async replaceContext(
    id: string,
    context: BusinessContext,
  ): Promise<AdvisorySessionDocument | null> {
    if (!isValidObjectId(id)) return null;
    return this.model
      .findByIdAndUpdate(
        id,
        { $set: { context: { ...context } }, $inc: { contextVersion: 1 } },
        { new: true },
      )
      .exec();
  }
}
