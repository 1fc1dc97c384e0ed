import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';

import {
  SessionMessage,
  SessionMessageDocument,
  SessionMessageRole,
} from './schemas/session-message.schema';

@Injectable()
export class SessionMessageRepository {
  constructor(
    @InjectModel(SessionMessage.name)
    private readonly model: Model<SessionMessageDocument>,
  ) {}

  create(data: {
    sessionId: string;
    role: SessionMessageRole;
    content: string;
  }): Promise<SessionMessageDocument> {
    return this.model.create({
      sessionId: data.sessionId,
      role: data.role,
      content: data.content,
    });
  }

  findBySessionId(sessionId: string): Promise<SessionMessageDocument[]> {
    return this.model.find({ sessionId }).sort({ createdAt: 1 }).exec();
  }

  async deleteBySessionId(sessionId: string): Promise<number> {
    const res = await this.model.deleteMany({ sessionId }).exec();
    return res.deletedCount;
  }
}
