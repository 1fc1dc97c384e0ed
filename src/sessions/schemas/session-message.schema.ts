import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type SessionMessageRole = 'user' | 'assistant';

export type SessionMessageDocument = HydratedDocument<SessionMessage>;

@Schema({ timestamps: true, collection: 'advisory_session_messages' })
export class SessionMessage {
  @Prop({ required: true, type: String, index: true })
  sessionId!: string;

  @Prop({ required: true, type: String, enum: ['user', 'assistant'] })
  role!: SessionMessageRole;

  /** User turns hold the query text; assistant turns hold an encoded analysis artifact. */
  @Prop({ required: true, type: String })
  content!: string;

  @Prop({ required: false, type: Date })
  createdAt?: Date;
}

export const SessionMessageSchema = SchemaFactory.createForClass(SessionMessage);
