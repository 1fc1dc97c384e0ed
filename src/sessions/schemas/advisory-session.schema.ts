import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

@Schema({ _id: false })
export class SessionContext {
  @Prop({ required: true, type: String })
  city!: string;

  @Prop({ required: true, type: String })
  state!: string;

  @Prop({ required: true, type: String })
  business_type!: string;

  @Prop({ required: true, type: String })
  area_of_law!: string;

  @Prop({ required: false, type: String })
  statute_of_law?: string;
}

export const SessionContextSchema = SchemaFactory.createForClass(SessionContext);

export type AdvisorySessionDocument = HydratedDocument<AdvisorySession>;

@Schema({ timestamps: true, collection: 'advisory_sessions' })
export class AdvisorySession {
  @Prop({ required: true, type: SessionContextSchema })
  context!: SessionContext;

  /** Bumped each time the context is replaced and history cleared. */
  @Prop({ required: true, type: Number, default: 1 })
  contextVersion!: number;

  // set by timestamps: true
  @Prop({ required: false, type: Date })
  createdAt?: Date;

  @Prop({ required: false, type: Date })
  updatedAt?: Date;
}

export const AdvisorySessionSchema = SchemaFactory.createForClass(AdvisorySession);
