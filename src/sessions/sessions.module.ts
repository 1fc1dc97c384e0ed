import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';

import { AdvisorModule } from '../advisor/advisor.module';
import { AdvisorySessionRepository } from './advisory-session.repository';
import { AdvisorySessionService } from './advisory-session.service';
import { AdvisorySession, AdvisorySessionSchema } from './schemas/advisory-session.schema';
import { SessionMessage, SessionMessageSchema } from './schemas/session-message.schema';
import { SessionMessageRepository } from './session-message.repository';
import { SessionsController } from './sessions.controller';

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: AdvisorySession.name, schema: AdvisorySessionSchema },
      { name: SessionMessage.name, schema: SessionMessageSchema },
    ]),
    AdvisorModule,
  ],
  controllers: [SessionsController],
  providers: [AdvisorySessionService, AdvisorySessionRepository, SessionMessageRepository],
})
export class SessionsModule {}
