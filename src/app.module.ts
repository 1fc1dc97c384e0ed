// src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';

import { AdvisorModule } from './advisor/advisor.module';
import { AiModule } from './ai/ai.module';
import { advisorConfig } from './config/advisor.config';
import { PgModule } from './pg/pg.module';
import { SearchModule } from './search/search.module';
import { SessionsModule } from './sessions/sessions.module';
import { LoggingModule } from './shared/lib/logging/logging.module';
import { SynthesisModule } from './synthesis/synthesis.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [advisorConfig] }),
    MongooseModule.forRootAsync({
      inject: [advisorConfig.KEY],
      useFactory: (config: ConfigType<typeof advisorConfig>) => ({
        uri: config.mongoUri,
      }),
    }),
    LoggingModule,

    PgModule,
    AiModule,
    SearchModule,
    SynthesisModule,
    AdvisorModule,
    SessionsModule,
  ],
})
export class AppModule {}
