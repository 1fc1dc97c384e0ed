// src/ai/ai.module.ts
import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { OpenAI } from 'openai';

import { AiService } from './ai.service';
import { AiUsageService } from './ai-usage.service';
import { PgModule } from '../pg/pg.module';
import { advisorConfig } from '../config/advisor.config';

@Module({
  imports: [PgModule],
  providers: [
    {
      provide: OpenAI,
      inject: [advisorConfig.KEY],
      // the key is validated by advisorConfig at startup
      useFactory: (config: ConfigType<typeof advisorConfig>) =>
        new OpenAI({ apiKey: config.openai.apiKey }),
    },
    AiService,
    AiUsageService,
  ],
  exports: [AiService],
})
export class AiModule {}
