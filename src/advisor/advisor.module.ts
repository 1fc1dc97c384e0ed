import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';

import { AiModule } from '../ai/ai.module';
import { SearchModule } from '../search/search.module';
import { SynthesisModule } from '../synthesis/synthesis.module';
import { AdvisorController } from './advisor.controller';
import { ArtifactStore } from './artifact-store.service';
import { ContextExtractor } from './context-extractor.service';
import { AdvisorErrorFilter } from './filters/advisor-error.filter';
import { RequestCoordinator } from './request-coordinator.service';

@Module({
  imports: [AiModule, SearchModule, SynthesisModule],
  controllers: [AdvisorController],
  providers: [
    RequestCoordinator,
    ContextExtractor,
    ArtifactStore,
    { provide: APP_FILTER, useClass: AdvisorErrorFilter },
  ],
  exports: [RequestCoordinator, ArtifactStore],
})
export class AdvisorModule {}
