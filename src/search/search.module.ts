import { Module } from '@nestjs/common';

import { FixedRelevanceScorer } from './relevance-scorer';
import { SearchOrchestratorService } from './search-orchestrator.service';
import { RELEVANCE_SCORER, SEARCH_PROVIDER } from './search.types';
import { SerperSearchProvider } from './serper-search.provider';

@Module({
  providers: [
    { provide: SEARCH_PROVIDER, useClass: SerperSearchProvider },
    { provide: RELEVANCE_SCORER, useClass: FixedRelevanceScorer },
    SearchOrchestratorService,
  ],
  exports: [SEARCH_PROVIDER, SearchOrchestratorService],
})
export class SearchModule {}
