// src/search/search-orchestrator.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';

import { advisorConfig } from '../config/advisor.config';
import { ProviderError, errorMessage } from '../shared/errors';
import { mapSettledInBatches } from '../shared/lib/concurrency/map-in-batches';
import { federalDomains, isTrustedDomain } from '../sources/source-registry';
import { clampScore } from './relevance-scorer';
import {
  Jurisdiction,
  JurisdictionSearchResult,
  LegalSourceRecord,
  OrganicResult,
  RELEVANCE_SCORER,
  RelevanceScorer,
  ScopedSearchOutcome,
  SearchSession,
} from './search.types';

const GOV_SITE_CLAUSE = 'site:.gov';

/**
 * Appends the jurisdiction's scope to a query. State and Local need a state;
 * without one the query runs unscoped.
 */
export function buildScopedQuery(
  query: string,
  jurisdiction: Jurisdiction,
  state?: string,
): string {
  const base = query.trim();
  const st = state?.trim();

  switch (jurisdiction) {
    case 'Federal':
      return `${base} ${GOV_SITE_CLAUSE}`;
    case 'State':
      return st ? `${base} ${st} state law ${GOV_SITE_CLAUSE}` : base;
    case 'Local':
      return st ? `${base} local law ${GOV_SITE_CLAUSE}` : base;
  }
}

@Injectable()
export class SearchOrchestratorService {
  private readonly logger = new Logger(SearchOrchestratorService.name);
  private readonly federalConcurrency: number;

  constructor(
    @Inject(RELEVANCE_SCORER)
    private readonly scorer: RelevanceScorer,
    @Inject(advisorConfig.KEY)
    config: ConfigType<typeof advisorConfig>,
  ) {
    this.federalConcurrency = config.search.federalConcurrency;
  }

  /**
   * One scoped provider call. Never rejects: a provider failure is logged
   * and comes back as an empty record list with the error attached.
   */
  async search(
    session: SearchSession,
    query: string,
    jurisdiction: Jurisdiction,
    state?: string,
  ): Promise<ScopedSearchOutcome> {
    const scoped = buildScopedQuery(query, jurisdiction, state);

    let results: OrganicResult[];
    try {
      results = await session.search(scoped);
    } catch (e) {
      const error =
        e instanceof ProviderError
          ? e
          : new ProviderError(errorMessage(e), scoped, { cause: e });

      this.logger.warn(
        `Scoped ${jurisdiction} search failed, continuing without it: q="${scoped}" error="${error.message}"`,
      );
      return { query: scoped, records: [], error };
    }

    const records = results
      .filter((r) => isTrustedDomain(r.link))
      .map((r) => this.toRecord(r, scoped, jurisdiction));

    this.logger.debug(
      `search(): ${jurisdiction} q="${scoped}" organic=${results.length} trusted=${records.length}`,
    );

    return { query: scoped, records };
  }

  /** Searches each federal regulator separately; slices keep domain-list order. */
  async getFederalLaws(
    session: SearchSession,
    query: string,
  ): Promise<JurisdictionSearchResult> {
    const domains = federalDomains();

    const settled = await mapSettledInBatches(
      domains,
      this.federalConcurrency,
      (domain) => this.search(session, `${query} site:${domain}`, 'Federal'),
    );

    const outcomes = settled.map((s, i): ScopedSearchOutcome => {
      if (s.status === 'fulfilled') return s.value;
      // search() does not reject; this only guards against a broken session object
      const failedQuery = buildScopedQuery(`${query} site:${domains[i]}`, 'Federal');
      return {
        query: failedQuery,
        records: [],
        error: new ProviderError(errorMessage(s.reason), failedQuery, {
          cause: s.reason,
        }),
      };
    });

    return this.aggregate('Federal', outcomes);
  }

  async getStateLaws(
    session: SearchSession,
    query: string,
    state: string,
  ): Promise<JurisdictionSearchResult> {
    const outcome = await this.search(session, query, 'State', state);
    return this.aggregate('State', [outcome]);
  }

  async getLocalLaws(
    session: SearchSession,
    query: string,
    city: string,
    state: string,
  ): Promise<JurisdictionSearchResult> {
    const localQuery = [query, city, state]
      .map((p) => p.trim())
      .filter(Boolean)
      .join(' ');

    const outcome = await this.search(session, localQuery, 'Local', state);
    return this.aggregate('Local', [outcome]);
  }

  private toRecord(
    result: OrganicResult,
    query: string,
    jurisdiction: Jurisdiction,
  ): LegalSourceRecord {
    return {
      url: result.link,
      jurisdiction,
      title: result.title,
      description: result.snippet,
      relevance_score: clampScore(this.scorer.score(result, { query, jurisdiction })),
      content: JSON.stringify(result),
    };
  }

  private aggregate(
    jurisdiction: Jurisdiction,
    outcomes: ScopedSearchOutcome[],
  ): JurisdictionSearchResult {
    const errors = outcomes
      .map((o) => o.error?.message)
      .filter((m): m is string => typeof m === 'string');

    return {
      jurisdiction,
      records: outcomes.flatMap((o) => o.records),
      attempted: outcomes.length,
      failed: errors.length,
      errors,
      degraded: errors.length > 0,
    };
  }
}
