import { ProviderError } from '../shared/errors';

export type Jurisdiction = 'Federal' | 'State' | 'Local';

export const JURISDICTIONS: readonly Jurisdiction[] = ['Federal', 'State', 'Local'];

/** One organic hit as the search provider returns it. */
export interface OrganicResult {
  link: string;
  title: string;
  snippet: string;
  [extra: string]: unknown;
}

export interface LegalSourceRecord {
  url: string;
  jurisdiction: Jurisdiction;
  title: string;
  description: string;
  relevance_score: number;
  content?: string;
}

/**
 * Client handle owned by a single pipeline run. Opened at run start and
 * closed at run end; closing aborts anything still in flight.
 */
export interface SearchSession {
  search(query: string): Promise<OrganicResult[]>;
  close(): Promise<void>;
}

export interface SearchProvider {
  openSession(): SearchSession;
}

export const SEARCH_PROVIDER = 'SEARCH_PROVIDER';

export interface RelevanceScorer {
  score(
    result: OrganicResult,
    scope: { query: string; jurisdiction: Jurisdiction },
  ): number;
}

export const RELEVANCE_SCORER = 'RELEVANCE_SCORER';

/** Result of a single scoped provider call. */
export interface ScopedSearchOutcome {
  query: string;
  records: LegalSourceRecord[];
  error?: ProviderError;
}

/**
 * Per-jurisdiction aggregate. `degraded` separates "no sources exist"
 * from "some scoped searches failed".
 */
export interface JurisdictionSearchResult {
  jurisdiction: Jurisdiction;
  records: LegalSourceRecord[];
  attempted: number;
  failed: number;
  errors: string[];
  degraded: boolean;
}

export type SearchCoverage = Record<
  Jurisdiction,
  Omit<JurisdictionSearchResult, 'records' | 'jurisdiction'> & {
    recordCount: number;
  }
>;

export function summarizeCoverage(
  results: readonly JurisdictionSearchResult[],
): SearchCoverage {
  const empty = () => ({
    attempted: 0,
    failed: 0,
    errors: [],
    degraded: false,
    recordCount: 0,
  });
  const coverage: SearchCoverage = { Federal: empty(), State: empty(), Local: empty() };

  for (const { jurisdiction, records, attempted, failed, errors, degraded } of results) {
    coverage[jurisdiction] = {
      attempted,
      failed,
      errors: [...errors],
      degraded,
      recordCount: records.length,
    };
  }
  return coverage;
}
