import { Injectable } from '@nestjs/common';
import { OrganicResult, RelevanceScorer } from './search.types';

/**
 * No ranking model yet: every trusted hit scores 1.0. Swap the provider
 * bound to RELEVANCE_SCORER to plug a real ranker in.
 */
@Injectable()
export class FixedRelevanceScorer implements RelevanceScorer {
  score(_result: OrganicResult): number {
    return 1.0;
  }
}

export function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.min(1, Math.max(0, score));
}
