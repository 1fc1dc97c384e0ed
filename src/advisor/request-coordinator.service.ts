// src/advisor/request-coordinator.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';

import { advisorConfig } from '../config/advisor.config';
import { SearchOrchestratorService } from '../search/search-orchestrator.service';
import {
  SEARCH_PROVIDER,
  SearchCoverage,
  SearchProvider,
  summarizeCoverage,
} from '../search/search.types';
import {
  ModelOutputParseError,
  SynthesisAbortedError,
  errorMessage,
} from '../shared/errors';
import { createDeadline } from '../shared/lib/deadline';
import { LOGGER_SERVICE, type LoggerService } from '../shared/types';
import { ResponseSynthesizer } from '../synthesis/response-synthesizer.service';
import { BusinessContext, LegalAnalysis } from '../synthesis/synthesis.types';
import { SourceManifest, buildSourceManifest } from './source-manifest';

export type QueryPhase =
  | 'Idle'
  | 'Searching'
  | 'Joined'
  | 'Synthesizing'
  | 'Complete'
  | 'Failed';

export interface AdvisorQuery {
  query: string;
  context: BusinessContext;
}

export interface RunOptions {
  /** Caller cancellation, e.g. the client disconnecting. */
  signal?: AbortSignal;
  /** Overrides the configured synthesis deadline. */
  timeoutMs?: number;
}

export interface AdvisorRunResult {
  analysis: LegalAnalysis;
  coverage: SearchCoverage;
  manifest: SourceManifest;
}

let runCounter = 0;

@Injectable()
export class RequestCoordinator {
  private readonly logger = new Logger(RequestCoordinator.name);
  private readonly synthesisTimeoutMs: number;

  constructor(
    @Inject(SEARCH_PROVIDER)
    private readonly provider: SearchProvider,
    private readonly orchestrator: SearchOrchestratorService,
    private readonly synthesizer: ResponseSynthesizer,
    @Inject(LOGGER_SERVICE)
    private readonly loggerService: LoggerService,
    @Inject(advisorConfig.KEY)
    config: ConfigType<typeof advisorConfig>,
  ) {
    this.synthesisTimeoutMs = config.synthesis.timeoutMs;
  }

  /**
   * Runs one query end to end: the three jurisdiction searches concurrently,
   * then a single synthesis over the joined source sets.
   */
  async run(request: AdvisorQuery, options: RunOptions = {}): Promise<AdvisorRunResult> {
    const { query, context } = request;
    const runId = `q${++runCounter}`;
    const startedAt = performance.now();

    let phase: QueryPhase = 'Idle';
    const enter = (next: QueryPhase) => {
      this.logger.debug(`[${runId}] ${phase} -> ${next}`);
      phase = next;
    };

    const session = this.provider.openSession();
    // a caller abort cancels whatever searches are still in flight
    const closeOnAbort = () => {
      session.close().catch((e: unknown) => {
        this.logger.warn(`[${runId}] closing search session failed: ${errorMessage(e)}`);
      });
    };
    if (options.signal?.aborted) closeOnAbort();
    else options.signal?.addEventListener('abort', closeOnAbort, { once: true });

    try {
      enter('Searching');
      const [federal, state, local] = await Promise.all([
        this.orchestrator.getFederalLaws(session, query),
        this.orchestrator.getStateLaws(session, query, context.state),
        this.orchestrator.getLocalLaws(session, query, context.city, context.state),
      ]);
      const searchMs = performance.now() - startedAt;

      if (options.signal?.aborted) {
        throw new SynthesisAbortedError('Query aborted by the caller before synthesis', {
          cause: options.signal.reason,
        });
      }

      enter('Joined');
      const coverage = summarizeCoverage([federal, state, local]);
      this.logger.log(
        `🔎 [${runId}] sources federal=${federal.records.length} state=${state.records.length} local=${local.records.length} in ${Math.round(searchMs)}ms`,
      );

      enter('Synthesizing');
      const timeoutMs = options.timeoutMs ?? this.synthesisTimeoutMs;
      const deadline = createDeadline(timeoutMs, options.signal);
      const synthesisStartedAt = performance.now();

      let analysis: LegalAnalysis;
      try {
        analysis = await this.synthesizer.synthesize(
          context,
          federal.records,
          state.records,
          local.records,
          { signal: deadline.signal },
        );
      } catch (e) {
        if (e instanceof SynthesisAbortedError && deadline.timedOut()) {
          throw new SynthesisAbortedError(`Synthesis exceeded its ${timeoutMs}ms deadline`, {
            cause: e,
          });
        }
        throw e;
      } finally {
        deadline.dispose();
      }

      const synthesisMs = performance.now() - synthesisStartedAt;
      enter('Complete');
      this.logger.log(
        `✅ [${runId}] search ${Math.round(searchMs)}ms, synthesis ${Math.round(synthesisMs)}ms, total ${Math.round(performance.now() - startedAt)}ms`,
      );

      return {
        analysis,
        coverage,
        manifest: buildSourceManifest(federal.records, state.records, local.records),
      };
    } catch (e) {
      enter('Failed');

      if (e instanceof ModelOutputParseError) {
        await this.loggerService.error(
          `[${runId}] Model output could not be parsed: ${e.message}\n` +
            `--- raw ---\n${e.raw}\n--- cleaned ---\n${e.cleaned}`,
          e.stack,
        );
      } else {
        this.logger.warn(`[${runId}] query failed: ${errorMessage(e)}`);
      }
      throw e;
    } finally {
      options.signal?.removeEventListener('abort', closeOnAbort);
      await session.close();
    }
  }
}
