// src/sessions/advisory-session.service.ts
import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';

import { decodeAnalysisArtifact, encodeAnalysisArtifact } from '../advisor/analysis-artifact.codec';
import { ArtifactStore } from '../advisor/artifact-store.service';
import { RequestCoordinator } from '../advisor/request-coordinator.service';
import { SearchCoverage } from '../search/search.types';
import { BusinessContext, LegalAnalysis } from '../synthesis/synthesis.types';
import { AdvisorySessionRepository } from './advisory-session.repository';
import { AdvisorySessionDocument, SessionContext } from './schemas/advisory-session.schema';
import { SessionMessageRepository } from './session-message.repository';

export const CONTEXT_QUERY = 'Provide Summary of Laws/Rules applicable to the Business';

export interface SessionView {
  id: string;
  context: BusinessContext;
  contextVersion: number;
  createdAt?: Date;
  updatedAt?: Date;
}

export type HistoryEntry =
  | { role: 'user'; content: string; createdAt?: Date }
  | { role: 'assistant'; content: LegalAnalysis; createdAt?: Date };

export interface SessionTurn {
  session: SessionView;
  analysis: LegalAnalysis;
  coverage: SearchCoverage;
}

function toBusinessContext(stored: SessionContext): BusinessContext {
  const { city, state, business_type, area_of_law, statute_of_law } = stored;
  return statute_of_law
    ? { city, state, business_type, area_of_law, statute_of_law }
    : { city, state, business_type, area_of_law };
}

function toView(doc: AdvisorySessionDocument): SessionView {
  return {
    id: doc._id.toString(),
    context: toBusinessContext(doc.context),
    contextVersion: doc.contextVersion,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

/**
 * Explicit advisory sessions: a business context plus its question history.
 * Replacing the context clears the history and reruns the summary query.
 */
@Injectable()
export class AdvisorySessionService {
  private readonly logger = new Logger(AdvisorySessionService.name);

  constructor(
    private readonly sessions: AdvisorySessionRepository,
    private readonly messages: SessionMessageRepository,
    private readonly coordinator: RequestCoordinator,
    private readonly artifacts: ArtifactStore,
  ) {}

  async start(context: BusinessContext, signal?: AbortSignal): Promise<SessionTurn> {
    const doc = await this.sessions.create(context);
    this.logger.log(`🆕 session ${doc._id.toString()} for ${context.business_type} in ${context.city}, ${context.state}`);

    return this.runContextQuery(toView(doc), signal);
  }

  async replaceContext(
    id: string,
    context: BusinessContext,
    signal?: AbortSignal,
  ): Promise<SessionTurn> {
    const doc = await this.sessions.replaceContext(id, context);
    if (!doc) throw new NotFoundException(`Session ${id} not found`);

    const removed = await this.messages.deleteBySessionId(doc._id.toString());
    await this.artifacts.removeSession(doc._id.toString());
    this.logger.log(`🔁 session ${doc._id.toString()} context v${doc.contextVersion}, cleared ${removed} messages`);

    return this.runContextQuery(toView(doc), signal);
  }

  async ask(id: string, query: string, signal?: AbortSignal): Promise<SessionTurn> {
    const session = await this.getView(id);

    await this.messages.create({ sessionId: session.id, role: 'user', content: query });

    const { analysis, coverage } = await this.coordinator.run(
      { query, context: session.context },
      { signal },
    );

    // the context may have been replaced while the pipeline ran
    const current = await this.getView(id);
    if (current.contextVersion !== session.contextVersion) {
      this.logger.warn(
        `session ${session.id} moved to context v${current.contextVersion} during a v${session.contextVersion} question; answer dropped`,
      );
      throw new ConflictException(
        `Session ${id} context changed while the question was being answered`,
      );
    }

    await this.messages.create({
      sessionId: session.id,
      role: 'assistant',
      content: encodeAnalysisArtifact(analysis),
    });

    return { session, analysis, coverage };
  }

  async get(id: string): Promise<{ session: SessionView; history: HistoryEntry[] }> {
    const session = await this.getView(id);
    const stored = await this.messages.findBySessionId(session.id);

    const history = stored.map((m): HistoryEntry =>
      m.role === 'assistant'
        ? { role: 'assistant', content: decodeAnalysisArtifact(m.content), createdAt: m.createdAt }
        : { role: 'user', content: m.content, createdAt: m.createdAt },
    );

    return { session, history };
  }

  async applicableLaws(id: string): Promise<LegalAnalysis> {
    const session = await this.getView(id);
    const analysis = await this.artifacts.readAnalysis(session.id);
    if (!analysis) {
      throw new NotFoundException(`Session ${id} has no applicable-laws analysis yet`);
    }
    return analysis;
  }

  private async getView(id: string): Promise<SessionView> {
    const doc = await this.sessions.findById(id);
    if (!doc) throw new NotFoundException(`Session ${id} not found`);
    return toView(doc);
  }

  private async runContextQuery(
    session: SessionView,
    signal?: AbortSignal,
  ): Promise<SessionTurn> {
    const { analysis, coverage, manifest } = await this.coordinator.run(
      { query: CONTEXT_QUERY, context: session.context },
      { signal },
    );

    await this.artifacts.writeManifest(session.id, manifest);
    await this.artifacts.writeAnalysis(session.id, analysis);
    await this.messages.create({
      sessionId: session.id,
      role: 'assistant',
      content: encodeAnalysisArtifact(analysis),
    });

    return { session, analysis, coverage };
  }
}
