import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

import { ConflictException, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { AdvisorySessionService, CONTEXT_QUERY } from './advisory-session.service';
import { AdvisorySessionRepository } from './advisory-session.repository';
import { SessionMessageRepository } from './session-message.repository';
import { encodeAnalysisArtifact } from '../advisor/analysis-artifact.codec';
import { ArtifactStore } from '../advisor/artifact-store.service';
import { AdvisorRunResult, RequestCoordinator } from '../advisor/request-coordinator.service';
import { buildSourceManifest } from '../advisor/source-manifest';
import { loadAdvisorConfig } from '../config/advisor.config';
import { summarizeCoverage } from '../search/search.types';
import { AnalysisArtifactError, SynthesisParseError } from '../shared/errors';
import { BusinessContext, LegalAnalysis } from '../synthesis/synthesis.types';

const context: BusinessContext = {
  city: 'Denver',
  state: 'Colorado',
  business_type: 'Landlord',
  area_of_law: 'Licensing, Permits and Zoning',
};

const analysis: LegalAnalysis = {
  summary: 'Summary',
  key_points: ['Point'],
  jurisdiction_analysis: { State: 'S' },
  compliance_steps: [],
  overlapping_regulations: [],
  sources: ['https://colorado.gov/a'],
  response_time: 1.5,
};

const sessionDoc = (ctx: BusinessContext, contextVersion = 1) => ({
  _id: { toString: () => '64b7f0c2a1b2c3d4e5f60718' },
  context: ctx,
  contextVersion,
});

describe('AdvisorySessionService', () => {
  let service: AdvisorySessionService;
  let sessions: { create: jest.Mock; findById: jest.Mock; replaceContext: jest.Mock };
  let messages: { create: jest.Mock; findBySessionId: jest.Mock; deleteBySessionId: jest.Mock };
  let run: jest.Mock;
  let artifacts: {
    writeManifest: jest.Mock;
    writeAnalysis: jest.Mock;
    readAnalysis: jest.Mock;
    removeSession: jest.Mock;
  };

  const id = '64b7f0c2a1b2c3d4e5f60718';
  const manifest = buildSourceManifest([], [], []);
  const coverage = summarizeCoverage([]);

  beforeEach(async () => {
    sessions = {
      create: jest.fn().mockResolvedValue(sessionDoc(context)),
      findById: jest.fn().mockResolvedValue(sessionDoc(context)),
      replaceContext: jest.fn(),
    };
    messages = {
      create: jest.fn().mockResolvedValue({}),
      findBySessionId: jest.fn().mockResolvedValue([]),
      deleteBySessionId: jest.fn().mockResolvedValue(3),
    };
    run = jest.fn().mockResolvedValue({ analysis, coverage, manifest });
    artifacts = {
      writeManifest: jest.fn().mockResolvedValue('manifest.json'),
      writeAnalysis: jest.fn().mockResolvedValue('analysis.json'),
      readAnalysis: jest.fn(),
      removeSession: jest.fn().mockResolvedValue(undefined),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AdvisorySessionService,
        { provide: AdvisorySessionRepository, useValue: sessions },
        { provide: SessionMessageRepository, useValue: messages },
        { provide: RequestCoordinator, useValue: { run } },
        { provide: ArtifactStore, useValue: artifacts },
      ],
    }).compile();

    service = module.get(AdvisorySessionService);
  });

  it('should run the summary query and persist both artifacts when a session starts', async () => {
    const turn = await service.start(context);

    expect(run).toHaveBeenCalledWith({ query: CONTEXT_QUERY, context }, { signal: undefined });
    expect(artifacts.writeManifest).toHaveBeenCalledWith(id, manifest);
    expect(artifacts.writeAnalysis).toHaveBeenCalledWith(id, analysis);
    expect(messages.create).toHaveBeenCalledWith({
      sessionId: id,
      role: 'assistant',
      content: encodeAnalysisArtifact(analysis),
    });
    expect(turn.session).toEqual({
      id,
      context,
      contextVersion: 1,
      createdAt: undefined,
      updatedAt: undefined,
    });
  });

  it('should clear history before rerunning with a replaced context', async () => {
    const next = { ...context, city: 'Boulder' };
    sessions.replaceContext.mockResolvedValueOnce(sessionDoc(next, 2));

    const turn = await service.replaceContext(id, next);

    expect(messages.deleteBySessionId).toHaveBeenCalledWith(id);
    expect(messages.deleteBySessionId.mock.invocationCallOrder[0]).toBeLessThan(
      run.mock.invocationCallOrder[0],
    );
    expect(artifacts.removeSession).toHaveBeenCalledWith(id);
    expect(artifacts.removeSession.mock.invocationCallOrder[0]).toBeLessThan(
      run.mock.invocationCallOrder[0],
    );
    expect(run).toHaveBeenCalledWith(
      { query: CONTEXT_QUERY, context: next },
      { signal: undefined },
    );
    expect(turn.session.contextVersion).toBe(2);
  });

  it('should store the question and the answer for a follow-up', async () => {
    await service.ask(id, 'Do I need a rental license?');

    expect(messages.create.mock.calls.map(([m]) => m.role)).toEqual(['user', 'assistant']);
    expect(messages.create).toHaveBeenNthCalledWith(1, {
      sessionId: id,
      role: 'user',
      content: 'Do I need a rental license?',
    });
    expect(run).toHaveBeenCalledWith(
      { query: 'Do I need a rental license?', context },
      { signal: undefined },
    );
    expect(artifacts.writeAnalysis).not.toHaveBeenCalled();
  });

  it('should drop a follow-up answer when the context is replaced mid-question', async () => {
    const next = { ...context, city: 'Boulder' };
    let current = { context, version: 1 };
    sessions.findById.mockImplementation(async () => sessionDoc(current.context, current.version));
    sessions.replaceContext.mockImplementation(async (_id: string, ctx: BusinessContext) => {
      current = { context: ctx, version: current.version + 1 };
      return sessionDoc(ctx, current.version);
    });

    let releaseFollowUp: (result: AdvisorRunResult) => void = () => undefined;
    const followUp = new Promise<AdvisorRunResult>((resolve) => {
      releaseFollowUp = resolve;
    });
    run.mockImplementation(async ({ query }: { query: string }) =>
      query === CONTEXT_QUERY ? { analysis, coverage, manifest } : followUp,
    );

    const asking = service.ask(id, 'Do I need a rental license?');
    await service.replaceContext(id, next);
    releaseFollowUp({ analysis: { ...analysis, summary: 'Stale' }, coverage, manifest });

    await expect(asking).rejects.toBeInstanceOf(ConflictException);
    const assistantTurns = messages.create.mock.calls.filter(([m]) => m.role === 'assistant');
    expect(assistantTurns).toEqual([
      [{ sessionId: id, role: 'assistant', content: encodeAnalysisArtifact(analysis) }],
    ]);
  });

  it('should decode assistant turns when returning history', async () => {
    messages.findBySessionId.mockResolvedValueOnce([
      { role: 'user', content: 'question' },
      { role: 'assistant', content: encodeAnalysisArtifact(analysis) },
    ]);

    const { history } = await service.get(id);

    expect(history).toEqual([
      { role: 'user', content: 'question', createdAt: undefined },
      { role: 'assistant', content: analysis, createdAt: undefined },
    ]);
  });

  it('should refuse a tampered assistant turn', async () => {
    messages.findBySessionId.mockResolvedValueOnce([
      { role: 'assistant', content: '{"kind":"legal-analysis","version":1}' },
    ]);

    await expect(service.get(id)).rejects.toBeInstanceOf(AnalysisArtifactError);
  });

  it('should 404 for unknown sessions', async () => {
    sessions.findById.mockResolvedValueOnce(null);

    await expect(service.ask('nope', 'q')).rejects.toBeInstanceOf(NotFoundException);
    expect(run).not.toHaveBeenCalled();
  });

  it('should 404 when no applicable-laws analysis is stored', async () => {
    artifacts.readAnalysis.mockResolvedValueOnce(null);

    await expect(service.applicableLaws(id)).rejects.toThrow(
      `Session ${id} has no applicable-laws analysis yet`,
    );
  });
});

describe('AdvisorySessionService with stored artifacts', () => {
  let dir: string;
  let service: AdvisorySessionService;
  let run: jest.Mock;

  const id = '64b7f0c2a1b2c3d4e5f60718';

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'advisor-sessions-'));
    const store = new ArtifactStore(
      loadAdvisorConfig({
        OPENAI_API_KEY: 'test-openai-key',
        SERPER_API_KEY: 'test-serper-key',
        ARTIFACTS_DIR: dir,
      }),
    );
    run = jest.fn().mockResolvedValue({
      analysis,
      coverage: summarizeCoverage([]),
      manifest: buildSourceManifest([], [], []),
    });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AdvisorySessionService,
        {
          provide: AdvisorySessionRepository,
          useValue: {
            create: jest.fn().mockResolvedValue(sessionDoc(context)),
            findById: jest.fn().mockResolvedValue(sessionDoc(context)),
            replaceContext: jest.fn().mockResolvedValue(sessionDoc(context, 2)),
          },
        },
        {
          provide: SessionMessageRepository,
          useValue: {
            create: jest.fn().mockResolvedValue({}),
            findBySessionId: jest.fn().mockResolvedValue([]),
            deleteBySessionId: jest.fn().mockResolvedValue(1),
          },
        },
        { provide: RequestCoordinator, useValue: { run } },
        { provide: ArtifactStore, useValue: store },
      ],
    }).compile();

    service = module.get(AdvisorySessionService);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should not serve the previous analysis after a failed context replacement', async () => {
    await service.start(context);
    await expect(service.applicableLaws(id)).resolves.toEqual(analysis);

    run.mockRejectedValueOnce(
      new SynthesisParseError('Model reply is not valid JSON', 'RAW', 'CLEANED'),
    );
    await expect(service.replaceContext(id, context)).rejects.toBeInstanceOf(SynthesisParseError);

    await expect(service.applicableLaws(id)).rejects.toBeInstanceOf(NotFoundException);
  });
});
