// src/advisor/artifact-store.service.ts
import { promises as fs } from 'fs';
import path from 'path';

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';

import { advisorConfig } from '../config/advisor.config';
import { LegalAnalysis } from '../synthesis/synthesis.types';
import { decodeAnalysisArtifact, encodeAnalysisArtifact } from './analysis-artifact.codec';
import { SourceManifest } from './source-manifest';

export const MANIFEST_FILE = 'identified_sources.json';
export const ANALYSIS_FILE = 'applicable_laws.json';

const SAFE_SEGMENT = /^[A-Za-z0-9_-]+$/;

/** Per-session JSON files under ARTIFACTS_DIR. */
@Injectable()
export class ArtifactStore {
  private readonly logger = new Logger(ArtifactStore.name);
  private readonly rootDir: string;

  constructor(
    @Inject(advisorConfig.KEY)
    config: ConfigType<typeof advisorConfig>,
  ) {
    this.rootDir = path.resolve(config.artifactsDir);
  }

  async writeManifest(sessionId: string, manifest: SourceManifest): Promise<string> {
    return this.write(sessionId, MANIFEST_FILE, JSON.stringify(manifest, null, 2));
  }

  async writeAnalysis(sessionId: string, analysis: LegalAnalysis): Promise<string> {
    return this.write(sessionId, ANALYSIS_FILE, encodeAnalysisArtifact(analysis));
  }

  /** Null when the session has no stored analysis yet. */
  async readAnalysis(sessionId: string): Promise<LegalAnalysis | null> {
    const file = path.join(this.sessionDir(sessionId), ANALYSIS_FILE);

    let text: string;
    try {
      text = await fs.readFile(file, 'utf-8');
    } catch (e) {
      if (isNotFound(e)) return null;
      throw e;
    }
    return decodeAnalysisArtifact(text);
  }

  async removeSession(sessionId: string): Promise<void> {
    await fs.rm(this.sessionDir(sessionId), { recursive: true, force: true });
  }

  private async write(sessionId: string, fileName: string, body: string): Promise<string> {
    const dir = this.sessionDir(sessionId);
    await fs.mkdir(dir, { recursive: true });

    const file = path.join(dir, fileName);
    await fs.writeFile(file, body, 'utf-8');
    this.logger.debug(`wrote ${file} (${body.length} chars)`);
    return file;
  }

  private sessionDir(sessionId: string): string {
    if (!SAFE_SEGMENT.test(sessionId)) {
      throw new Error(`Invalid session id for artifact storage: "${sessionId}"`);
    }
    return path.join(this.rootDir, sessionId);
  }
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}
