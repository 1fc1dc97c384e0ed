// src/advisor/analysis-artifact.codec.ts
import { JURISDICTIONS, Jurisdiction } from '../search/search.types';
import { AnalysisArtifactError, errorMessage } from '../shared/errors';
import { validatePlain } from '../shared/lib/validation/validate-plain';
import { JurisdictionAnalysis, LegalAnalysis } from '../synthesis/synthesis.types';
import {
  ANALYSIS_ARTIFACT_KIND,
  ANALYSIS_ARTIFACT_VERSION,
  AnalysisArtifactDto,
} from './dto/analysis-artifact.dto';

export function encodeAnalysisArtifact(analysis: LegalAnalysis): string {
  return JSON.stringify(
    {
      kind: ANALYSIS_ARTIFACT_KIND,
      version: ANALYSIS_ARTIFACT_VERSION,
      analysis: {
        summary: analysis.summary,
        key_points: analysis.key_points,
        jurisdiction_analysis: analysis.jurisdiction_analysis,
        compliance_steps: analysis.compliance_steps,
        overlapping_regulations: analysis.overlapping_regulations,
        sources: analysis.sources,
        response_time: analysis.response_time,
      },
    },
    null,
    2,
  );
}

function isJurisdiction(key: string): key is Jurisdiction {
  return JURISDICTIONS.some((j) => j === key);
}

/**
 * Strict inverse of {@link encodeAnalysisArtifact}: unknown or missing
 * fields, wrong types and foreign versions all raise AnalysisArtifactError.
 */
export function decodeAnalysisArtifact(text: string): LegalAnalysis {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new AnalysisArtifactError(`Stored analysis is not valid JSON: ${errorMessage(e)}`, {
      cause: e,
    });
  }

  const outcome = validatePlain(AnalysisArtifactDto, parsed, {
    whitelist: true,
    forbidNonWhitelisted: true,
  });
  if (!outcome.ok) {
    throw new AnalysisArtifactError(`Stored analysis rejected: ${outcome.problems.join('; ')}`);
  }

  const { analysis } = outcome.value;

  const jurisdictionAnalysis: JurisdictionAnalysis = {};
  for (const [key, value] of Object.entries(analysis.jurisdiction_analysis)) {
    if (!isJurisdiction(key) || typeof value !== 'string') {
      throw new AnalysisArtifactError(
        `Stored analysis rejected: invalid jurisdiction_analysis entry "${key}"`,
      );
    }
    jurisdictionAnalysis[key] = value;
  }

  return {
    summary: analysis.summary,
    key_points: analysis.key_points,
    jurisdiction_analysis: jurisdictionAnalysis,
    compliance_steps: analysis.compliance_steps,
    overlapping_regulations: analysis.overlapping_regulations,
    sources: analysis.sources,
    response_time: analysis.response_time,
  };
}
