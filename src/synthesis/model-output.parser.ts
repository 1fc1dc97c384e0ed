// src/synthesis/model-output.parser.ts
import { JURISDICTIONS, Jurisdiction } from '../search/search.types';
import { ModelOutputParseError, SynthesisParseError, errorMessage } from '../shared/errors';
import { validatePlain } from '../shared/lib/validation/validate-plain';
import { AnalysisPayloadDto } from './dto/analysis-payload.dto';
import { AnalysisPayload, JurisdictionAnalysis } from './synthesis.types';

const FENCE = /```[ \t]*(?:json)?[ \t]*\r?\n?([\s\S]*?)```/i;

/**
 * Strips markdown code fences and surrounding prose from a model reply,
 * leaving the outermost JSON object when one can be found.
 */
export function cleanModelOutput(raw: string): string {
  let text = raw.trim();

  const fenced = FENCE.exec(text);
  if (fenced) text = fenced[1].trim();

  if (!text.startsWith('{') || !text.endsWith('}')) {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start !== -1 && end > start) text = text.slice(start, end + 1);
  }

  return text;
}

type ParseErrorFactory = (
  message: string,
  raw: string,
  cleaned: string,
  cause?: unknown,
) => ModelOutputParseError;

/** Cleans then JSON-decodes a model reply; the factory decides the error type. */
export function decodeModelJson(
  raw: string,
  makeError: ParseErrorFactory,
): { value: unknown; cleaned: string } {
  const cleaned = cleanModelOutput(raw);
  try {
    return { value: JSON.parse(cleaned), cleaned };
  } catch (e) {
    throw makeError(`Model reply is not valid JSON: ${errorMessage(e)}`, raw, cleaned, e);
  }
}

function canonicalJurisdiction(key: string): Jurisdiction | undefined {
  const wanted = key.trim().toLowerCase();
  return JURISDICTIONS.find((j) => j.toLowerCase() === wanted);
}

function normaliseJurisdictionAnalysis(
  input: Record<string, unknown>,
): { value: JurisdictionAnalysis; problems: string[] } {
  const value: JurisdictionAnalysis = {};
  const problems: string[] = [];

  for (const [key, text] of Object.entries(input)) {
    const jurisdiction = canonicalJurisdiction(key);
    if (!jurisdiction) {
      problems.push(`jurisdiction_analysis: unexpected key "${key}"`);
      continue;
    }
    if (typeof text !== 'string') {
      problems.push(`jurisdiction_analysis.${key}: must be a string`);
      continue;
    }
    value[jurisdiction] = text;
  }

  return { value, problems };
}

const synthesisError: ParseErrorFactory = (message, raw, cleaned, cause) =>
  new SynthesisParseError(message, raw, cleaned, { cause });

/**
 * Decodes and validates the synthesis reply. Extra top-level keys are
 * ignored; missing or mistyped fields raise {@link SynthesisParseError}.
 */
export function parseAnalysisPayload(raw: string): AnalysisPayload {
  const { value, cleaned } = decodeModelJson(raw, synthesisError);

  const outcome = validatePlain(AnalysisPayloadDto, value);
  if (!outcome.ok) {
    throw synthesisError(
      `Model reply does not match the analysis shape: ${outcome.problems.join('; ')}`,
      raw,
      cleaned,
    );
  }

  const dto = outcome.value;
  const jurisdictions = normaliseJurisdictionAnalysis(dto.jurisdiction_analysis);
  if (jurisdictions.problems.length) {
    throw synthesisError(
      `Model reply does not match the analysis shape: ${jurisdictions.problems.join('; ')}`,
      raw,
      cleaned,
    );
  }

  return {
    summary: dto.summary,
    key_points: [...dto.key_points],
    jurisdiction_analysis: jurisdictions.value,
    compliance_steps: [...dto.compliance_steps],
    overlapping_regulations: [...dto.overlapping_regulations],
  };
}
