// src/advisor/context-extractor.service.ts
import { Injectable, Logger } from '@nestjs/common';

import { AiService } from '../ai/ai.service';
import { ContextExtractionParseError } from '../shared/errors';
import { decodeModelJson } from '../synthesis/model-output.parser';

export const CONTEXT_FIELDS = [
  'city',
  'state',
  'business_type',
  'area_of_law',
  'statute_of_law',
] as const;

export type ContextField = (typeof CONTEXT_FIELDS)[number];
export type RequiredContextField = Exclude<ContextField, 'statute_of_law'>;

export type ExtractedContext = Partial<Record<ContextField, string>>;

export interface ContextExtraction {
  context: ExtractedContext;
  /** Required fields the text did not mention. */
  missing: RequiredContextField[];
}

const REQUIRED: readonly RequiredContextField[] = [
  'city',
  'state',
  'business_type',
  'area_of_law',
];

// models spell "not mentioned" in a handful of ways
const ABSENT = new Set(['', 'none', 'null', 'n/a', 'unknown']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function buildContextPrompt(input: string): string {
  return `
Extract the business context from the text below.

Text: ${JSON.stringify(input)}

Fields:
- city: US city
- state: US state
- business_type: the kind of business or role (e.g. Restaurant Owner, Landlord, Property Manager)
- area_of_law: the legal area (e.g. Employment, Taxation, Environmental)
- statute_of_law: a specific statute or agency if one is named (e.g. OSHA, EPA, IRS)

Respond with a single JSON object using exactly these keys. Use "None" for anything the text does not mention:
{"city": "...", "state": "...", "business_type": "...", "area_of_law": "...", "statute_of_law": "..."}
`.trim();
}

@Injectable()
export class ContextExtractor {
  private readonly logger = new Logger(ContextExtractor.name);

  constructor(private readonly ai: AiService) {}

  async extract(input: string, options: { signal?: AbortSignal } = {}): Promise<ContextExtraction> {
    const { text } = await this.ai.complete({
      kind: 'extractBusinessContext',
      prompt: buildContextPrompt(input),
      temperature: 0,
      signal: options.signal,
    });

    const { value, cleaned } = decodeModelJson(
      text,
      (message, raw, clean, cause) =>
        new ContextExtractionParseError(message, raw, clean, { cause }),
    );
    if (!isRecord(value)) {
      throw new ContextExtractionParseError('Model reply is not a JSON object', text, cleaned);
    }

    const context: ExtractedContext = {};
    for (const field of CONTEXT_FIELDS) {
      const v = value[field];
      if (typeof v !== 'string') continue;
      const trimmed = v.trim();
      if (ABSENT.has(trimmed.toLowerCase())) continue;
      context[field] = trimmed;
    }

    const missing = REQUIRED.filter((f) => context[f] === undefined);
    if (missing.length) {
      this.logger.debug(`extract(): missing ${missing.join(', ')}`);
    }

    return { context, missing };
  }
}
