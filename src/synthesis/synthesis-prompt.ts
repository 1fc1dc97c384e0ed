// src/synthesis/synthesis-prompt.ts
import { LegalSourceRecord } from '../search/search.types';
import { BusinessContext } from './synthesis.types';

const NO_SOURCES = 'No sources were found for this jurisdiction.';

export function formatSources(records: readonly LegalSourceRecord[]): string {
  if (!records.length) return NO_SOURCES;

  return records
    .map(
      (r) =>
        `Source: ${r.url}\n` +
        `Title: ${r.title}\n` +
        `Content Summary: ${r.content ?? r.description}`,
    )
    .join('\n\n');
}

const OUTPUT_FORMAT = `{
  "summary": "A comprehensive summary of the applicable laws",
  "key_points": ["Key point to remember about the laws", "..."],
  "jurisdiction_analysis": {
    "Federal": "Analysis of the federal requirements",
    "State": "Analysis of the state requirements",
    "Local": "Analysis of the local requirements"
  },
  "compliance_steps": ["Concrete step for compliance", "..."],
  "overlapping_regulations": ["Regulation that overlaps across jurisdictions", "..."]
}`;

export function buildSynthesisPrompt(
  context: BusinessContext,
  blocks: { federal: string; state: string; local: string },
): string {
  const statute = context.statute_of_law?.trim();
  const statuteLine = statute ? `\n- Specific Statute: ${statute}` : '';

  return `
You are a legal research assistant helping businesses understand the laws and regulations that apply to them.

Business Context:
- Type: ${context.business_type}
- Location: ${context.city}, ${context.state}
- Area of Law: ${context.area_of_law}${statuteLine}

Available Legal Information:

Federal Laws:
${blocks.federal}

State Laws:
${blocks.state}

Local Laws:
${blocks.local}

Based only on the information above, analyze the legal requirements and provide:
1. A comprehensive summary
2. Key points to remember
3. An analysis for each jurisdiction level (Federal, State, Local)
4. Specific steps for compliance
5. Any overlapping regulations between jurisdictions

Respond with a single JSON object and no other text, using exactly these five keys:
${OUTPUT_FORMAT}
`.trim();
}
