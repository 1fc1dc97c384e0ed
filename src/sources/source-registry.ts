// src/sources/source-registry.ts
/**
 * Host suffixes accepted as "official". Each carries its leading dot so the
 * match lands on a label boundary: `irs.gov` passes, `evil-gov.com` does not.
 */
const TRUSTED_SUFFIXES: readonly string[] = ['.gov', '.org'];

/** Federal regulators searched one by one for the Federal jurisdiction. */
const FEDERAL_DOMAINS: readonly string[] = [
  'irs.gov',
  'osha.gov',
  'epa.gov',
  'dol.gov',
  'msha.gov',
  'eeoc.gov',
  'hhs.gov',
  'sba.gov',
  'ecfr.gov',
  'govinfo.gov',
];

export const LAW_CATEGORIES = [
  'Business Formation and Governance',
  'Taxation',
  'Employment and Labor',
  'Health and Safety',
  'Environmental Protection',
  'Intellectual Property',
  'Consumer Protection and Marketing',
  'Privacy and Data Protection',
  'Antitrust and Competition',
  'Licensing, Permits and Zoning',
  'Immigration and Workforce Eligibility',
  'Financial and Securities',
  'International Trade and Imports/Exports',
  'Industry-Specific Regulations',
  'OTHER',
] as const;

function normalizeHost(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return null;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return null;

  return parsed.hostname.toLowerCase().replace(/\.$/, '');
}

export function isTrustedDomain(url: string): boolean {
  const host = normalizeHost(url);
  if (!host) return false;
  return TRUSTED_SUFFIXES.some((suffix) => host.endsWith(suffix));
}

export function federalDomains(): string[] {
  return [...FEDERAL_DOMAINS];
}

export function lawCategories(): string[] {
  return [...LAW_CATEGORIES];
}
