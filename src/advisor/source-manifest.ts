import { LegalSourceRecord } from '../search/search.types';

export const MANIFEST_KEYS = ['Federal Laws', 'State Laws', 'Local Laws'] as const;

export type ManifestKey = (typeof MANIFEST_KEYS)[number];

/** Ordered records per jurisdiction, as written to identified_sources.json. */
export type SourceManifest = Record<ManifestKey, LegalSourceRecord[]>;

export function buildSourceManifest(
  federal: readonly LegalSourceRecord[],
  state: readonly LegalSourceRecord[],
  local: readonly LegalSourceRecord[],
): SourceManifest {
  const plain = (records: readonly LegalSourceRecord[]) => records.map((r) => ({ ...r }));

  return {
    'Federal Laws': plain(federal),
    'State Laws': plain(state),
    'Local Laws': plain(local),
  };
}
