import { Jurisdiction } from '../search/search.types';

export type BusinessContext = Readonly<{
  city: string;
  state: string;
  business_type: string;
  area_of_law: string;
  statute_of_law?: string;
}>;

export type JurisdictionAnalysis = Partial<Record<Jurisdiction, string>>;

/** The five fields the model is asked to produce. */
export interface AnalysisPayload {
  summary: string;
  key_points: string[];
  jurisdiction_analysis: JurisdictionAnalysis;
  compliance_steps: string[];
  overlapping_regulations: string[];
}

export interface LegalAnalysis extends AnalysisPayload {
  /** Federal URLs, then State, then Local, exactly as fed to the model. */
  sources: string[];
  /** Seconds from the model call to a decoded payload. */
  response_time: number;
}

export interface SynthesisOptions {
  signal?: AbortSignal;
}
