export type CompletionKind = 'synthesizeLegalAnalysis' | 'extractBusinessContext';

export interface CompletionRequest {
  kind: CompletionKind;
  prompt: string;
  temperature: number;
  signal?: AbortSignal;
  /** Small metadata stored next to the usage record. */
  extra?: Record<string, unknown>;
}

export interface CompletionResult {
  text: string;
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
}
