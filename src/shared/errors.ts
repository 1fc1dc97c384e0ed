// src/shared/errors.ts

/**
 * Base class for every failure the advisor pipeline raises on purpose.
 * Anything else reaching the HTTP layer is an unexpected crash.
 */
export abstract class AdvisorError extends Error {
  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Search provider call failed (network, timeout, non-2xx, malformed payload).
 * Recovered per scoped query by the search orchestrator.
 */
export class ProviderError extends AdvisorError {
  constructor(
    message: string,
    readonly query: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super(message, options);
    this.status = options?.status;
  }

  readonly status?: number;
}

/**
 * Model output could not be cleaned into the expected JSON document.
 * Carries both texts so prompt/schema drift can be debugged from the logs.
 */
export class ModelOutputParseError extends AdvisorError {
  constructor(
    message: string,
    readonly raw: string,
    readonly cleaned: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class SynthesisParseError extends ModelOutputParseError {}

export class ContextExtractionParseError extends ModelOutputParseError {}

/** The generative model call itself failed (auth, quota, 5xx, empty choice). */
export class ModelInvocationError extends AdvisorError {
  constructor(
    message: string,
    readonly kind: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The model call was aborted by the caller's signal or the synthesis deadline. */
export class SynthesisAbortedError extends AdvisorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A stored analysis artifact failed strict decoding. */
export class AnalysisArtifactError extends AdvisorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Required configuration is missing or invalid. Fatal at process start. */
export class ConfigurationError extends AdvisorError {
  constructor(
    message: string,
    readonly keys: string[],
  ) {
    super(message);
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
