export type EngineErrorClass = 'FetchError' | 'DataFormatError' | 'Error';

/** Malformed provider payload. Local to one location; never aborts a cycle. */
export class DataFormatError extends Error {
  readonly provider: string | null;

  constructor(message: string, provider: string | null = null) {
    super(message);
    this.name = 'DataFormatError';
    this.provider = provider;
  }
}

/** Invalid thresholds, cooldown window or location catalog. Fatal at startup. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Network or provider failure after the client's own retries are exhausted. */
export class FetchError extends Error {
  readonly provider: string;
  readonly status: number | null;

  constructor(message: string, { provider, status = null, cause }: { provider: string; status?: number | null; cause?: unknown }) {
    super(message, { cause });
    this.name = 'FetchError';
    this.provider = provider;
    this.status = status;
  }
}

export const classifyEngineError = (error: unknown): EngineErrorClass => {
  if (error instanceof FetchError) return 'FetchError';
  if (error instanceof DataFormatError) return 'DataFormatError';
  return 'Error';
};

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
