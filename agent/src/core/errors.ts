/**
 * Named errors the companion raises across module boundaries.
 */

/** A required configuration file or key is missing and could not be self-healed. */
export class ConfigError extends Error {
  constructor(message: string, readonly path?: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** A main pipe was requested while another main pipe is still in flight. */
export class MainPipeBusyError extends Error {
  constructor(readonly requested: string, readonly inFlight: string) {
    super(`Main pipe "${inFlight}" is still running; refusing "${requested}"`);
    this.name = "MainPipeBusyError";
  }
}

/** The remote generation API answered with a non-2xx status. */
export class LLMApiError extends Error {
  constructor(readonly provider: string, readonly status: number, detail: string) {
    super(`${provider} API error: ${status} ${detail}`.trim());
    this.name = "LLMApiError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
