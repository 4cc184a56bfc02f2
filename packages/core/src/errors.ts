/**
 * Error taxonomy
 *
 * FetchError is transient and retried by the source loops. RenderError and
 * ReconnectExhaustedError are the only errors allowed to end the process.
 */

/** A single fetch attempt failed (network, HTTP status, malformed or empty body) */
export class FetchError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`${source}: ${message}`, options);
    this.name = "FetchError";
    this.source = source;
  }
}

/** Station configuration could not be read or validated */
export class ConfigLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigLoadError";
  }
}

/** Rendering or writing a frame failed */
export class RenderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RenderError";
  }
}

/** Network reconnection gave up after too many failed attempts */
export class ReconnectExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number) {
    super(`Reconnection failed after ${attempts} attempts`);
    this.name = "ReconnectExhaustedError";
    this.attempts = attempts;
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
