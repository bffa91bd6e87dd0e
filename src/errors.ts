export type ScraperErrorCode =
  | "CONFIGURATION"
  | "INVALID_ARGUMENT"
  | "TRANSPORT"
  | "NON_SUCCESS_STATUS"
  | "UNSUPPORTED_CONTENT_TYPE"
  | "DATA_CORRUPTION"
  | "PERSISTENCE";

export class ScraperError extends Error {
  constructor(readonly code: ScraperErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or malformed process configuration. Fatal before any network call. */
export class ConfigurationError extends ScraperError {
  constructor(readonly problems: string[]) {
    super("CONFIGURATION", `Invalid configuration: ${problems.join("; ")}`);
  }
}

export class InvalidArgumentError extends ScraperError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
  }
}

export class TransportError extends ScraperError {
  constructor(readonly url: string, cause: unknown) {
    super("TRANSPORT", `Request to ${url} failed: ${describeError(cause)}`, { cause });
  }
}

export class NonSuccessStatusError extends ScraperError {
  constructor(readonly url: string, readonly status: number) {
    super("NON_SUCCESS_STATUS", `Request to ${url} returned HTTP ${status}`);
  }
}

export class UnsupportedContentTypeError extends ScraperError {
  constructor(readonly url: string, readonly contentType: string) {
    super("UNSUPPORTED_CONTENT_TYPE", `Response from ${url} is not HTML (${contentType || "no content-type"})`);
  }
}

export class DataCorruptionError extends ScraperError {
  constructor(readonly path: string, reason: string) {
    super("DATA_CORRUPTION", `Unreadable data in ${path}: ${reason}`);
  }
}

export class PersistenceError extends ScraperError {
  constructor(readonly path: string, cause: unknown) {
    super("PERSISTENCE", `Could not write ${path}: ${describeError(cause)}`, { cause });
  }
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
