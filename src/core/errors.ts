/**
 * Base error for everything the downloader raises on purpose.
 */
export class ArchiveError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ArchiveError";
  }
}

/**
 * Login did not produce a usable session. Fatal for the run.
 */
export class AuthError extends ArchiveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthError";
  }
}

/**
 * No station callsign could be detected and none was supplied.
 */
export class CallsignUnresolvedError extends ArchiveError {
  constructor(
    message: string,
    public readonly indexUrl: string | null = null,
    public readonly markup: string | null = null,
  ) {
    super(message);
    this.name = "CallsignUnresolvedError";
  }
}

export class ConfigError extends ArchiveError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * A single request failed: bad status, timeout, or network error.
 */
export class HttpError extends ArchiveError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "HttpError";
  }
}

export type SegmentErrorKind =
  | "PrimingFailed"
  | "EmptyResponse"
  | "HttpError"
  | "DecodeVerificationFailed";
