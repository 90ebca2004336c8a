/**
 * Error taxonomy for BIPRWS calls. Every failure surfaced by the services
 * is one of these.
 */
export class BiprwsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Logon rejected, or the token was refused (401/403). */
export class AuthError extends BiprwsError {}

/** Network failure or timeout before any response arrived. */
export class TransportError extends BiprwsError {}

/** Report, folder or data provider does not exist (404). */
export class NotFoundError extends BiprwsError {}

/** A response lacked the fields the caller reads, or could not be parsed. */
export class ParseError extends BiprwsError {}

export class ConfigurationError extends BiprwsError {}

/** Any other non-2xx response. */
export class BiprwsApiError extends BiprwsError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`BIPRWS request failed with status ${status}: ${body}`);
    this.status = status;
    this.body = body;
  }
}

/**
 * Errors after which no further call on the same token can succeed.
 */
export function isFatalError(error: unknown): boolean {
  return error instanceof AuthError || error instanceof TransportError;
}
