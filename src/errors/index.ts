/**
 * Error types raised by the broker.
 *
 * Lower layers throw the specific kinds below; tool-call boundaries can turn
 * any of them into a machine-readable result with {@link toErrorResponse}.
 */

export enum DescopeMcpErrorCode {
  CONFIGURATION = 'configuration_error',
  TOKEN_INVALID = 'invalid_token',
  VALIDATION_FAILED = 'validation_failed',
  INSUFFICIENT_SCOPE = 'insufficient_scope',
  IDENTITY_NOT_FOUND = 'identity_not_found',
  CONNECTION_TOKEN = 'connection_token_error',
}

export interface DescopeMcpErrorOptions {
  cause?: unknown;
  retryable?: boolean;
  details?: Record<string, unknown>;
}

export class DescopeMcpError extends Error {
  readonly code: DescopeMcpErrorCode;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: DescopeMcpErrorCode, options: DescopeMcpErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'DescopeMcpError';
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.details = options.details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Required setup (client, audience, project id) is missing. */
export class ConfigurationError extends DescopeMcpError {
  constructor(message: string, options?: DescopeMcpErrorOptions) {
    super(message, DescopeMcpErrorCode.CONFIGURATION, options);
    this.name = 'ConfigurationError';
  }
}

/** Signature, expiry or audience check failed; the caller should re-authenticate. */
export class TokenInvalidError extends DescopeMcpError {
  constructor(message: string, options?: DescopeMcpErrorOptions) {
    super(message, DescopeMcpErrorCode.TOKEN_INVALID, options);
    this.name = 'TokenInvalidError';
  }
}

export class ValidationFailedError extends DescopeMcpError {
  constructor(message: string, options?: DescopeMcpErrorOptions) {
    super(message, DescopeMcpErrorCode.VALIDATION_FAILED, options);
    this.name = 'ValidationFailedError';
  }
}

/** The token is valid but carries no recognizable user id. */
export class IdentityNotFoundError extends DescopeMcpError {
  constructor(message = 'User ID not found in token validation result') {
    super(message, DescopeMcpErrorCode.IDENTITY_NOT_FOUND);
    this.name = 'IdentityNotFoundError';
  }
}

export class ConnectionTokenError extends DescopeMcpError {
  constructor(message: string, options?: DescopeMcpErrorOptions) {
    super(message, DescopeMcpErrorCode.CONNECTION_TOKEN, options);
    this.name = 'ConnectionTokenError';
  }
}

/**
 * RFC 6750 insufficient_scope payload, extended with the scope lists so the
 * calling agent can re-request exactly what it lacks.
 */
export interface InsufficientScopeDenial {
  error: 'insufficient_scope';
  scope: string;
  error_description: string;
  missing_scopes: string[];
  token_scopes: string[];
  required_scopes: string[];
}

export class InsufficientScopeError extends DescopeMcpError {
  readonly requiredScopes: string[];
  readonly tokenScopes: string[];
  readonly missingScopes: string[];
  readonly combinedScopes: string[];
  readonly errorDescription: string;

  constructor(denial: InsufficientScopeDenial) {
    super(denial.error_description, DescopeMcpErrorCode.INSUFFICIENT_SCOPE);
    this.name = 'InsufficientScopeError';
    this.requiredScopes = denial.required_scopes;
    this.tokenScopes = denial.token_scopes;
    this.missingScopes = denial.missing_scopes;
    this.combinedScopes = denial.scope ? denial.scope.split(' ') : [];
    this.errorDescription = denial.error_description;
  }

  /** Space-separated scope parameter (existing + required). */
  get scopeParameter(): string {
    return this.combinedScopes.join(' ');
  }

  toDict(): InsufficientScopeDenial {
    return {
      error: 'insufficient_scope',
      scope: this.scopeParameter,
      error_description: this.errorDescription,
      missing_scopes: [...this.missingScopes],
      token_scopes: [...this.tokenScopes],
      required_scopes: [...this.requiredScopes],
    };
  }

  toJSON(): InsufficientScopeDenial {
    return this.toDict();
  }
}

export interface ErrorResponse {
  error: string;
  code?: string;
  details?: Record<string, unknown>;
}

/** Message of any thrown value, including errors created in another realm. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Render any thrown value as a tool result. Scope denials keep their
 * standard payload; everything else becomes `{ error, code, details }`.
 */
export function toErrorResponse(error: unknown): InsufficientScopeDenial | ErrorResponse {
  if (error instanceof InsufficientScopeError) {
    return error.toDict();
  }
  if (error instanceof ValidationFailedError) {
    // Provider internals stay in the logs.
    return { error: 'Token validation failed', code: error.code };
  }
  if (error instanceof DescopeMcpError) {
    const response: ErrorResponse = { error: error.message, code: error.code };
    if (error.details) {
      response.details = error.details;
    }
    return response;
  }
  return { error: errorMessage(error) };
}
