import { TokenValidationResult } from '../types';
import { FetchSignal, ProviderClient } from '../client/base';
import { AuthContext, defaultContext } from '../context';
import {
  ConfigurationError,
  DescopeMcpError,
  TokenInvalidError,
  ValidationFailedError,
  errorMessage,
} from '../errors';

export interface ValidateTokenOptions {
  /** Falls back to the context's client. */
  client?: ProviderClient | null;
  /** Falls back to the context's MCP server URL. */
  audience?: string | null;
  context?: AuthContext;
  /** Cancels provider discovery when it has not completed yet. */
  signal?: FetchSignal;
}

// Provider messages are matched as text; there are no structured codes to rely on.
const CALLER_CORRECTABLE_MARKERS = ['invalid', 'expired', 'audience'];

/**
 * Validate an MCP server access token with the provider and return its
 * claims as reported. Signature, expiry and audience are checked by the
 * provider client; the audience is always passed explicitly.
 */
export async function validateToken(
  accessToken: string,
  options: ValidateTokenOptions = {}
): Promise<TokenValidationResult> {
  const context = options.context ?? defaultContext;

  const client = options.client ?? context.getClient();
  if (!client) {
    throw new ConfigurationError(
      'No Descope client available. Either initialize the Descope MCP context first or pass a client.'
    );
  }

  const audience = options.audience ?? context.getAudience();
  if (!audience) {
    throw new ConfigurationError(
      'MCP server URL (audience) is required for token validation. Initialize the context with an audience to validate tokens.'
    );
  }

  if (!accessToken) {
    throw new TokenInvalidError('Token validation failed: access token is empty');
  }

  try {
    return await client.validateSession(accessToken, audience, { signal: options.signal });
  } catch (error) {
    throw classifyValidationError(error);
  }
}

export function classifyValidationError(error: unknown): DescopeMcpError {
  if (error instanceof DescopeMcpError) {
    return error;
  }

  const message = errorMessage(error);
  const lowered = message.toLowerCase();
  if (CALLER_CORRECTABLE_MARKERS.some(marker => lowered.includes(marker))) {
    return new TokenInvalidError(`Token validation failed: ${message}`, { cause: error });
  }

  console.error(`❌ Token validation failed unexpectedly: ${message}`);
  return new ValidationFailedError(`Token validation failed: ${message}`, { cause: error, retryable: true });
}
