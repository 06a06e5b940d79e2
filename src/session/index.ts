import { validateToken, ValidateTokenOptions } from './validator';
import { requireScopes } from './scopes';
import { extractUserId } from './claims';

export { validateToken, classifyValidationError, ValidateTokenOptions } from './validator';
export { checkScopes, requireScopes, buildScopeDenial, ScopeDecision } from './scopes';
export {
  asValidationResult,
  extractScopes,
  extractTenantId,
  extractUserId,
  normalizeClaims,
} from './claims';

export interface ScopedValidationOptions extends ValidateTokenOptions {
  errorDescription?: string;
}

export async function validateTokenAndGetUserId(
  accessToken: string,
  options: ValidateTokenOptions = {}
): Promise<string> {
  const claims = await validateToken(accessToken, options);
  return extractUserId(claims);
}

/**
 * Validate, authorize, then identify. The order matters: a token that
 * fails validation never reaches scope or identity checks.
 *
 * @throws InsufficientScopeError when the token lacks a required scope
 * @throws IdentityNotFoundError when the token carries no user id
 */
export async function validateTokenRequireScopesAndGetUserId(
  accessToken: string,
  requiredScopes: string[],
  options: ScopedValidationOptions = {}
): Promise<string> {
  const claims = await validateToken(accessToken, options);
  requireScopes(claims, requiredScopes, options.errorDescription);
  return extractUserId(claims);
}
