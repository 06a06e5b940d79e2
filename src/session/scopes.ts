import { TokenValidationResult } from '../types';
import { InsufficientScopeDenial, InsufficientScopeError } from '../errors';
import { extractScopes } from './claims';

export type ScopeDecision =
  | { authorized: true }
  | { authorized: false; denial: InsufficientScopeDenial };

/**
 * Build the insufficient_scope payload. The advertised `scope` is the
 * sorted union of held and required scopes, so a client that re-requests it
 * keeps what it already has.
 */
export function buildScopeDenial(
  requiredScopes: string[],
  tokenScopes: string[],
  errorDescription?: string
): InsufficientScopeDenial {
  const held = new Set(tokenScopes);
  const missing = unique(requiredScopes).filter(scope => !held.has(scope));
  const combined = unique([...tokenScopes, ...requiredScopes]).sort();

  return {
    error: 'insufficient_scope',
    scope: combined.join(' '),
    error_description: errorDescription || `Token missing required scopes: ${missing.join(', ')}`,
    missing_scopes: missing,
    token_scopes: [...tokenScopes],
    required_scopes: [...requiredScopes],
  };
}

/** An empty requirement list means "authenticated only" and always passes. */
export function checkScopes(
  claims: TokenValidationResult,
  requiredScopes: string[],
  errorDescription?: string
): ScopeDecision {
  if (requiredScopes.length === 0) {
    return { authorized: true };
  }

  const tokenScopes = extractScopes(claims);
  const held = new Set(tokenScopes);
  if (requiredScopes.every(scope => held.has(scope))) {
    return { authorized: true };
  }

  return { authorized: false, denial: buildScopeDenial(requiredScopes, tokenScopes, errorDescription) };
}

export function requireScopes(
  claims: TokenValidationResult,
  requiredScopes: string[],
  errorDescription?: string
): void {
  const decision = checkScopes(claims, requiredScopes, errorDescription);
  if (!decision.authorized) {
    throw new InsufficientScopeError(decision.denial);
  }
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
