import { NestedUserClaims, NormalizedClaims, TokenValidationResult } from '../types';
import { IdentityNotFoundError } from '../errors';

// Alias spellings differ between provider versions; resolve them only here.
const USER_ID_CLAIMS = ['sub', 'userId', 'user_id'] as const;
const NESTED_USER_ID_CLAIMS = ['userId', 'id', 'sub'] as const;
const NESTED_USER_ID_SET = new Set<string>(NESTED_USER_ID_CLAIMS);
const TENANT_ID_CLAIMS = ['tenant', 'tenantId', 'tenant_id'] as const;

const STRING_CLAIMS = ['sub', 'userId', 'user_id', 'tenant', 'tenantId', 'tenant_id', 'iss'] as const;
const NUMBER_CLAIMS = ['exp', 'iat'] as const;

const RECOGNIZED_CLAIMS = new Set<string>([...STRING_CLAIMS, ...NUMBER_CLAIMS, 'scopes', 'aud', 'user']);

/**
 * Type the recognized claims of a verified payload. Claims whose value has
 * an unexpected shape are left out; every other claim passes through.
 */
export function asValidationResult(payload: Record<string, unknown>): TokenValidationResult {
  const result: TokenValidationResult = {};

  for (const [name, value] of Object.entries(payload)) {
    if (!RECOGNIZED_CLAIMS.has(name)) {
      result[name] = value;
    }
  }
  for (const name of STRING_CLAIMS) {
    const value = payload[name];
    if (typeof value === 'string') {
      result[name] = value;
    }
  }
  for (const name of NUMBER_CLAIMS) {
    const value = payload[name];
    if (typeof value === 'number') {
      result[name] = value;
    }
  }

  const scopes = payload.scopes;
  if (typeof scopes === 'string' || isStringArray(scopes)) {
    result.scopes = scopes;
  }
  const aud = payload.aud;
  if (typeof aud === 'string' || isStringArray(aud)) {
    result.aud = aud;
  }
  const user = payload.user;
  if (isRecord(user)) {
    result.user = asNestedUser(user);
  }

  return result;
}

export function extractUserId(claims: TokenValidationResult): string {
  const userId = firstNonEmpty(claims, USER_ID_CLAIMS)
    ?? (claims.user ? firstNonEmpty(claims.user, NESTED_USER_ID_CLAIMS) : undefined);

  if (!userId) {
    throw new IdentityNotFoundError();
  }
  return userId;
}

export function extractTenantId(claims: TokenValidationResult): string | undefined {
  return firstNonEmpty(claims, TENANT_ID_CLAIMS);
}

/** Scopes held by the token; a space-delimited string is split. */
export function extractScopes(claims: TokenValidationResult): string[] {
  const scopes = claims.scopes;
  if (typeof scopes === 'string') {
    return scopes.split(/\s+/).filter(scope => scope.length > 0);
  }
  return Array.isArray(scopes) ? [...scopes] : [];
}

export function normalizeClaims(claims: TokenValidationResult): NormalizedClaims {
  const extra: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(claims)) {
    if (!RECOGNIZED_CLAIMS.has(name)) {
      extra[name] = value;
    }
  }

  let userId: string | undefined;
  try {
    userId = extractUserId(claims);
  } catch (error) {
    if (!(error instanceof IdentityNotFoundError)) {
      throw error;
    }
  }

  return {
    userId,
    tenantId: extractTenantId(claims),
    scopes: extractScopes(claims),
    audience: claims.aud === undefined ? [] : Array.isArray(claims.aud) ? [...claims.aud] : [claims.aud],
    issuer: claims.iss,
    expiresAt: claims.exp,
    issuedAt: claims.iat,
    extra,
  };
}

function asNestedUser(user: Record<string, unknown>): NestedUserClaims {
  const nested: NestedUserClaims = {};
  for (const [name, value] of Object.entries(user)) {
    if (!NESTED_USER_ID_SET.has(name)) {
      nested[name] = value;
    }
  }
  for (const name of NESTED_USER_ID_CLAIMS) {
    const value = user[name];
    if (typeof value === 'string') {
      nested[name] = value;
    }
  }
  return nested;
}

function firstNonEmpty(
  source: TokenValidationResult | NestedUserClaims,
  names: readonly string[]
): string | undefined {
  for (const name of names) {
    const value = source[name];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
