export interface ProviderConfigurationInput {
  discoveryUrl: string;
  adminCredential?: string;
  audience?: string;
  baseUrl?: string;
  validationTimeoutMs?: number;
  exchangeTimeoutMs?: number;
  projectIdPrefix?: string;
}

export interface ProviderConfiguration {
  readonly discoveryUrl: string;
  readonly adminCredential?: string;
  readonly audience: string;
  readonly audienceDefaulted: boolean;
  readonly baseUrl: string;
  readonly validationTimeoutMs: number;
  readonly exchangeTimeoutMs: number;
  readonly projectIdPrefix: string;
}

export interface NestedUserClaims {
  userId?: string;
  id?: string;
  sub?: string;
  [claim: string]: unknown;
}

/**
 * Claims returned by session validation. The recognized keys are typed;
 * anything else the provider adds is kept under the index signature.
 */
export interface TokenValidationResult {
  sub?: string;
  userId?: string;
  user_id?: string;
  tenant?: string;
  tenantId?: string;
  tenant_id?: string;
  scopes?: string[] | string;
  aud?: string | string[];
  iss?: string;
  exp?: number;
  iat?: number;
  user?: NestedUserClaims;
  [claim: string]: unknown;
}

export interface NormalizedClaims {
  userId?: string;
  tenantId?: string;
  scopes: string[];
  audience: string[];
  issuer?: string;
  expiresAt?: number;
  issuedAt?: number;
  extra: Record<string, unknown>;
}

export type OutboundTokenOptions = Record<string, unknown>;

export type ConnectionSubject =
  | { kind: 'user'; userId: string; tenantId?: string }
  | { kind: 'tenant'; tenantId: string };

export interface ConnectionToken {
  accessToken: string;
  appId: string;
  userId?: string;
  tenantId?: string;
}

export interface TokenResponse {
  token: string;
  expires_at?: number;
  scopes?: string[];
  metadata?: Record<string, unknown>;
}
