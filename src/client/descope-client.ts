import fetch from 'node-fetch';
import { createRemoteJWKSet, jwtVerify } from 'jose';
import { ProviderClient, RequestControl } from './base';
import { ConnectionSubject, OutboundTokenOptions, TokenValidationResult } from '../types';
import { requestOutboundToken } from '../connections/outbound-api';
import { asValidationResult } from '../session/claims';
import { ValidationFailedError, errorMessage } from '../errors';
import {
  DEFAULT_BASE_URL,
  DEFAULT_EXCHANGE_TIMEOUT_MS,
  DEFAULT_VALIDATION_TIMEOUT_MS,
} from '../config/provider-config';

export interface DescopeClientOptions {
  projectId: string;
  managementKey: string;
  baseUrl?: string;
  /** Defaults to the project's well-known document under `baseUrl`. */
  discoveryUrl?: string;
  validationTimeoutMs?: number;
  exchangeTimeoutMs?: number;
  algorithms?: string[];
}

type JwksResolver = ReturnType<typeof createRemoteJWKSet>;

interface DiscoveryDocument {
  jwksUri: string;
  issuer?: string;
}

interface SessionVerifier {
  jwks: JwksResolver;
  issuer?: string;
}

export class DescopeProviderClient implements ProviderClient {
  readonly projectId: string;
  private readonly managementKey: string;
  private readonly baseUrl: string;
  private readonly discoveryUrl: string;
  private readonly validationTimeoutMs: number;
  private readonly exchangeTimeoutMs: number;
  private readonly algorithms: string[];
  private verifier?: Promise<SessionVerifier>;

  constructor(options: DescopeClientOptions) {
    this.projectId = options.projectId;
    this.managementKey = options.managementKey;
    this.baseUrl = (options.baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.discoveryUrl = options.discoveryUrl || `${this.baseUrl}/${this.projectId}/.well-known/openid-configuration`;
    this.validationTimeoutMs = options.validationTimeoutMs ?? DEFAULT_VALIDATION_TIMEOUT_MS;
    this.exchangeTimeoutMs = options.exchangeTimeoutMs ?? DEFAULT_EXCHANGE_TIMEOUT_MS;
    this.algorithms = options.algorithms || ['RS256'];
  }

  getDiscoveryUrl(): string {
    return this.discoveryUrl;
  }

  async validateSession(
    sessionToken: string,
    audience: string,
    control?: RequestControl
  ): Promise<TokenValidationResult> {
    const { jwks, issuer } = await this.getVerifier(control);

    try {
      const { payload } = await jwtVerify(sessionToken, jwks, {
        audience,
        issuer,
        algorithms: this.algorithms,
        clockTolerance: '30s',
      });
      return asValidationResult(payload);
    } catch (error) {
      throw describeJoseError(error, audience);
    }
  }

  async fetchTokenByScopes(
    appId: string,
    userId: string,
    scopes: string[],
    options?: OutboundTokenOptions,
    tenantId?: string,
    control?: RequestControl
  ): Promise<string> {
    return this.requestToken(appId, { kind: 'user', userId, tenantId }, scopes, options, control);
  }

  async fetchToken(
    appId: string,
    userId: string,
    tenantId?: string,
    options?: OutboundTokenOptions,
    control?: RequestControl
  ): Promise<string> {
    return this.requestToken(appId, { kind: 'user', userId, tenantId }, undefined, options, control);
  }

  async fetchTenantTokenByScopes(
    appId: string,
    tenantId: string,
    scopes: string[],
    options?: OutboundTokenOptions,
    control?: RequestControl
  ): Promise<string> {
    return this.requestToken(appId, { kind: 'tenant', tenantId }, scopes, options, control);
  }

  async fetchTenantToken(
    appId: string,
    tenantId: string,
    options?: OutboundTokenOptions,
    control?: RequestControl
  ): Promise<string> {
    return this.requestToken(appId, { kind: 'tenant', tenantId }, undefined, options, control);
  }

  async healthCheck(): Promise<boolean> {
    try {
      const { jwksUri } = await this.fetchDiscovery();
      const response = await fetch(jwksUri, { timeout: this.validationTimeoutMs });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
      }
      const jwks: unknown = await response.json();
      return typeof jwks === 'object' && jwks !== null && 'keys' in jwks
        && Array.isArray(jwks.keys) && jwks.keys.length > 0;
    } catch (error) {
      console.warn(`JWKS health check failed for ${this.discoveryUrl}: ${error}`);
      return false;
    }
  }

  private requestToken(
    appId: string,
    subject: ConnectionSubject,
    scopes: string[] | undefined,
    options: OutboundTokenOptions | undefined,
    control: RequestControl | undefined
  ): Promise<string> {
    return requestOutboundToken({
      baseUrl: this.baseUrl,
      projectId: this.projectId,
      credential: this.managementKey,
      appId,
      subject,
      scopes,
      options,
      timeoutMs: this.exchangeTimeoutMs,
      signal: control?.signal,
    });
  }

  /** Discovery and key-set setup, cached per client. Failures surface as retryable ValidationFailedError. */
  private getVerifier(control?: RequestControl): Promise<SessionVerifier> {
    if (!this.verifier) {
      this.verifier = this.fetchDiscovery(control)
        .then(({ jwksUri, issuer }) => ({
          jwks: createRemoteJWKSet(new URL(jwksUri), { timeoutDuration: this.validationTimeoutMs }),
          issuer,
        }))
        .catch((error: unknown) => {
          // Let the next validation retry discovery.
          this.verifier = undefined;
          throw new ValidationFailedError(`Discovery failed for ${this.discoveryUrl}: ${errorMessage(error)}`, {
            cause: error,
            retryable: true,
          });
        });
    }
    return this.verifier;
  }

  private async fetchDiscovery(control?: RequestControl): Promise<DiscoveryDocument> {
    const response = await fetch(this.discoveryUrl, {
      timeout: this.validationTimeoutMs,
      signal: control?.signal,
    });
    if (!response.ok) {
      throw new Error(`Discovery request failed: ${response.status} ${response.statusText}`);
    }

    const document: unknown = await response.json();
    if (typeof document !== 'object' || document === null || !('jwks_uri' in document)
      || typeof document.jwks_uri !== 'string') {
      throw new Error(`Discovery document at ${this.discoveryUrl} has no jwks_uri`);
    }

    const issuer = 'issuer' in document && typeof document.issuer === 'string' && document.issuer
      ? document.issuer
      : undefined;
    return { jwksUri: document.jwks_uri, issuer };
  }
}

/**
 * Phrase jose failures the way the provider reports session errors, so
 * callers can tell a bad token from an operational failure.
 */
export function describeJoseError(error: unknown, audience: string): Error {
  if (typeof error !== 'object' || error === null || !('code' in error) || typeof error.code !== 'string') {
    return error instanceof Error ? error : new Error(String(error));
  }

  const message = error instanceof Error ? error.message : String(error.code);
  switch (error.code) {
    case 'ERR_JWT_EXPIRED':
      return new Error('Session token expired');
    case 'ERR_JWT_CLAIM_VALIDATION_FAILED':
      if ('claim' in error && error.claim === 'aud') {
        return new Error(`Token audience mismatch: expected ${audience}`);
      }
      return new Error(`Invalid session token: ${message}`);
    case 'ERR_JWKS_TIMEOUT':
      return new Error('JWKS request timed out');
    case 'ERR_JWT_INVALID':
    case 'ERR_JWS_INVALID':
    case 'ERR_JWS_SIGNATURE_VERIFICATION_FAILED':
    case 'ERR_JWKS_NO_MATCHING_KEY':
    case 'ERR_JWKS_MULTIPLE_MATCHING_KEYS':
    case 'ERR_JOSE_ALG_NOT_ALLOWED':
      return new Error(`Invalid session token: ${message}`);
    default:
      return error instanceof Error ? error : new Error(message);
  }
}
