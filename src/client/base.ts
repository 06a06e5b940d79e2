import type { RequestInit } from 'node-fetch';
import { OutboundTokenOptions, TokenValidationResult } from '../types';

export interface RequestControl {
  /** Propagates the caller's cancellation into the outbound request. */
  signal?: FetchSignal;
}

export type FetchSignal = RequestInit['signal'];

/**
 * The identity-provider operations the broker depends on. Session
 * validation is where cryptographic trust is established; the outbound
 * application calls mint downstream tokens with the management key.
 */
export interface ProviderClient {
  readonly projectId: string;

  validateSession(sessionToken: string, audience: string, control?: RequestControl): Promise<TokenValidationResult>;

  fetchTokenByScopes(
    appId: string,
    userId: string,
    scopes: string[],
    options?: OutboundTokenOptions,
    tenantId?: string,
    control?: RequestControl
  ): Promise<string>;

  fetchToken(
    appId: string,
    userId: string,
    tenantId?: string,
    options?: OutboundTokenOptions,
    control?: RequestControl
  ): Promise<string>;

  fetchTenantTokenByScopes(
    appId: string,
    tenantId: string,
    scopes: string[],
    options?: OutboundTokenOptions,
    control?: RequestControl
  ): Promise<string>;

  fetchTenantToken(
    appId: string,
    tenantId: string,
    options?: OutboundTokenOptions,
    control?: RequestControl
  ): Promise<string>;

  healthCheck?(): Promise<boolean>;
}
