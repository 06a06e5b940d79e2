import {
  OutboundTokenOptions,
  ProviderConfiguration,
  ProviderConfigurationInput,
  TokenValidationResult,
} from './types';
import { FetchSignal, ProviderClient } from './client/base';
import { AuthContext } from './context';
import { errorMessage } from './errors';
import { AuthCheck, createAuthCheck } from './auth/auth-check';
import {
  requireScopes,
  validateToken,
  validateTokenAndGetUserId,
  validateTokenRequireScopesAndGetUserId,
} from './session';
import { getConnectionToken, getTenantConnectionToken } from './connections/exchanger';

export {
  ProviderConfiguration,
  ProviderConfigurationInput,
  TokenValidationResult,
  NestedUserClaims,
  NormalizedClaims,
  ConnectionSubject,
  ConnectionToken,
  OutboundTokenOptions,
  TokenResponse,
} from './types';
export * from './errors';
export { ProviderClient, RequestControl, FetchSignal } from './client/base';
export { DescopeProviderClient, DescopeClientOptions } from './client/descope-client';
export { extractProjectId, resolveClient, getProviderClient } from './client/resolver';
export { createConfiguration, ProviderConfigLoader, EnvSource } from './config/provider-config';
export { AuthContext, defaultContext, getDefaultContext, initDescopeMcp, resetDescopeMcp } from './context';
export * from './session';
export {
  exchangeConnectionToken,
  getConnectionToken,
  getTenantConnectionToken,
  selectStrategy,
  ExchangeStrategy,
  ExchangeRequest,
  UserConnectionTokenRequest,
  TenantConnectionTokenRequest,
} from './connections/exchanger';
export { outboundTokenUrl, outboundTokenPayload, bearerCredential } from './connections/outbound-api';
export { createAuthCheck, AuthCheck, AuthCheckOptions, ToolAuthContext, ToolAccessToken } from './auth/auth-check';
export { createOutboundTokenTools, OutboundTokenTools } from './tools/outbound-tools';

export interface ConnectionTokenArgs {
  userId: string;
  appId: string;
  scopes?: string[];
  tenantId?: string;
  options?: OutboundTokenOptions;
  /** MCP server access token; when absent the instance's management client is used. */
  accessToken?: string;
  signal?: FetchSignal;
}

export interface TenantConnectionTokenArgs {
  tenantId: string;
  appId: string;
  scopes?: string[];
  options?: OutboundTokenOptions;
  accessToken?: string;
  signal?: FetchSignal;
}

/**
 * Class-based entry point bound to its own configuration and client, for
 * servers that prefer not to rely on the process-wide context.
 *
 * ```ts
 * const mcp = new DescopeMcp({
 *   discoveryUrl: 'https://api.descope.com/P123/.well-known/openid-configuration',
 *   adminCredential: process.env.DESCOPE_MANAGEMENT_KEY,
 *   audience: 'https://mcp.example.com',
 * });
 * const userId = await mcp.validateTokenRequireScopesAndGetUserId(token, ['calendar.read']);
 * ```
 */
export class DescopeMcp {
  private readonly context: AuthContext;

  constructor(input: ProviderConfigurationInput | ProviderConfiguration, client?: ProviderClient | null) {
    this.context = AuthContext.from(input, client);
  }

  get descopeClient(): ProviderClient | null {
    return this.context.getClient();
  }

  get config(): ProviderConfiguration | null {
    return this.context.getConfig();
  }

  getContext(): AuthContext {
    return this.context;
  }

  validateToken(accessToken: string, audience?: string): Promise<TokenValidationResult> {
    return validateToken(accessToken, { context: this.context, audience });
  }

  validateTokenAndGetUserId(accessToken: string, audience?: string): Promise<string> {
    return validateTokenAndGetUserId(accessToken, { context: this.context, audience });
  }

  validateTokenRequireScopesAndGetUserId(
    accessToken: string,
    requiredScopes: string[],
    audience?: string,
    errorDescription?: string
  ): Promise<string> {
    return validateTokenRequireScopesAndGetUserId(accessToken, requiredScopes, {
      context: this.context,
      audience,
      errorDescription,
    });
  }

  requireScopes(claims: TokenValidationResult, requiredScopes: string[], errorDescription?: string): void {
    requireScopes(claims, requiredScopes, errorDescription);
  }

  getConnectionToken(args: ConnectionTokenArgs): Promise<string> {
    return getConnectionToken({ ...args, context: this.context });
  }

  getTenantConnectionToken(args: TenantConnectionTokenArgs): Promise<string> {
    return getTenantConnectionToken({ ...args, context: this.context });
  }

  createAuthCheck(requiredScopes: string[] = []): AuthCheck {
    return createAuthCheck(requiredScopes, { context: this.context });
  }

  async healthCheck(): Promise<{ provider: string; healthy: boolean; error?: string }> {
    const provider = this.context.getConfig()?.discoveryUrl ?? 'unknown';
    const client = this.context.getClient();
    if (!client) {
      return { provider, healthy: false, error: 'No Descope client configured' };
    }
    if (!client.healthCheck) {
      return { provider, healthy: true };
    }
    try {
      return { provider, healthy: await client.healthCheck() };
    } catch (error) {
      return { provider, healthy: false, error: errorMessage(error) };
    }
  }
}
