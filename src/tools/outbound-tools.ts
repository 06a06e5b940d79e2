import { OutboundTokenOptions, ProviderConfiguration, TokenResponse } from '../types';
import { AuthContext } from '../context';
import { ErrorResponse, errorMessage } from '../errors';
import { getConnectionToken, getTenantConnectionToken } from '../connections/exchanger';

/**
 * Handlers for the outbound-token tools an MCP server can expose. Each
 * resolves to a JSON string: `{"token": ...}` on success, `{"error": ...}`
 * otherwise, so tool runtimes never see a thrown exception.
 */
export interface OutboundTokenTools {
  fetchUserTokenByScopes(args: {
    appId: string;
    userId: string;
    scopes: string[];
    options?: OutboundTokenOptions;
    tenantId?: string;
  }): Promise<string>;
  fetchUserToken(args: {
    appId: string;
    userId: string;
    tenantId?: string;
    options?: OutboundTokenOptions;
  }): Promise<string>;
  fetchTenantTokenByScopes(args: {
    appId: string;
    tenantId: string;
    scopes: string[];
    options?: OutboundTokenOptions;
    accessToken?: string;
  }): Promise<string>;
  fetchTenantToken(args: {
    appId: string;
    tenantId: string;
    options?: OutboundTokenOptions;
    accessToken?: string;
  }): Promise<string>;
}

export function createOutboundTokenTools(config: ProviderConfiguration, context = AuthContext.from(config)): OutboundTokenTools {
  return {
    fetchUserTokenByScopes: args => respond('user token by scopes', () => getConnectionToken({ ...args, context })),
    fetchUserToken: args => respond('user token', () => getConnectionToken({ ...args, context })),
    fetchTenantTokenByScopes: args => respond('tenant token by scopes', () => getTenantConnectionToken({ ...args, context })),
    fetchTenantToken: args => respond('tenant token', () => getTenantConnectionToken({ ...args, context })),
  };
}

async function respond(label: string, fetchToken: () => Promise<string>): Promise<string> {
  try {
    const response: TokenResponse = { token: await fetchToken() };
    return JSON.stringify(response);
  } catch (error) {
    console.error(`❌ Error fetching ${label}: ${errorMessage(error)}`);
    const response: ErrorResponse = { error: errorMessage(error) };
    return JSON.stringify(response);
  }
}
