import { ConnectionSubject, ConnectionToken, OutboundTokenOptions } from '../types';
import { FetchSignal, ProviderClient } from '../client/base';
import { DescopeProviderClient } from '../client/descope-client';
import { extractProjectId } from '../client/resolver';
import { AuthContext, defaultContext } from '../context';
import { ConfigurationError, ConnectionTokenError, errorMessage } from '../errors';
import {
  DEFAULT_BASE_URL,
  DEFAULT_EXCHANGE_TIMEOUT_MS,
} from '../config/provider-config';
import { hasScopes, requestOutboundToken } from './outbound-api';

export interface ExchangeAuthOptions {
  /** MCP server access token of the caller; preferred, enables policy enforcement. */
  accessToken?: string;
  client?: ProviderClient | null;
  projectId?: string;
  managementKey?: string;
  context?: AuthContext;
  signal?: FetchSignal;
}

export interface ExchangeRequest extends ExchangeAuthOptions {
  appId: string;
  scopes?: string[];
  options?: OutboundTokenOptions;
}

export interface UserConnectionTokenRequest extends ExchangeRequest {
  userId: string;
  tenantId?: string;
}

export interface TenantConnectionTokenRequest extends ExchangeRequest {
  tenantId: string;
}

export type ExchangeStrategy = 'access-token' | 'explicit-client' | 'context-client';

/**
 * First applicable strategy wins: the caller's access token, then an
 * explicit client (or project id + management key), then the context's
 * client. There is no fallback when the chosen strategy fails.
 */
export function selectStrategy(request: ExchangeAuthOptions): ExchangeStrategy {
  if (request.accessToken) {
    return 'access-token';
  }
  if (request.client || (request.projectId && request.managementKey)) {
    return 'explicit-client';
  }
  return 'context-client';
}

export async function exchangeConnectionToken(
  subject: ConnectionSubject,
  request: ExchangeRequest
): Promise<ConnectionToken> {
  try {
    const strategy = selectStrategy(request);
    console.log(`🔄 Fetching ${subject.kind} connection token for app "${request.appId}" via ${strategy}`);

    const accessToken = strategy === 'access-token' && request.accessToken
      ? await exchangeWithAccessToken(subject, request, request.accessToken)
      : await exchangeWithClient(subject, request, resolveExchangeClient(request, strategy));

    console.log(`✅ Connection token issued for app "${request.appId}"`);
    return {
      accessToken,
      appId: request.appId,
      userId: subject.kind === 'user' ? subject.userId : undefined,
      tenantId: subject.tenantId,
    };
  } catch (error) {
    console.error(`❌ Connection token request for app "${request.appId}" failed: ${errorMessage(error)}`);
    throw new ConnectionTokenError(`Failed to get connection token: ${errorMessage(error)}`, {
      cause: error,
      retryable: isTimeout(error),
    });
  }
}

/** OAuth access token for an outbound application on behalf of a user. */
export async function getConnectionToken(request: UserConnectionTokenRequest): Promise<string> {
  const token = await exchangeConnectionToken(
    { kind: 'user', userId: request.userId, tenantId: request.tenantId },
    request
  );
  return token.accessToken;
}

/** OAuth access token for an outbound application on behalf of a tenant. */
export async function getTenantConnectionToken(request: TenantConnectionTokenRequest): Promise<string> {
  const token = await exchangeConnectionToken({ kind: 'tenant', tenantId: request.tenantId }, request);
  return token.accessToken;
}

async function exchangeWithAccessToken(
  subject: ConnectionSubject,
  request: ExchangeRequest,
  accessToken: string
): Promise<string> {
  const context = request.context ?? defaultContext;
  const config = context.getConfig();

  const projectId = request.projectId || (config ? extractProjectId(config.discoveryUrl) : null);
  if (!projectId) {
    throw new ConfigurationError(
      'projectId is required when using accessToken. Either provide projectId or initialize the context with a discovery URL that contains it.'
    );
  }

  return requestOutboundToken({
    baseUrl: config?.baseUrl ?? DEFAULT_BASE_URL,
    projectId,
    credential: accessToken,
    appId: request.appId,
    subject,
    scopes: request.scopes,
    options: request.options,
    timeoutMs: config?.exchangeTimeoutMs ?? DEFAULT_EXCHANGE_TIMEOUT_MS,
    signal: request.signal,
  });
}

function resolveExchangeClient(request: ExchangeRequest, strategy: ExchangeStrategy): ProviderClient {
  if (strategy === 'explicit-client') {
    if (request.client) {
      return request.client;
    }
    if (request.projectId && request.managementKey) {
      const config = (request.context ?? defaultContext).getConfig();
      return new DescopeProviderClient({
        projectId: request.projectId,
        managementKey: request.managementKey,
        baseUrl: config?.baseUrl,
        validationTimeoutMs: config?.validationTimeoutMs,
        exchangeTimeoutMs: config?.exchangeTimeoutMs,
      });
    }
  }

  const client = (request.context ?? defaultContext).getClient();
  if (!client) {
    throw new ConfigurationError(
      'No authentication method available. Provide accessToken (recommended), initialize the context with a management key, pass a client, or provide projectId and managementKey.'
    );
  }
  return client;
}

function exchangeWithClient(
  subject: ConnectionSubject,
  request: ExchangeRequest,
  client: ProviderClient
): Promise<string> {
  const options = request.options || {};
  const control = { signal: request.signal };

  if (subject.kind === 'user') {
    return hasScopes(request.scopes)
      ? client.fetchTokenByScopes(request.appId, subject.userId, request.scopes, options, subject.tenantId, control)
      : client.fetchToken(request.appId, subject.userId, subject.tenantId, options, control);
  }
  return hasScopes(request.scopes)
    ? client.fetchTenantTokenByScopes(request.appId, subject.tenantId, request.scopes, options, control)
    : client.fetchTenantToken(request.appId, subject.tenantId, options, control);
}

function isTimeout(error: unknown): boolean {
  return typeof error === 'object' && error !== null
    && 'type' in error && error.type === 'request-timeout';
}
