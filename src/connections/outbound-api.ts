import fetch from 'node-fetch';
import { ConnectionSubject, OutboundTokenOptions } from '../types';
import { FetchSignal } from '../client/base';

export const OUTBOUND_TOKEN_PATHS = {
  user: '/v1/mgmt/outbound/app/user/token',
  tenant: '/v1/mgmt/outbound/app/tenant/token',
} as const;

export interface OutboundTokenRequest {
  baseUrl: string;
  projectId: string;
  /** Caller's access token or the management key. */
  credential: string;
  appId: string;
  subject: ConnectionSubject;
  scopes?: string[];
  options?: OutboundTokenOptions;
  timeoutMs: number;
  signal?: FetchSignal;
}

/**
 * Scoped endpoint when scopes were requested, otherwise the "latest"
 * endpoint that returns the most recent token for the subject.
 */
export function outboundTokenUrl(baseUrl: string, subject: ConnectionSubject, scopes?: string[]): string {
  const path = OUTBOUND_TOKEN_PATHS[subject.kind];
  return hasScopes(scopes) ? `${baseUrl}${path}` : `${baseUrl}${path}/latest`;
}

export function outboundTokenPayload(
  appId: string,
  subject: ConnectionSubject,
  scopes?: string[],
  options?: OutboundTokenOptions
): Record<string, unknown> {
  const payload: Record<string, unknown> = { appId };

  if (subject.kind === 'user') {
    payload.userId = subject.userId;
  } else {
    payload.tenantId = subject.tenantId;
  }
  if (hasScopes(scopes)) {
    payload.scopes = scopes;
  }
  payload.options = options || {};

  if (subject.kind === 'user' && subject.tenantId) {
    payload.tenantId = subject.tenantId;
  }
  return payload;
}

export function bearerCredential(projectId: string, credential: string): string {
  return `Bearer ${projectId}:${credential}`;
}

export function hasScopes(scopes?: string[]): scopes is string[] {
  return Array.isArray(scopes) && scopes.length > 0;
}

export async function requestOutboundToken(request: OutboundTokenRequest): Promise<string> {
  const url = outboundTokenUrl(request.baseUrl, request.subject, request.scopes);
  const payload = outboundTokenPayload(request.appId, request.subject, request.scopes, request.options);

  const response = await fetch(url, {
    method: 'POST',
    headers: {
      'Authorization': bearerCredential(request.projectId, request.credential),
      'Content-Type': 'application/json',
    },
    body: JSON.stringify(payload),
    timeout: request.timeoutMs,
    signal: request.signal,
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new Error(`Outbound token request failed: ${response.status} ${errorText || response.statusText}`);
  }

  const body: unknown = await response.json();
  const accessToken = readAccessToken(body);
  if (!accessToken) {
    throw new Error('No token.accessToken in outbound token response');
  }
  return accessToken;
}

function readAccessToken(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('token' in body)) {
    return undefined;
  }
  const token = body.token;
  if (typeof token !== 'object' || token === null || !('accessToken' in token)) {
    return undefined;
  }
  return typeof token.accessToken === 'string' && token.accessToken ? token.accessToken : undefined;
}
