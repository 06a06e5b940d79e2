import { ProviderConfiguration } from '../types';
import { ConfigurationError } from '../errors';
import { ProviderClient } from './base';
import { DescopeProviderClient } from './descope-client';

/**
 * Project id embedded in a discovery URL, e.g. `P123` in
 * `https://api.descope.com/P123/.well-known/openid-configuration`.
 * With a prefix, the first segment carrying it (and something after it)
 * wins; without one, the first path segment does.
 */
export function extractProjectId(url: string, prefix?: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return null;
  }

  const segments = pathname.split('/').filter(segment => segment.length > 0);
  if (!prefix) {
    return segments[0] ?? null;
  }
  return segments.find(segment => segment.startsWith(prefix) && segment.length > prefix.length) ?? null;
}

/**
 * A management-key client for the configuration, or null when the
 * configuration carries no management key or no recognizable project id.
 * Callers then rely on per-call access tokens.
 */
export function resolveClient(config: ProviderConfiguration): ProviderClient | null {
  if (!config.adminCredential) {
    return null;
  }

  const projectId = extractProjectId(config.discoveryUrl, config.projectIdPrefix);
  if (!projectId) {
    console.warn(`⚠️  Could not find a project id in ${config.discoveryUrl}; no management client created`);
    return null;
  }

  return new DescopeProviderClient({
    projectId,
    managementKey: config.adminCredential,
    baseUrl: config.baseUrl,
    discoveryUrl: config.discoveryUrl,
    validationTimeoutMs: config.validationTimeoutMs,
    exchangeTimeoutMs: config.exchangeTimeoutMs,
  });
}

export function getProviderClient(config: ProviderConfiguration): ProviderClient {
  const client = resolveClient(config);
  if (!client) {
    throw new ConfigurationError(
      'Descope management key is required. Provide adminCredential in the configuration to use token validation and outbound app tokens.'
    );
  }
  return client;
}
