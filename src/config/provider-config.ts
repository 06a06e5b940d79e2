import * as yaml from 'js-yaml';
import * as fs from 'fs';
import { ProviderConfiguration, ProviderConfigurationInput } from '../types';
import { ConfigurationError, errorMessage } from '../errors';

export const DEFAULT_BASE_URL = 'https://api.descope.com';
export const DEFAULT_VALIDATION_TIMEOUT_MS = 10_000;
export const DEFAULT_EXCHANGE_TIMEOUT_MS = 30_000;
export const DEFAULT_PROJECT_ID_PREFIX = 'P';

/**
 * Build an immutable configuration. The audience falls back to the
 * discovery URL, which is accepted but logged since it is rarely what the
 * tokens are minted for.
 */
export function createConfiguration(input: ProviderConfigurationInput): ProviderConfiguration {
  if (!input.discoveryUrl) {
    throw new ConfigurationError('discoveryUrl is required');
  }

  const audienceDefaulted = !input.audience;
  if (audienceDefaulted) {
    console.warn('⚠️  No MCP server URL provided. Using the discovery URL as audience; set a specific MCP server URL instead.');
  }

  return Object.freeze({
    discoveryUrl: input.discoveryUrl,
    adminCredential: input.adminCredential || undefined,
    audience: input.audience || input.discoveryUrl,
    audienceDefaulted,
    baseUrl: (input.baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, ''),
    validationTimeoutMs: input.validationTimeoutMs ?? DEFAULT_VALIDATION_TIMEOUT_MS,
    exchangeTimeoutMs: input.exchangeTimeoutMs ?? DEFAULT_EXCHANGE_TIMEOUT_MS,
    projectIdPrefix: input.projectIdPrefix ?? DEFAULT_PROJECT_ID_PREFIX,
  });
}

export type EnvSource = Record<string, string | undefined>;

export class ProviderConfigLoader {
  static loadFromFile(configPath: string): ProviderConfiguration {
    try {
      const content = fs.readFileSync(configPath, 'utf8');
      return createConfiguration(this.parse(content));
    } catch (error) {
      throw new ConfigurationError(`Failed to load provider configuration from ${configPath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  static loadFromString(yamlContent: string): ProviderConfiguration {
    try {
      return createConfiguration(this.parse(yamlContent));
    } catch (error) {
      throw new ConfigurationError(`Failed to parse provider configuration: ${errorMessage(error)}`, { cause: error });
    }
  }

  static loadFromEnv(env: EnvSource = process.env): ProviderConfiguration {
    const discoveryUrl = env.DESCOPE_MCP_WELL_KNOWN_URL;
    if (!discoveryUrl) {
      throw new ConfigurationError('DESCOPE_MCP_WELL_KNOWN_URL environment variable is required');
    }

    return createConfiguration({
      discoveryUrl,
      adminCredential: env.DESCOPE_MANAGEMENT_KEY || undefined,
      audience: env.MCP_SERVER_URL || undefined,
      baseUrl: env.DESCOPE_BASE_URL || undefined,
    });
  }

  private static parse(content: string): ProviderConfigurationInput {
    const raw: unknown = yaml.load(content);
    if (!isRecord(raw)) {
      throw new Error('configuration must be a mapping');
    }
    return this.validate(raw);
  }

  private static validate(raw: Record<string, unknown>): ProviderConfigurationInput {
    const discoveryUrl = raw.discoveryUrl;
    if (typeof discoveryUrl !== 'string' || discoveryUrl.trim() === '') {
      throw new Error('missing or invalid "discoveryUrl" field');
    }
    try {
      new URL(discoveryUrl);
    } catch {
      throw new Error(`"discoveryUrl" is not a valid URL: ${discoveryUrl}`);
    }

    return {
      discoveryUrl,
      adminCredential: optionalString(raw, 'adminCredential'),
      audience: optionalString(raw, 'audience'),
      baseUrl: optionalString(raw, 'baseUrl'),
      validationTimeoutMs: optionalPositiveNumber(raw, 'validationTimeoutMs'),
      exchangeTimeoutMs: optionalPositiveNumber(raw, 'exchangeTimeoutMs'),
      projectIdPrefix: optionalString(raw, 'projectIdPrefix'),
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(raw: Record<string, unknown>, field: string): string | undefined {
  const value = raw[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new Error(`"${field}" must be a string`);
  }
  return value;
}

function optionalPositiveNumber(raw: Record<string, unknown>, field: string): number | undefined {
  const value = raw[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || value <= 0) {
    throw new Error(`"${field}" must be a positive number`);
  }
  return value;
}
