import { ProviderConfiguration, ProviderConfigurationInput } from './types';
import { ProviderClient } from './client/base';
import { resolveClient } from './client/resolver';
import { createConfiguration } from './config/provider-config';

/**
 * Configuration, provider client and audience used by the session and
 * connection functions when none are passed explicitly.
 *
 * Instances can be handed around freely. The process-wide
 * {@link defaultContext} is meant for single-tenant servers: initialize it
 * once at startup, before tool traffic starts. Concurrent initialize/reset
 * calls are not guarded, and re-initializing replaces the whole state.
 */
export class AuthContext {
  private config: ProviderConfiguration | null = null;
  private client: ProviderClient | null = null;
  private audience: string | null = null;

  static from(input: ProviderConfigurationInput | ProviderConfiguration, client?: ProviderClient | null): AuthContext {
    const context = new AuthContext();
    context.initialize(input, client);
    return context;
  }

  /**
   * Replace the state from a configuration. A client resolved from the
   * configuration is used unless one is supplied.
   */
  initialize(input: ProviderConfigurationInput | ProviderConfiguration, client?: ProviderClient | null): void {
    const config = isConfiguration(input) ? input : createConfiguration(input);
    this.config = config;
    this.audience = config.audience;
    this.client = client === undefined ? resolveClient(config) : client;
  }

  getConfig(): ProviderConfiguration | null {
    return this.config;
  }

  getClient(): ProviderClient | null {
    return this.client;
  }

  getAudience(): string | null {
    return this.audience;
  }

  isInitialized(): boolean {
    return this.config !== null;
  }

  reset(): void {
    this.config = null;
    this.client = null;
    this.audience = null;
  }
}

export const defaultContext = new AuthContext();

export function getDefaultContext(): AuthContext {
  return defaultContext;
}

/**
 * Initialize the process-wide context. Call once at startup; session and
 * connection functions then work without an explicit client or audience.
 */
export function initDescopeMcp(input: ProviderConfigurationInput): void {
  defaultContext.initialize(input);
  console.log('✅ Descope MCP context initialized');
}

export function resetDescopeMcp(): void {
  defaultContext.reset();
}

function isConfiguration(input: ProviderConfigurationInput | ProviderConfiguration): input is ProviderConfiguration {
  return Object.isFrozen(input) && 'audienceDefaulted' in input;
}
