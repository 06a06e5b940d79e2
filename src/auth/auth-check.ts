import { ProviderClient } from '../client/base';
import { AuthContext, defaultContext } from '../context';
import { ConfigurationError, errorMessage } from '../errors';
import { validateTokenAndGetUserId } from '../session';

/** Access token as tool frameworks hand it to auth callbacks. */
export interface ToolAccessToken {
  token: string;
  scopes?: string[] | string;
}

export interface ToolAuthContext {
  token?: string | ToolAccessToken | null;
}

export type AuthCheck = (ctx: ToolAuthContext) => Promise<boolean>;

export interface AuthCheckOptions {
  client?: ProviderClient | null;
  context?: AuthContext;
}

/**
 * Build an auth predicate for tool registration. An empty scope list
 * requires authentication only; otherwise every required scope must be
 * granted to the presented token.
 */
export function createAuthCheck(requiredScopes: string[] = [], options: AuthCheckOptions = {}): AuthCheck {
  const context = options.context ?? defaultContext;
  const client = options.client ?? context.getClient();
  if (!client) {
    throw new ConfigurationError(
      'No Descope client available. Either initialize the Descope MCP context first or pass a client.'
    );
  }

  return async (ctx: ToolAuthContext): Promise<boolean> => {
    const token = ctx.token;
    if (!token) {
      return false;
    }
    const tokenString = typeof token === 'string' ? token : token.token;

    try {
      await validateTokenAndGetUserId(tokenString, { client, context });

      if (requiredScopes.length === 0) {
        return true;
      }

      const granted = new Set(grantedScopes(token));
      return requiredScopes.every(scope => granted.has(scope));
    } catch (error) {
      console.error(`❌ Auth check failed: ${errorMessage(error)}`);
      return false;
    }
  };
}

function grantedScopes(token: string | ToolAccessToken): string[] {
  if (typeof token === 'string' || token.scopes === undefined) {
    return [];
  }
  return typeof token.scopes === 'string'
    ? token.scopes.split(/\s+/).filter(scope => scope.length > 0)
    : token.scopes;
}
