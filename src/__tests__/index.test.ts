import { DescopeMcp, DescopeProviderClient, InsufficientScopeError } from '../index';
import { createFakeClient, fetchResponse } from './fake-client';

jest.mock('node-fetch', () => jest.fn());
const mockFetch = jest.requireMock<jest.Mock>('node-fetch');

describe('DescopeMcp', () => {
  const discoveryUrl = 'https://api.descope.com/P123/.well-known/openid-configuration';
  const audience = 'https://mcp.example.com';

  beforeEach(() => {
    mockFetch.mockReset();
    jest.spyOn(console, 'log').mockImplementation();
    jest.spyOn(console, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should build a management client from its configuration', () => {
    const mcp = new DescopeMcp({ discoveryUrl, adminCredential: 'test-key', audience });

    expect(mcp.descopeClient).toBeInstanceOf(DescopeProviderClient);
    expect(mcp.config?.audience).toBe(audience);
  });

  it('should validate tokens and enforce scopes with its own audience', async () => {
    const client = createFakeClient({ sub: 'user-123', scopes: ['read', 'write'] });
    const mcp = new DescopeMcp({ discoveryUrl, audience }, client);

    await expect(mcp.validateTokenRequireScopesAndGetUserId('session-token', ['read'])).resolves.toBe('user-123');
    await expect(mcp.validateTokenRequireScopesAndGetUserId('session-token', ['admin']))
      .rejects.toThrow(InsufficientScopeError);
    expect(client.validateSession).toHaveBeenCalledWith('session-token', audience, { signal: undefined });
  });

  it('should enforce scopes on already validated claims', () => {
    const mcp = new DescopeMcp({ discoveryUrl, audience }, createFakeClient());

    expect(() => mcp.requireScopes({ scopes: ['read'] }, ['read'])).not.toThrow();
    expect(() => mcp.requireScopes({ scopes: ['read'] }, ['write'], 'Write access needed')).toThrow('Write access needed');
  });

  it('should fetch connection tokens through its management client', async () => {
    const client = createFakeClient();
    const mcp = new DescopeMcp({ discoveryUrl, audience }, client);

    await expect(mcp.getConnectionToken({ userId: 'user-123', appId: 'github' })).resolves.toBe('user-latest-token');
    await expect(mcp.getTenantConnectionToken({ tenantId: 'tenant-1', appId: 'slack', scopes: ['chat:write'] }))
      .resolves.toBe('tenant-scoped-token');
  });

  it('should use the access token when one is given', async () => {
    mockFetch.mockResolvedValue(fetchResponse({ token: { accessToken: 'outbound-access-token' } }));
    const client = createFakeClient();
    const mcp = new DescopeMcp({ discoveryUrl, audience }, client);

    await expect(mcp.getConnectionToken({ userId: 'user-123', appId: 'github', accessToken: 'mcp-access-token' }))
      .resolves.toBe('outbound-access-token');
    expect(client.fetchToken).not.toHaveBeenCalled();
    expect(mockFetch.mock.calls[0][1].headers.Authorization).toBe('Bearer P123:mcp-access-token');
  });

  it('should create auth checks bound to its client', async () => {
    const client = createFakeClient();
    const mcp = new DescopeMcp({ discoveryUrl, audience }, client);

    await expect(mcp.createAuthCheck()({ token: 'session-token' })).resolves.toBe(true);
  });

  describe('healthCheck', () => {
    it('should report a missing client', async () => {
      const mcp = new DescopeMcp({ discoveryUrl, audience });

      await expect(mcp.healthCheck()).resolves.toEqual({
        provider: discoveryUrl,
        healthy: false,
        error: 'No Descope client configured',
      });
    });

    it('should treat clients without a health check as healthy', async () => {
      const mcp = new DescopeMcp({ discoveryUrl, audience }, createFakeClient());

      await expect(mcp.healthCheck()).resolves.toEqual({ provider: discoveryUrl, healthy: true });
    });

    it('should report the client health check result', async () => {
      const client = createFakeClient();
      const mcp = new DescopeMcp({ discoveryUrl, audience }, { ...client, healthCheck: async () => false });

      await expect(mcp.healthCheck()).resolves.toEqual({ provider: discoveryUrl, healthy: false });
    });
  });
});
