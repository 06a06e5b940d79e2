import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ProviderConfigLoader, createConfiguration } from '../config/provider-config';
import { ConfigurationError } from '../errors';

describe('Provider configuration', () => {
  const discoveryUrl = 'https://api.descope.com/P123/.well-known/openid-configuration';

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('createConfiguration', () => {
    it('should apply defaults', () => {
      const config = createConfiguration({ discoveryUrl, audience: 'https://mcp.example.com' });

      expect(config).toEqual({
        discoveryUrl,
        adminCredential: undefined,
        audience: 'https://mcp.example.com',
        audienceDefaulted: false,
        baseUrl: 'https://api.descope.com',
        validationTimeoutMs: 10000,
        exchangeTimeoutMs: 30000,
        projectIdPrefix: 'P',
      });
      expect(Object.isFrozen(config)).toBe(true);
    });

    it('should default the audience to the discovery URL with a warning', () => {
      const consoleSpy = jest.spyOn(console, 'warn').mockImplementation();

      const config = createConfiguration({ discoveryUrl, adminCredential: 'test-key' });

      expect(config.audience).toBe(discoveryUrl);
      expect(config.audienceDefaulted).toBe(true);
      expect(consoleSpy).toHaveBeenCalledWith(
        '⚠️  No MCP server URL provided. Using the discovery URL as audience; set a specific MCP server URL instead.'
      );
    });

    it('should require a discovery URL', () => {
      expect(() => createConfiguration({ discoveryUrl: '' })).toThrow(ConfigurationError);
    });
  });

  describe('loadFromString', () => {
    it('should parse a YAML configuration', () => {
      const config = ProviderConfigLoader.loadFromString(`
discoveryUrl: "${discoveryUrl}"
adminCredential: "test-key"
audience: "https://mcp.example.com"
baseUrl: "https://auth.example.com/"
validationTimeoutMs: 5000
`);

      expect(config.adminCredential).toBe('test-key');
      expect(config.audience).toBe('https://mcp.example.com');
      expect(config.baseUrl).toBe('https://auth.example.com');
      expect(config.validationTimeoutMs).toBe(5000);
      expect(config.exchangeTimeoutMs).toBe(30000);
    });

    it('should reject a missing discovery URL', () => {
      expect(() => ProviderConfigLoader.loadFromString('audience: "https://mcp.example.com"'))
        .toThrow('Failed to parse provider configuration: missing or invalid "discoveryUrl" field');
    });

    it('should reject an invalid discovery URL', () => {
      expect(() => ProviderConfigLoader.loadFromString('discoveryUrl: "not a url"'))
        .toThrow('Failed to parse provider configuration: "discoveryUrl" is not a valid URL: not a url');
    });

    it('should reject fields of the wrong type', () => {
      expect(() => ProviderConfigLoader.loadFromString(`discoveryUrl: "${discoveryUrl}"\naudience: 42`))
        .toThrow('Failed to parse provider configuration: "audience" must be a string');
      expect(() => ProviderConfigLoader.loadFromString(`discoveryUrl: "${discoveryUrl}"\nexchangeTimeoutMs: -1`))
        .toThrow('Failed to parse provider configuration: "exchangeTimeoutMs" must be a positive number');
    });

    it('should reject documents that are not mappings', () => {
      expect(() => ProviderConfigLoader.loadFromString('- one\n- two'))
        .toThrow('Failed to parse provider configuration: configuration must be a mapping');
    });
  });

  describe('loadFromFile', () => {
    it('should load a configuration file', () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'provider-config-'));
      const file = path.join(dir, 'config.yaml');
      fs.writeFileSync(file, `discoveryUrl: "${discoveryUrl}"\naudience: "https://mcp.example.com"\n`);

      try {
        expect(ProviderConfigLoader.loadFromFile(file).audience).toBe('https://mcp.example.com');
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });

    it('should wrap read failures with the path', () => {
      const file = path.join(os.tmpdir(), 'provider-config-missing', 'config.yaml');

      let caught: unknown;
      try {
        ProviderConfigLoader.loadFromFile(file);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigurationError);
      if (caught instanceof ConfigurationError) {
        expect(caught.message).toBe(
          `Failed to load provider configuration from ${file}: ENOENT: no such file or directory, open '${file}'`
        );
        expect(caught.cause).toHaveProperty('code', 'ENOENT');
      }
    });
  });

  describe('loadFromEnv', () => {
    it('should read the environment variables', () => {
      const config = ProviderConfigLoader.loadFromEnv({
        DESCOPE_MCP_WELL_KNOWN_URL: discoveryUrl,
        DESCOPE_MANAGEMENT_KEY: 'test-key',
        MCP_SERVER_URL: 'https://mcp.example.com',
      });

      expect(config.discoveryUrl).toBe(discoveryUrl);
      expect(config.adminCredential).toBe('test-key');
      expect(config.audience).toBe('https://mcp.example.com');
      expect(config.baseUrl).toBe('https://api.descope.com');
    });

    it('should require the discovery URL variable', () => {
      expect(() => ProviderConfigLoader.loadFromEnv({}))
        .toThrow('DESCOPE_MCP_WELL_KNOWN_URL environment variable is required');
    });
  });
});
