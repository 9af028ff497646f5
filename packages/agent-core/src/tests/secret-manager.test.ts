import { ConfigError } from '../errors';
import { SecretManager } from '../secrets/secret-manager';
import { silentLogger } from '../types/common';

describe('SecretManager', () => {
  const manager = new SecretManager(silentLogger, { TEST_API_KEY: 'test-secret', EMPTY_VALUE: '' });

  it('should return direct values unchanged', async () => {
    expect(await manager.resolveSecret('plain-value')).toBe('plain-value');
    expect(await manager.resolveSecret('https://example.invalid/v1')).toBe('https://example.invalid/v1');
  });

  it('should resolve env:// references from the environment', async () => {
    expect(await manager.resolveSecret('env://TEST_API_KEY')).toBe('test-secret');
    expect(await manager.resolveSecret('env://EMPTY_VALUE')).toBe('');
  });

  it('should reject a reference to a missing variable or an empty name', async () => {
    await expect(manager.resolveSecret('env://MISSING_KEY')).rejects.toThrow("Environment variable 'MISSING_KEY' not found");
    await expect(manager.resolveSecret('env://')).rejects.toThrow('Environment variable name is empty in reference: env://');
  });

  it('should resolve every value of a provider configuration', async () => {
    expect(await manager.resolveProviderConfig({ ANTHROPIC_API_KEY: 'env://TEST_API_KEY', ANTHROPIC_BASE_URL: 'http://localhost:9999' }))
      .toEqual({ ANTHROPIC_API_KEY: 'test-secret', ANTHROPIC_BASE_URL: 'http://localhost:9999' });
  });

  it('should name the failing key without revealing values', async () => {
    const attempt = manager.resolveProviderConfig({ ANTHROPIC_API_KEY: 'env://MISSING_KEY' });
    await expect(attempt).rejects.toThrow(ConfigError);
    await expect(manager.resolveProviderConfig({ ANTHROPIC_API_KEY: 'env://MISSING_KEY' }))
      .rejects.toThrow("Failed to resolve secret for key 'ANTHROPIC_API_KEY': Environment variable 'MISSING_KEY' not found");
  });

  it('should list its resolvers', () => {
    expect(manager.getAvailableResolvers()).toEqual(['Environment Variable', 'Direct Value']);
  });
});
