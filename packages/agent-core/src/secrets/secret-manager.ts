import { ConfigError, errorMessage } from '../errors.js';
import { Logger } from '../types/common.js';
import { SecretResolver, SecretResolutionContext } from './secret-resolver.js';
import { DirectValueResolver } from './resolvers/direct-value-resolver.js';
import { EnvironmentVariableResolver } from './resolvers/env-var-resolver.js';

/**
 * Resolves provider credentials, which the configuration file may give either directly or as
 * references such as env://ANTHROPIC_API_KEY.
 */
export class SecretManager {
  private resolvers: SecretResolver[];
  private context: SecretResolutionContext;

  constructor(logger: Logger, env: NodeJS.ProcessEnv = process.env) {
    this.context = { logger, env };
    this.resolvers = [
      new EnvironmentVariableResolver(),
      new DirectValueResolver(),
    ];
  }

  async resolveSecret(reference: string): Promise<string> {
    const resolver = this.resolvers.find(candidate => candidate.canResolve(reference));
    if (!resolver) {
      throw new ConfigError(`No resolver found for secret reference: ${reference}`);
    }
    return resolver.resolve(reference, this.context);
  }

  /**
   * Resolves every value of a provider configuration. Failures name the key, never the value.
   */
  async resolveProviderConfig(config: Record<string, string>): Promise<Record<string, string>> {
    const resolved: Record<string, string> = {};
    for (const [key, value] of Object.entries(config)) {
      try {
        resolved[key] = await this.resolveSecret(value);
      } catch (error) {
        this.context.logger.error(`Failed to resolve secret for key '${key}': ${errorMessage(error)}`);
        throw new ConfigError(`Failed to resolve secret for key '${key}': ${errorMessage(error)}`, { cause: error });
      }
    }
    return resolved;
  }

  getAvailableResolvers(): string[] {
    return this.resolvers.map(resolver => resolver.getDisplayName());
  }
}
