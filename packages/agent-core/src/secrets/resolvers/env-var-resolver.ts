import { ConfigError } from '../../errors.js';
import { SecretResolver, SecretResolutionContext } from '../secret-resolver.js';

/**
 * Resolves env://VARIABLE_NAME from the environment in the resolution context.
 */
export class EnvironmentVariableResolver implements SecretResolver {
  private static readonly PREFIX = 'env://';

  canResolve(reference: string): boolean {
    return reference.startsWith(EnvironmentVariableResolver.PREFIX);
  }

  async resolve(reference: string, context: SecretResolutionContext): Promise<string> {
    const variableName = reference.substring(EnvironmentVariableResolver.PREFIX.length).trim();
    if (variableName.length === 0) {
      throw new ConfigError(`Environment variable name is empty in reference: ${reference}`);
    }

    const value = context.env[variableName];
    if (value === undefined) {
      context.logger.warn(`Environment variable '${variableName}' not found`);
      throw new ConfigError(`Environment variable '${variableName}' not found`);
    }
    return value;
  }

  getDisplayName(): string {
    return 'Environment Variable';
  }
}
