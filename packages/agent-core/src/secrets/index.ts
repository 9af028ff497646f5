export type { SecretResolver, SecretResolutionContext } from './secret-resolver.js';
export { SecretManager } from './secret-manager.js';
export { DirectValueResolver } from './resolvers/direct-value-resolver.js';
export { EnvironmentVariableResolver } from './resolvers/env-var-resolver.js';
