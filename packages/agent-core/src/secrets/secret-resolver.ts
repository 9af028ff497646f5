import { Logger } from '../types/common.js';

export interface SecretResolutionContext {
  logger: Logger;
  // Environment the env:// references are looked up in
  env: NodeJS.ProcessEnv;
}

/**
 * Turns a configuration value that may be a secret reference into the actual value.
 */
export interface SecretResolver {
  canResolve(reference: string): boolean;
  resolve(reference: string, context: SecretResolutionContext): Promise<string>;
  getDisplayName(): string;
}
