import { ConfigError } from '../errors.js';
import { SecretManager } from '../secrets/secret-manager.js';
import { Logger } from '../types/common.js';
import { AgentSettings, ProviderConfig } from '../types/settings.js';
import { ClaudeConfigSchema, ClaudeModelClient } from './claude-provider.js';
import { ScriptedModelClient } from './test-provider.js';
import { ModelClient } from './types.js';

/**
 * Builds the model client named by the settings. Provider configuration comes from the config
 * file's `providers` section; secret references in it are resolved here, and never logged.
 */
export class ProviderFactory {
  constructor(
    private secrets: SecretManager,
    private logger: Logger,
  ) {}

  async create(settings: AgentSettings, providers: Record<string, ProviderConfig>): Promise<ModelClient> {
    this.logger.info(`ProviderFactory creating ${settings.provider} model ${settings.model}`);

    switch (settings.provider) {
      case 'claude': {
        const parsed = ClaudeConfigSchema.safeParse(providers.claude ?? {});
        if (!parsed.success) {
          throw new ConfigError(`Invalid claude provider configuration: ${parsed.error.message}`);
        }
        const resolved = await this.secrets.resolveProviderConfig(
          Object.fromEntries(Object.entries(parsed.data).filter((entry): entry is [string, string] => entry[1] !== undefined)),
        );
        if (!resolved.ANTHROPIC_API_KEY) {
          throw new ConfigError('ANTHROPIC_API_KEY is missing or could not be resolved');
        }
        return new ClaudeModelClient(
          { modelName: settings.model, maxOutputTokens: settings.maxOutputTokens, temperature: settings.temperature },
          { apiKey: resolved.ANTHROPIC_API_KEY, baseURL: resolved.ANTHROPIC_BASE_URL },
          this.logger,
        );
      }
      case 'test':
        return new ScriptedModelClient();
    }
  }
}
