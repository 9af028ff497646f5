import { createMcpClient } from '../mcp/client-factory.js';
import { ProviderFactory } from '../providers/provider-factory.js';
import { SecretManager } from '../secrets/secret-manager.js';
import { Logger } from '../types/common.js';
import { AgentConfig } from '../types/settings.js';
import { SessionController } from './session-controller.js';

/**
 * Builds a session from a validated configuration: resolves the provider's credentials, creates
 * the model client and connects the configured tool servers.
 */
export async function createSession(config: AgentConfig, logger: Logger): Promise<SessionController> {
  const secrets = new SecretManager(logger);
  const model = await new ProviderFactory(secrets, logger).create(config.settings, config.providers);
  const session = new SessionController({
    settings: config.settings,
    model,
    logger,
    serverFactory: (name, serverConfig) => createMcpClient(name, serverConfig, logger),
  });
  await session.connectServers(config.mcpServers);
  return session;
}
