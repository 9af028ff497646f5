import { Logger } from '../types/common.js';
import { McpClientSse, McpClientStdio, McpClientStreamableHttp } from './client.js';
import { McpServerConfig, RemoteToolServer } from './types.js';

/**
 * Creates the MCP client for a configured server.
 *
 * A stdio server given an `env` receives exactly that environment, so PATH is carried over from
 * this process when the config leaves it out; otherwise commands like npx are not found.
 */
export function createMcpClient(name: string, config: McpServerConfig, logger: Logger): RemoteToolServer {
  switch (config.type) {
    case 'stdio': {
      let env = config.env;
      if (env && !env.PATH && process.env.PATH) {
        env = { ...env, PATH: process.env.PATH };
      }
      return new McpClientStdio(name, { command: config.command, args: config.args, env, cwd: config.cwd }, logger);
    }
    case 'sse':
      return new McpClientSse(name, new URL(config.url), config.headers ?? {}, logger);
    case 'streamable-http':
      return new McpClientStreamableHttp(name, new URL(config.url), config.headers ?? {}, logger);
  }
}
