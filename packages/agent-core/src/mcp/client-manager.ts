import { ToolExecutionError, ToolUnavailableError, errorMessage } from '../errors.js';
import { Logger } from '../types/common.js';
import { ToolRegistry, ServerToolSpec } from '../tools/tool-registry.js';
import { McpServerConfig, McpServersConfig, RemoteTool, RemoteToolServer, RemoteToolServerFactory } from './types.js';

export interface ToolServerStatus {
  name: string;
  connected: boolean;
  toolCount: number;
  errors: string[];
}

/**
 * Connects the configured tool servers and keeps the registry in step with them: a server's tools
 * are registered when it connects and removed, once in-flight calls finish, when it disconnects or
 * its connection drops.
 */
export class ToolServerManager {
  private servers = new Map<string, RemoteToolServer>();
  private failures = new Map<string, string[]>();

  constructor(
    private registry: ToolRegistry,
    private logger: Logger,
    private createServer: RemoteToolServerFactory,
  ) {}

  /**
   * Connects every enabled server. A server that fails to connect is logged and reported in
   * status(); it does not stop the others.
   */
  async connectAll(config: McpServersConfig): Promise<void> {
    const entries = Object.entries(config).filter(([name, serverConfig]) => {
      if (serverConfig.disabled) {
        this.logger.info(`[ToolServerManager] skipping disabled server ${name}`);
      }
      return !serverConfig.disabled;
    });
    await Promise.all(entries.map(async ([name, serverConfig]) => {
      try {
        await this.connect(name, serverConfig);
      } catch (error) {
        this.logger.error(`[ToolServerManager] could not connect ${name}: ${errorMessage(error)}`);
      }
    }));
  }

  async connect(name: string, config: McpServerConfig): Promise<void> {
    if (this.servers.has(name)) {
      throw new ToolExecutionError(`Tool server ${name} is already connected`);
    }
    const server = this.createServer(name, config);
    if (!(await server.connect())) {
      const errors = server.getErrorLog();
      this.failures.set(name, errors);
      throw new ToolUnavailableError(name, `Tool server ${name} failed to connect${errors.length ? `: ${errors[errors.length - 1]}` : ''}`);
    }

    let tools: RemoteTool[];
    try {
      tools = await server.listTools();
      this.registry.registerServer(name, tools.map(tool => this.toToolSpec(server, tool)), () => server.disconnect());
    } catch (error) {
      await server.disconnect();
      this.failures.set(name, [...server.getErrorLog(), errorMessage(error)]);
      throw error;
    }

    this.failures.delete(name);
    this.servers.set(name, server);
    server.onClose = () => {
      this.handleConnectionLost(name).catch(error => {
        this.logger.error(`[ToolServerManager] failed to remove ${name} after its connection closed: ${errorMessage(error)}`);
      });
    };
    this.logger.info(`[ToolServerManager] connected ${name} with ${tools.length} tools`);
  }

  async disconnect(name: string): Promise<void> {
    if (!this.servers.has(name)) {
      throw new ToolUnavailableError(name, `Tool server ${name} is not connected`);
    }
    this.servers.delete(name);
    await this.registry.unregisterServer(name);
  }

  async disconnectAll(): Promise<void> {
    await Promise.all([...this.servers.keys()].map(name => this.disconnect(name)));
  }

  status(): ToolServerStatus[] {
    const connected = [...this.servers.values()].map(server => ({
      name: server.name,
      connected: server.isConnected(),
      toolCount: this.registry.serverToolNames(server.name).length,
      errors: server.getErrorLog(),
    }));
    const failed = [...this.failures.entries()].map(([name, errors]) => ({ name, connected: false, toolCount: 0, errors }));
    return [...connected, ...failed];
  }

  private async handleConnectionLost(name: string): Promise<void> {
    if (!this.servers.delete(name)) {
      return;
    }
    this.logger.warn(`[ToolServerManager] connection to ${name} lost, removing its tools`);
    if (this.registry.hasServer(name)) {
      await this.registry.unregisterServer(name);
    }
  }

  private toToolSpec(server: RemoteToolServer, tool: RemoteTool): ServerToolSpec {
    return {
      name: tool.name,
      description: tool.description ?? '',
      inputSchema: tool.inputSchema,
      handler: async (args, context) => {
        const result = await server.callTool(tool.name, args, context.signal);
        if (result.isError) {
          throw new ToolExecutionError(`Tool ${server.name}/${tool.name} reported an error`, { output: result.text });
        }
        return result.text;
      },
    };
  }
}
