import { DuplicateNameError, NotFoundError, ToolUnavailableError } from '../errors.js';
import { Logger } from '../types/common.js';
import { ToolCatalogEntry, ToolDefinition } from '../types/tools.js';

// A remote server's tool as handed to registerServer(); the registry assigns the qualified name
export type ServerToolSpec = Omit<ToolDefinition, 'source'>;

export interface ToolLease {
  readonly definition: ToolDefinition;
  release(): void;
}

interface ServerEntry {
  toolNames: string[];
  leases: number;
  removing: boolean;
  drained?: () => void;
  release?: () => Promise<void>;
}

export function qualifiedToolName(serverName: string, toolName: string): string {
  return `${serverName}_${toolName}`;
}

/**
 * Set of invocable tools, keyed by name, in registration order.
 *
 * Local tools are registered one at a time. A remote server's tools are registered and removed as
 * a unit: both happen in a single synchronous step, so a lookup sees either all of a server's
 * tools or none of them. Invocations hold a lease on their server; removing the server waits for
 * outstanding leases, and no new lease is granted once removal has started.
 */
export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();
  private servers = new Map<string, ServerEntry>();

  constructor(private logger: Logger) {}

  register(definition: ToolDefinition): void {
    if (this.tools.has(definition.name)) {
      throw new DuplicateNameError(definition.name);
    }
    this.tools.set(definition.name, definition);
    this.logger.debug(`[ToolRegistry] registered ${definition.name}`);
  }

  unregister(name: string): void {
    const definition = this.tools.get(name);
    if (!definition) {
      throw new NotFoundError(`Tool not found: ${name}`);
    }
    if (definition.source.kind === 'remote') {
      throw new NotFoundError(`Tool ${name} belongs to server ${definition.source.serverName}; unregister the server instead`);
    }
    this.tools.delete(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  lookup(name: string): ToolDefinition {
    const definition = this.tools.get(name);
    if (!definition) {
      throw new NotFoundError(`Tool not found: ${name}`);
    }
    if (definition.source.kind === 'remote' && this.servers.get(definition.source.serverName)?.removing) {
      throw new ToolUnavailableError(definition.source.serverName, `Tool server ${definition.source.serverName} is disconnecting`);
    }
    return definition;
  }

  // Tools available to the model, excluding servers that are being removed
  list(): ToolDefinition[] {
    return [...this.tools.values()].filter(definition =>
      definition.source.kind === 'local' || !this.servers.get(definition.source.serverName)?.removing
    );
  }

  catalog(): ToolCatalogEntry[] {
    return this.list().map(({ name, description, inputSchema }) => ({ name, description, inputSchema }));
  }

  hasServer(serverName: string): boolean {
    return this.servers.has(serverName);
  }

  serverToolNames(serverName: string): string[] {
    return [...(this.servers.get(serverName)?.toolNames ?? [])];
  }

  /**
   * Registers every tool of a remote server, or none of them if any name collides.
   * `release` runs once the server has been removed.
   */
  registerServer(serverName: string, tools: ServerToolSpec[], release?: () => Promise<void>): ToolDefinition[] {
    if (this.servers.has(serverName)) {
      throw new DuplicateNameError(serverName);
    }
    const definitions = tools.map((tool): ToolDefinition => ({
      ...tool,
      name: qualifiedToolName(serverName, tool.name),
      source: { kind: 'remote', serverName },
    }));
    const names = new Set<string>();
    for (const definition of definitions) {
      if (this.tools.has(definition.name) || names.has(definition.name)) {
        throw new DuplicateNameError(definition.name);
      }
      names.add(definition.name);
    }

    for (const definition of definitions) {
      this.tools.set(definition.name, definition);
    }
    this.servers.set(serverName, { toolNames: [...names], leases: 0, removing: false, release });
    this.logger.info(`[ToolRegistry] registered ${definitions.length} tools from server ${serverName}`);
    return definitions;
  }

  /**
   * Removes a server's tools once no invocation of them is in flight, then releases the server.
   */
  async unregisterServer(serverName: string): Promise<void> {
    const server = this.servers.get(serverName);
    if (!server) {
      throw new NotFoundError(`Tool server not found: ${serverName}`);
    }
    if (server.removing) {
      throw new NotFoundError(`Tool server ${serverName} is already being removed`);
    }
    server.removing = true;
    if (server.leases > 0) {
      this.logger.info(`[ToolRegistry] waiting for ${server.leases} invocations on ${serverName} before removal`);
      await new Promise<void>(resolve => {
        server.drained = resolve;
      });
    }

    for (const name of server.toolNames) {
      this.tools.delete(name);
    }
    this.servers.delete(serverName);
    this.logger.info(`[ToolRegistry] removed server ${serverName}`);
    if (server.release) {
      await server.release();
    }
  }

  /**
   * Looks a tool up and pins its server for the duration of an invocation.
   */
  acquire(name: string): ToolLease {
    const definition = this.lookup(name);
    if (definition.source.kind === 'local') {
      return { definition, release: () => {} };
    }

    const server = this.servers.get(definition.source.serverName);
    if (!server) {
      throw new ToolUnavailableError(definition.source.serverName, `Tool server ${definition.source.serverName} is not registered`);
    }
    server.leases++;
    let released = false;
    return {
      definition,
      release: () => {
        if (released) {
          return;
        }
        released = true;
        server.leases--;
        if (server.leases === 0 && server.drained) {
          server.drained();
        }
      },
    };
  }
}
