import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { StdioClientTransport, StdioServerParameters } from '@modelcontextprotocol/sdk/client/stdio.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';

import { CancelledError, ToolExecutionError, ToolUnavailableError, errorMessage } from '../errors.js';
import { Logger } from '../types/common.js';
import { ToolInputSchemaSchema } from '../types/json-schema.js';
import { RemoteTool, RemoteToolResult, RemoteToolServer } from './types.js';

/**
 * MCP client for one remote tool server. Subclasses only decide how the transport is created.
 *
 * Once connected, a closed transport (server exit, dropped stream) marks the client disconnected
 * and fires `onClose` exactly once; calls after that fail with ToolUnavailableError.
 */
export abstract class McpClientBase implements RemoteToolServer {
  protected mcp: Client;
  protected transport: Transport | null = null;
  protected errorLog: string[] = [];
  protected readonly MAX_LOG_ENTRIES = 100;
  serverVersion: { name: string; version: string } | null = null;
  protected connected = false;
  private closeReported = false;
  onClose?: () => void;

  constructor(readonly name: string, protected logger: Logger) {
    this.mcp = new Client({ name: 'agentshell', version: '0.1.0' });
  }

  protected abstract createTransport(): Promise<Transport>;

  protected addErrorMessage(message: string) {
    if (message.trim()) {
      this.errorLog.push(message);
      if (this.errorLog.length > this.MAX_LOG_ENTRIES) {
        this.errorLog.shift();
      }
    }
  }

  getErrorLog(): string[] {
    return [...this.errorLog];
  }

  isConnected(): boolean {
    return this.connected;
  }

  async connect(): Promise<boolean> {
    this.logger.info(`[MCP CLIENT] ${this.name}: creating transport`);
    try {
      this.transport = await this.createTransport();
      this.transport.onerror = (err: Error) => {
        this.logger.error(`[MCP CLIENT] ${this.name}: transport error: ${err.message}`);
        this.addErrorMessage(`Transport error: ${err.message}`);
      };
      this.mcp.onerror = (err: Error) => {
        this.logger.error(`[MCP CLIENT] ${this.name}: client error: ${err.message}`);
      };
      this.mcp.onclose = () => this.handleClose();

      const connectPromise = this.mcp.connect(this.transport);
      if (this.transport instanceof StdioClientTransport && this.transport.stderr) {
        this.transport.stderr.on('data', (data: Buffer) => this.addErrorMessage(data.toString().trim()));
      }
      await connectPromise;
      this.connected = true;

      const serverVersion = this.mcp.getServerVersion();
      this.serverVersion = serverVersion ? { name: serverVersion.name, version: serverVersion.version } : null;
      this.logger.info(`[MCP CLIENT] ${this.name}: connected to ${JSON.stringify(this.serverVersion)}`);
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error(`[MCP CLIENT] ${this.name}: error connecting: ${message}`);
      this.addErrorMessage(`Error connecting to MCP server: ${message}`);
      this.connected = false;
    }
    return this.connected;
  }

  protected handleClose(): void {
    const wasConnected = this.connected;
    this.connected = false;
    this.transport = null;
    if (wasConnected && !this.closeReported) {
      this.closeReported = true;
      this.logger.warn(`[MCP CLIENT] ${this.name}: connection closed`);
      this.onClose?.();
    }
  }

  async listTools(): Promise<RemoteTool[]> {
    this.ensureConnected();
    const result = await this.mcp.listTools();
    const tools: RemoteTool[] = [];
    for (const tool of result.tools) {
      const schema = ToolInputSchemaSchema.safeParse(tool.inputSchema);
      if (!schema.success) {
        this.logger.warn(`[MCP CLIENT] ${this.name}: skipping tool ${tool.name} with an unusable input schema`);
        continue;
      }
      tools.push({ name: tool.name, description: tool.description, inputSchema: schema.data });
    }
    return tools;
  }

  async callTool(toolName: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<RemoteToolResult> {
    this.ensureConnected();
    const startTime = performance.now();
    let raw: unknown;
    try {
      raw = await this.mcp.callTool({ name: toolName, arguments: args }, CallToolResultSchema, { signal });
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError(`Call to ${this.name}/${toolName} was cancelled`);
      }
      if (!this.connected) {
        throw new ToolUnavailableError(this.name, `Tool server ${this.name} disconnected during ${toolName}`, { cause: error });
      }
      throw new ToolExecutionError(`Tool server ${this.name} failed to run ${toolName}: ${errorMessage(error)}`, { cause: error });
    }
    const elapsedTimeMs = performance.now() - startTime;

    const parsed = CallToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ToolExecutionError(`Tool server ${this.name} returned an unexpected result for ${toolName}`);
    }
    const text = parsed.data.content
      .map(item => (item.type === 'text' ? item.text : `[${item.type} content]`))
      .join('\n');
    return { text, isError: parsed.data.isError === true, elapsedTimeMs };
  }

  async disconnect(): Promise<void> {
    // A deliberate disconnect is not reported through onClose
    this.closeReported = true;
    this.connected = false;
    if (this.transport) {
      await this.transport.close();
      this.transport = null;
    }
    await this.mcp.close();
  }

  private ensureConnected(): void {
    if (!this.connected) {
      throw new ToolUnavailableError(this.name, `Tool server ${this.name} is not connected`);
    }
  }
}

export class McpClientStdio extends McpClientBase {
  constructor(name: string, private serverParams: StdioServerParameters, logger: Logger) {
    super(name, logger);
  }

  protected async createTransport(): Promise<Transport> {
    this.logger.info(`[MCP CLIENT] ${this.name}: spawning ${this.serverParams.command}`);
    return new StdioClientTransport({ ...this.serverParams, stderr: 'pipe' });
  }
}

// url is the server's SSE endpoint, usually ending in /sse
export class McpClientSse extends McpClientBase {
  constructor(name: string, private url: URL, private headers: Record<string, string>, logger: Logger) {
    super(name, logger);
  }

  protected async createTransport(): Promise<Transport> {
    this.logger.info(`[MCP CLIENT] ${this.name}: connecting to ${this.url.toString()}`);
    let fetchCount = 0;

    // The SSE transport reconnects its event stream without renegotiating the session, which
    // leaves it unusable. A second event stream fetch is therefore treated as a lost connection.
    const eventSourceFetch = async (url: string | URL, init?: RequestInit): Promise<Response> => {
      fetchCount++;
      if (fetchCount > 1) {
        this.handleClose();
        return new Response(null, { status: 400, statusText: 'SSE connection terminated' });
      }
      const headers = new Headers(init?.headers);
      for (const [key, value] of Object.entries(this.headers)) {
        headers.set(key, value);
      }
      return fetch(url.toString(), { ...init, headers });
    };

    return new SSEClientTransport(this.url, {
      eventSourceInit: { fetch: eventSourceFetch },
      requestInit: { headers: this.headers },
    });
  }
}

export class McpClientStreamableHttp extends McpClientBase {
  constructor(name: string, private url: URL, private headers: Record<string, string>, logger: Logger) {
    super(name, logger);
  }

  protected async createTransport(): Promise<Transport> {
    this.logger.info(`[MCP CLIENT] ${this.name}: connecting to ${this.url.toString()}`);
    return new StreamableHTTPClientTransport(this.url, { requestInit: { headers: this.headers } });
  }
}
