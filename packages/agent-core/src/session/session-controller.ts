import { AgentError } from '../errors.js';
import { AgentLoop } from '../agent/agent-loop.js';
import { RunHandle, RunOutcome } from '../agent/run-handle.js';
import { ToolServerManager } from '../mcp/client-manager.js';
import { McpServersConfig, RemoteToolServerFactory } from '../mcp/types.js';
import { ModelClient } from '../providers/types.js';
import { ConversationState } from '../state/conversation-state.js';
import { StreamBroker } from '../stream/stream-broker.js';
import { createBuiltinTools, Workspace } from '../tools/builtin/index.js';
import { ToolExecutor } from '../tools/tool-executor.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { Logger } from '../types/common.js';
import { AgentSettings } from '../types/settings.js';
import { ToolDefinition } from '../types/tools.js';
import { Turn } from '../types/turns.js';
import { renderSystemPrompt } from './system-prompt.js';

export interface SessionControllerOptions {
  settings: AgentSettings;
  model: ModelClient;
  logger: Logger;
  // Creates the connection for each configured remote tool server
  serverFactory: RemoteToolServerFactory;
  // Local tools to register; defaults to the built-in file, search and terminal tools
  tools?: ToolDefinition[];
}

/**
 * Entry point for the panes. Owns the conversation, the tool registry and at most one live run;
 * submitting new input first cancels the active run and waits for it to reach a terminal state.
 */
export class SessionController {
  readonly state = new ConversationState();
  readonly broker: StreamBroker;
  readonly registry: ToolRegistry;
  readonly servers: ToolServerManager;
  readonly workspace: Workspace;
  readonly model: ModelClient;
  private loop: AgentLoop;
  private logger: Logger;
  private active: RunHandle | null = null;
  // Serializes submit() so two quick submissions can't both start a run
  private queue: Promise<void> = Promise.resolve();
  private disposed = false;

  constructor(options: SessionControllerOptions) {
    const { settings, model, logger } = options;
    this.logger = logger;
    this.model = model;
    this.workspace = new Workspace(settings.workingRoot ?? process.cwd());
    this.broker = new StreamBroker(logger, settings.subscriberBufferSize);
    this.registry = new ToolRegistry(logger);
    this.servers = new ToolServerManager(this.registry, logger, options.serverFactory);

    const tools = options.tools ?? createBuiltinTools(this.workspace, { deniedCommands: settings.deniedCommands });
    for (const tool of tools) {
      this.registry.register(tool);
    }

    const executor = new ToolExecutor(this.registry, logger, {
      defaultTimeoutMs: settings.toolTimeoutMs,
      emit: event => this.broker.publish(event),
    });
    this.loop = new AgentLoop(
      { state: this.state, registry: this.registry, executor, model, broker: this.broker, logger },
      {
        maxIterations: settings.maxIterations,
        modelRetry: settings.modelRetry,
        modelRetryDelayMs: settings.modelRetryDelayMs,
        systemPrompt: renderSystemPrompt(settings.systemPrompt, this.workspace.root),
      },
    );
    this.logger.info(`[SessionController] session ready in ${this.workspace.root} with ${tools.length} local tools`);
  }

  async connectServers(config: McpServersConfig): Promise<void> {
    await this.servers.connectAll(config);
  }

  /**
   * Cancels the active run (if any), waits for it to end, then starts a run for `text`.
   */
  submit(text: string): Promise<RunHandle> {
    const next = this.queue.then(async () => {
      if (this.disposed) {
        throw new AgentError('InternalError', 'Session has been disposed');
      }
      await this.cancelCurrent();
      const handle = this.loop.start(text);
      this.active = handle;
      return handle;
    });
    this.queue = next.then(() => undefined, () => undefined);
    return next;
  }

  /**
   * Requests cancellation of the active run and resolves with its outcome once it is terminal.
   * Resolves with null when no run has been started since the last cancellation.
   */
  async cancelCurrent(): Promise<RunOutcome | null> {
    const handle = this.active;
    if (!handle) {
      return null;
    }
    if (!handle.isTerminal) {
      this.logger.info(`[SessionController] cancelling run ${handle.id}`);
      handle.cancel();
    }
    const outcome = await handle.done;
    if (this.active === handle) {
      this.active = null;
    }
    return outcome;
  }

  currentRun(): RunHandle | null {
    return this.active && !this.active.isTerminal ? this.active : null;
  }

  getTranscript(): Turn[] {
    return this.state.getTurns();
  }

  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    await this.queue;
    await this.cancelCurrent();
    await this.servers.disconnectAll();
    this.broker.close();
    this.logger.info('[SessionController] disposed');
  }
}
