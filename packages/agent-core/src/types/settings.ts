import { z } from 'zod';
import { McpServerConfigSchema } from '../mcp/types.js';

export const ProviderIdSchema = z.enum(['claude', 'test']);
export type ProviderId = z.infer<typeof ProviderIdSchema>;

// Provider configuration values may be direct values or secret references (env://NAME)
export const ProviderConfigSchema = z.record(z.string(), z.string());
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

export const DEFAULT_DENIED_COMMANDS = ['sudo', 'su', 'chroot', 'mount', 'umount', 'shutdown', 'reboot', 'halt', 'poweroff', 'mkfs', 'dd', 'rm -rf /'];

/**
 * AgentSettings schema - single source of truth.
 * Defaults live in the schema; getDefaultSettings() extracts them.
 */
export const AgentSettingsSchema = z.object({
  // Maximum ModelTurn -> Dispatching cycles per run
  maxIterations: z.number().int().positive().default(20),
  // Default per-invocation timeout for tools (ms); individual tools may override
  toolTimeoutMs: z.number().int().nonnegative().default(120_000),
  // Retry a model call once when the failure is classified as transient
  modelRetry: z.boolean().default(true),
  modelRetryDelayMs: z.number().int().nonnegative().default(1_000),
  subscriberBufferSize: z.number().int().positive().default(256),
  // Directory the file and terminal tools are confined to; defaults to the process cwd
  workingRoot: z.string().optional(),
  deniedCommands: z.array(z.string()).default(DEFAULT_DENIED_COMMANDS),
  provider: ProviderIdSchema.default('claude'),
  model: z.string().default('claude-3-7-sonnet-20250219'),
  maxOutputTokens: z.number().int().positive().default(4096),
  temperature: z.number().min(0).max(1).default(0.5),
  // Replaces the built-in agent prompt; {{PROJECT_ROOT}} is filled in either way
  systemPrompt: z.string().optional(),
});

export type AgentSettings = z.infer<typeof AgentSettingsSchema>;

export const getDefaultSettings = (): AgentSettings => AgentSettingsSchema.parse({});

/**
 * Configuration file schema - settings plus provider credentials and remote tool servers.
 */
export const AgentConfigSchema = z.object({
  settings: AgentSettingsSchema.default({}),
  providers: z.record(z.string(), ProviderConfigSchema).default({}),
  mcpServers: z.record(z.string(), McpServerConfigSchema).default({}),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
