import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';

import { CancelledError, ModelError, errorMessage } from '../errors.js';
import { Logger } from '../types/common.js';
import { ClaudeStreamTranslator, isTransientStatus, toClaudeMessages, toClaudeTools } from './claude-stream.js';
import { ModelClient, ModelRequest, ModelStreamEvent, ProviderInfo } from './types.js';

export const ClaudeConfigSchema = z.object({
  ANTHROPIC_API_KEY: z.string().default('env://ANTHROPIC_API_KEY'),
  ANTHROPIC_BASE_URL: z.string().optional(),
});

export type ClaudeConfig = z.infer<typeof ClaudeConfigSchema>;

export interface ClaudeModelOptions {
  modelName: string;
  maxOutputTokens: number;
  temperature: number;
}

export const claudeProviderInfo: ProviderInfo = {
  name: 'Anthropic Claude',
  description: 'Claude models through the Anthropic Messages API',
  website: 'https://www.anthropic.com/claude',
};

/**
 * Maps SDK failures onto ModelError. Connection failures, rate limits and 5xx responses
 * (including 529 overloaded) are transient; authentication and bad requests are not.
 */
export function toModelError(error: unknown): ModelError {
  if (error instanceof ModelError) {
    return error;
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return new ModelError(`Could not reach the model API: ${error.message}`, true, { cause: error });
  }
  if (error instanceof Anthropic.APIError) {
    const status = typeof error.status === 'number' ? error.status : undefined;
    return new ModelError(`Model API error${status ? ` (${status})` : ''}: ${error.message}`, isTransientStatus(status), { cause: error, status });
  }
  return new ModelError(`Model request failed: ${errorMessage(error)}`, false, { cause: error });
}

export class ClaudeModelClient implements ModelClient {
  readonly info = claudeProviderInfo;
  readonly modelName: string;
  private client: Anthropic;

  constructor(private options: ClaudeModelOptions, config: { apiKey: string; baseURL?: string }, private logger: Logger) {
    this.modelName = options.modelName;
    // Retries are the agent loop's decision, not the SDK's
    this.client = new Anthropic({ apiKey: config.apiKey, baseURL: config.baseURL, maxRetries: 0 });
    this.logger.info(`Claude model client initialized for ${this.modelName}`);
  }

  async *completeStream(request: ModelRequest, signal: AbortSignal): AsyncIterable<ModelStreamEvent> {
    const messages = toClaudeMessages(request.transcript);
    this.logger.debug(`[ClaudeModelClient] sending ${messages.length} messages and ${request.tools.length} tools`);

    let stream: AsyncIterable<Anthropic.Messages.RawMessageStreamEvent>;
    try {
      stream = await this.client.messages.create(
        {
          model: this.modelName,
          max_tokens: this.options.maxOutputTokens,
          temperature: this.options.temperature,
          system: request.systemPrompt,
          messages,
          tools: toClaudeTools(request.tools),
          stream: true,
        },
        { signal },
      );
    } catch (error) {
      throw signal.aborted ? new CancelledError('Model call was cancelled') : toModelError(error);
    }

    const translator = new ClaudeStreamTranslator();
    try {
      for await (const event of stream) {
        for (const translated of translator.translate(event)) {
          yield translated;
        }
      }
    } catch (error) {
      throw signal.aborted ? new CancelledError('Model call was cancelled') : toModelError(error);
    }
  }
}
