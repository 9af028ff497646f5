import chalk, { type Chalk } from 'chalk';
import type { StreamBroker, StreamEvent, Subscription } from '@agentshell/core';

export type PaneName = 'chat' | 'editor' | 'terminal';

export interface Pane {
  readonly name: PaneName;
  // Text to write for an event, or null when the pane ignores it
  render(event: StreamEvent): string | null;
}

const MAX_PREVIEW_LINES = 20;

export function indent(text: string, width = 2): string {
  const padding = ' '.repeat(width);
  return text.split('\n').map(line => padding + line).join('\n');
}

export function preview(text: string, maxLines = MAX_PREVIEW_LINES): string {
  const lines = text.split('\n');
  if (lines.length <= maxLines) {
    return text;
  }
  return [...lines.slice(0, maxLines), `... (${lines.length - maxLines} more lines)`].join('\n');
}

/**
 * Conversation view: streamed assistant text, tool calls and their results, run outcomes.
 */
export class ChatPane implements Pane {
  readonly name = 'chat';
  // Whether the cursor sits after streamed assistant text
  private midLine = false;

  constructor(private colors: Chalk = chalk) {}

  render(event: StreamEvent): string | null {
    const c = this.colors;
    switch (event.type) {
      case 'AssistantDelta':
        this.midLine = !event.text.endsWith('\n');
        return event.text;
      case 'ToolCallStarted':
        return this.line(c.cyan(`→ ${event.name} ${JSON.stringify(event.arguments)}`));
      case 'ToolResultAppended': {
        const elapsed = c.dim(`(${Math.round(event.elapsedTimeMs)}ms)`);
        if (event.status === 'ok') {
          return this.line(`${c.green(`✓ ${event.name}`)} ${elapsed}\n${c.dim(indent(preview(event.output)))}`);
        }
        const code = event.error?.code ?? 'Error';
        return this.line(`${c.red(`✗ ${event.name} ${code}`)} ${elapsed}\n${c.dim(indent(preview(event.output)))}`);
      }
      case 'RunFinished':
        return this.line(c.dim(`[done, ${event.iterations} tool iteration${event.iterations === 1 ? '' : 's'}]`));
      case 'RunFailed':
        return this.line(c.red(`[failed] ${event.error.code}: ${event.error.message}`));
      case 'RunCancelled':
        return this.line(c.yellow('[cancelled]'));
      default:
        return null;
    }
  }

  private line(text: string): string {
    const prefix = this.midLine ? '\n' : '';
    this.midLine = false;
    return `${prefix}${text}\n`;
  }
}

/**
 * File view: shows each file the agent opens, and each change a tool made, with a preview of the
 * content.
 */
export class EditorPane implements Pane {
  readonly name = 'editor';

  constructor(private colors: Chalk = chalk) {}

  render(event: StreamEvent): string | null {
    switch (event.type) {
      case 'FileOpened':
        return this.file('open', event.path, event.content);
      case 'FileChanged':
        return this.file(event.operation, event.path, event.content);
      default:
        return null;
    }
  }

  private file(action: string, filePath: string, content: string): string {
    const c = this.colors;
    const lineCount = content === '' ? 0 : content.split('\n').length;
    return `${c.magenta(`[editor] ${action} ${filePath}`)} ${c.dim(`(${lineCount} lines)`)}\n${c.dim(indent(preview(content, 10)))}\n`;
  }
}

/**
 * Process view: live stdout and stderr of terminal-exec calls.
 */
export class TerminalPane implements Pane {
  readonly name = 'terminal';

  constructor(private colors: Chalk = chalk) {}

  render(event: StreamEvent): string | null {
    if (event.type !== 'TerminalOutput') {
      return null;
    }
    const text = event.text.endsWith('\n') ? event.text : `${event.text}\n`;
    const body = event.stream === 'stderr' ? this.colors.red(text) : text;
    return this.colors.dim('[terminal] ') + body;
  }
}

/**
 * Subscribes each pane to the broker and writes what it renders. Resolves once every
 * subscription has ended (the broker was closed or the panes were unsubscribed).
 */
export function attachPanes(broker: StreamBroker, panes: Pane[], write: (text: string) => void): { subscriptions: Subscription[]; finished: Promise<void> } {
  const subscriptions = panes.map(pane => broker.subscribe(pane.name));
  const finished = Promise.all(panes.map(async (pane, index) => {
    for await (const event of subscriptions[index]) {
      const text = pane.render(event);
      if (text !== null) {
        write(text);
      }
    }
  })).then(() => undefined);
  return { subscriptions, finished };
}
