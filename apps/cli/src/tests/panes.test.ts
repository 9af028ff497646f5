import chalk from 'chalk';
import { StreamBroker, silentLogger } from '@agentshell/core';

import { ChatPane, EditorPane, TerminalPane, attachPanes, preview } from '../panes';

const plain = new chalk.Instance({ level: 0 });

describe('ChatPane', () => {
  let pane: ChatPane;

  beforeEach(() => {
    pane = new ChatPane(plain);
  });

  it('should write assistant text as it streams and start tool lines on a new line', () => {
    expect(pane.render({ type: 'AssistantDelta', runId: 'r', turnId: 't', text: 'Let me look', seq: 1 })).toBe('Let me look');
    expect(pane.render({ type: 'ToolCallStarted', runId: 'r', callId: 'c', name: 'grep', arguments: { pattern: 'x' }, seq: 2 }))
      .toBe('\n→ grep {"pattern":"x"}\n');
  });

  it('should show tool results with their elapsed time and output', () => {
    expect(pane.render({ type: 'ToolResultAppended', runId: 'r', callId: 'c', name: 'grep', status: 'ok', output: 'a\nb', elapsedTimeMs: 12.4, seq: 1 }))
      .toBe('✓ grep (12ms)\n  a\n  b\n');
    expect(pane.render({
      type: 'ToolResultAppended',
      runId: 'r',
      callId: 'c',
      name: 'grep',
      status: 'error',
      output: 'Tool call was cancelled',
      error: { code: 'Cancelled', message: 'Tool call was cancelled' },
      elapsedTimeMs: 0,
      seq: 2,
    })).toBe('✗ grep Cancelled (0ms)\n  Tool call was cancelled\n');
  });

  it('should report how a run ended', () => {
    expect(pane.render({ type: 'RunFinished', runId: 'r', iterations: 1, seq: 1 })).toBe('[done, 1 tool iteration]\n');
    expect(pane.render({ type: 'RunFinished', runId: 'r', iterations: 3, seq: 2 })).toBe('[done, 3 tool iterations]\n');
    expect(pane.render({ type: 'RunFailed', runId: 'r', error: { code: 'ModelError', message: 'overloaded' }, seq: 3 })).toBe('[failed] ModelError: overloaded\n');
    expect(pane.render({ type: 'RunCancelled', runId: 'r', seq: 4 })).toBe('[cancelled]\n');
  });

  it('should ignore file and terminal events', () => {
    expect(pane.render({ type: 'TerminalOutput', runId: 'r', callId: 'c', stream: 'stdout', text: 'x', seq: 1 })).toBeNull();
  });
});

describe('EditorPane', () => {
  it('should show the changed file with a preview of its content', () => {
    const pane = new EditorPane(plain);
    expect(pane.render({ type: 'FileChanged', runId: 'r', callId: 'c', path: 'src/a.ts', operation: 'write', content: 'x\ny', seq: 1 }))
      .toBe('[editor] write src/a.ts (2 lines)\n  x\n  y\n');
    expect(pane.render({ type: 'RunCancelled', runId: 'r', seq: 2 })).toBeNull();
  });

  it('should show a file the agent opened', () => {
    const pane = new EditorPane(plain);
    expect(pane.render({ type: 'FileOpened', runId: 'r', callId: 'c', path: 'README.md', content: '# Title\n', seq: 1 }))
      .toBe('[editor] open README.md (2 lines)\n  # Title\n  \n');
  });
});

describe('TerminalPane', () => {
  it('should prefix process output and end it with a newline', () => {
    const pane = new TerminalPane(plain);
    expect(pane.render({ type: 'TerminalOutput', runId: 'r', callId: 'c', stream: 'stdout', text: 'hello', seq: 1 })).toBe('[terminal] hello\n');
    expect(pane.render({ type: 'TerminalOutput', runId: 'r', callId: 'c', stream: 'stderr', text: 'oops\n', seq: 2 })).toBe('[terminal] oops\n');
  });
});

describe('preview', () => {
  it('should cut long text and say how much was left out', () => {
    const text = Array.from({ length: 25 }, (_, index) => `line ${index + 1}`).join('\n');
    const lines = preview(text).split('\n');
    expect(lines).toHaveLength(21);
    expect(lines[19]).toBe('line 20');
    expect(lines[20]).toBe('... (5 more lines)');
    expect(preview('short')).toBe('short');
  });
});

describe('attachPanes', () => {
  it('should feed every pane from the broker until it closes', async () => {
    const broker = new StreamBroker(silentLogger);
    const written: string[] = [];
    const { finished } = attachPanes(broker, [new ChatPane(plain), new TerminalPane(plain)], text => written.push(text));

    broker.publish({ type: 'TerminalOutput', runId: 'r', callId: 'c', stream: 'stdout', text: 'built' });
    broker.publish({ type: 'RunFinished', runId: 'r', iterations: 1 });
    broker.close();
    await finished;

    expect(written.sort()).toEqual(['[done, 1 tool iteration]\n', '[terminal] built\n']);
  });
});
