import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { AccessDeniedError, CancelledError, ToolExecutionError } from '../errors';
import { createTerminalTool, findDeniedCommand, formatCommandOutput } from '../tools/builtin/terminal-tool';
import { Workspace } from '../tools/builtin/workspace';
import { StreamEventInput } from '../types/events';
import { ToolDefinition } from '../types/tools';
import { makeContext } from './helpers';

describe('findDeniedCommand', () => {
  const denied = ['sudo', 'su', 'rm -rf /', 'git push'];

  it('should match a denied command at the start of any segment', () => {
    expect(findDeniedCommand('sudo ls', denied)).toBe('sudo');
    expect(findDeniedCommand('ls && sudo rm x', denied)).toBe('sudo');
    expect(findDeniedCommand('cat x | su root', denied)).toBe('su');
    expect(findDeniedCommand('echo $(sudo id)', denied)).toBe('sudo');
    expect(findDeniedCommand('rm -rf /', denied)).toBe('rm -rf /');
  });

  it('should normalise whitespace within a segment', () => {
    expect(findDeniedCommand('git   push origin', denied)).toBe('git push');
  });

  it('should not match a command that merely starts with the same letters', () => {
    expect(findDeniedCommand('echo sudoku', denied)).toBeUndefined();
    expect(findDeniedCommand('summary.sh', denied)).toBeUndefined();
    expect(findDeniedCommand('git status', denied)).toBeUndefined();
  });
});

describe('formatCommandOutput', () => {
  it('should label stderr and trim trailing whitespace', () => {
    expect(formatCommandOutput({ stdout: 'out\n', stderr: 'err\n', exitCode: 1, signal: null, durationMs: 12 }))
      .toBe('(exit code: 1, duration: 12ms)\nout\n[stderr]\nerr');
  });

  it('should report the signal when there is no exit code', () => {
    expect(formatCommandOutput({ stdout: '', stderr: '', exitCode: null, signal: 'SIGKILL', durationMs: 5 }))
      .toBe('(signal: SIGKILL, duration: 5ms)');
  });
});

describe('terminal-exec', () => {
  let root: string;
  let tool: ToolDefinition;
  let emitted: StreamEventInput[];

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'agentshell-terminal-'));
    tool = createTerminalTool(new Workspace(root), { deniedCommands: ['sudo'] });
    emitted = [];
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should run a command and stream its output', async () => {
    const output = await tool.handler({ command: 'echo hello' }, makeContext(emitted));

    expect(output).toMatch(/^\(exit code: 0, duration: \d+ms\)\nhello$/);
    const stdout = emitted.map(event => (event.type === 'TerminalOutput' && event.stream === 'stdout' ? event.text : '')).join('');
    expect(stdout).toBe('hello\n');
  });

  it('should run in the requested directory with extra environment variables', async () => {
    await fs.mkdir(path.join(root, 'sub'));
    const output = await tool.handler({ command: 'pwd; echo "$GREETING"', cwd: 'sub', env: { GREETING: 'hi there' } }, makeContext());
    const lines = output.split('\n');
    expect(lines[1]).toBe(await fs.realpath(path.join(root, 'sub')));
    expect(lines[2]).toBe('hi there');
  });

  it('should fail with the captured output on a non-zero exit', async () => {
    const failure = await tool.handler({ command: 'echo oops >&2; exit 3' }, makeContext()).then(
      () => null,
      (error: unknown) => error,
    );

    expect(failure).toBeInstanceOf(ToolExecutionError);
    if (failure instanceof ToolExecutionError) {
      expect(failure.message).toBe('Command failed');
      expect(failure.output).toMatch(/^\(exit code: 3, duration: \d+ms\)\n\[stderr\]\noops$/);
    }
  });

  it('should reject denied commands without running them', async () => {
    await expect(tool.handler({ command: 'true && sudo touch x' }, makeContext(emitted))).rejects.toThrow(AccessDeniedError);
    await expect(tool.handler({ command: 'sudo ls' }, makeContext())).rejects.toThrow("Command rejected: 'sudo' is not allowed");
    expect(emitted).toEqual([]);
  });

  it('should reject a working directory that does not exist', async () => {
    await expect(tool.handler({ command: 'ls', cwd: 'nope' }, makeContext())).rejects.toThrow('Working directory does not exist: nope');
  });

  it('should kill the process promptly when cancelled', async () => {
    const controller = new AbortController();
    const startTime = Date.now();
    setTimeout(() => controller.abort(new CancelledError('stop')), 50);

    await expect(tool.handler({ command: 'sleep 5' }, makeContext([], controller.signal))).rejects.toThrow('stop');
    expect(Date.now() - startTime).toBeLessThan(2000);
  });
});
