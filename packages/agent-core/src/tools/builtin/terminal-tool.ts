import { ChildProcess, spawn } from 'node:child_process';
import * as fs from 'node:fs/promises';

import { AccessDeniedError, CancelledError, ToolExecutionError, ValidationError, errorMessage, isMissingPathError } from '../../errors.js';
import { ToolContext, ToolDefinition } from '../../types/tools.js';
import { optionalString, optionalStringRecord, requireString } from './args.js';
import { Workspace } from './workspace.js';

export interface TerminalToolOptions {
  deniedCommands: string[];
  // Overrides the executor's default timeout for terminal-exec
  timeoutMs?: number;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  durationMs: number;
}

/**
 * Returns the deny-list entry a command runs, if any. Every segment of a command list or pipeline
 * is checked, and an entry only matches as a whole word sequence at the start of a segment.
 */
export function findDeniedCommand(command: string, deniedCommands: string[]): string | undefined {
  const segments = command.split(/&&|\|\||[;|&\n]|\$\(|`/).map(segment => segment.trim().replace(/\s+/g, ' '));
  for (const segment of segments) {
    for (const denied of deniedCommands) {
      if (segment === denied || segment.startsWith(`${denied} `)) {
        return denied;
      }
    }
  }
  return undefined;
}

function shellInvocation(command: string): { file: string; args: string[] } {
  if (process.platform === 'win32') {
    return { file: 'powershell', args: ['-NoProfile', '-Command', command] };
  }
  return { file: 'bash', args: ['-c', command] };
}

function killTree(child: ChildProcess): void {
  if (child.pid === undefined || child.exitCode !== null || child.signalCode !== null) {
    return;
  }
  try {
    if (process.platform === 'win32') {
      spawn('taskkill', ['/pid', String(child.pid), '/T', '/F']);
    } else {
      // Negative pid addresses the process group created by `detached`
      process.kill(-child.pid, 'SIGKILL');
    }
  } catch {
    child.kill('SIGKILL');
  }
}

/**
 * Runs a shell command, streaming its output as TerminalOutput events. Aborting the context's
 * signal kills the whole process tree and rejects with the abort reason.
 */
export function runCommand(command: string, cwd: string, env: Record<string, string>, context: ToolContext): Promise<CommandOutput> {
  const { file, args } = shellInvocation(command);
  const startTime = performance.now();

  return new Promise<CommandOutput>((resolve, reject) => {
    if (context.signal.aborted) {
      reject(context.signal.reason ?? new CancelledError('Command was cancelled'));
      return;
    }

    const child = spawn(file, args, {
      cwd,
      env: { ...process.env, ...env },
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: process.platform !== 'win32',
      windowsHide: true,
    });

    let stdout = '';
    let stderr = '';
    let finished = false;

    const onAbort = () => {
      context.logger.info(`[terminal-exec] killing process ${child.pid ?? '?'} for call ${context.callId}`);
      killTree(child);
      finish(() => reject(context.signal.reason ?? new CancelledError('Command was cancelled')));
    };
    const finish = (fn: () => void) => {
      if (finished) {
        return;
      }
      finished = true;
      context.signal.removeEventListener('abort', onAbort);
      fn();
    };
    context.signal.addEventListener('abort', onAbort, { once: true });

    child.stdout?.setEncoding('utf-8');
    child.stderr?.setEncoding('utf-8');
    child.stdout?.on('data', (chunk: string) => {
      stdout += chunk;
      context.emit({ type: 'TerminalOutput', runId: context.runId, callId: context.callId, stream: 'stdout', text: chunk });
    });
    child.stderr?.on('data', (chunk: string) => {
      stderr += chunk;
      context.emit({ type: 'TerminalOutput', runId: context.runId, callId: context.callId, stream: 'stderr', text: chunk });
    });

    child.on('error', error => {
      finish(() => reject(new ToolExecutionError(`Failed to start ${file}: ${error.message}`, { cause: error })));
    });
    child.on('close', (exitCode, signal) => {
      finish(() => resolve({ stdout, stderr, exitCode, signal, durationMs: Math.round(performance.now() - startTime) }));
    });
  });
}

export function formatCommandOutput(output: CommandOutput): string {
  const status = output.exitCode !== null ? `exit code: ${output.exitCode}` : `signal: ${output.signal ?? 'unknown'}`;
  const sections = [`(${status}, duration: ${output.durationMs}ms)`];
  if (output.stdout) {
    sections.push(output.stdout.trimEnd());
  }
  if (output.stderr) {
    sections.push(`[stderr]\n${output.stderr.trimEnd()}`);
  }
  return sections.join('\n');
}

export function createTerminalTool(workspace: Workspace, options: TerminalToolOptions): ToolDefinition {
  return {
    name: 'terminal-exec',
    description: 'Run a shell command (bash, or PowerShell on Windows) in the workspace and return its output and exit code.',
    source: { kind: 'local' },
    timeoutMs: options.timeoutMs,
    inputSchema: {
      type: 'object',
      properties: {
        command: { type: 'string', minLength: 1, description: 'Command line to run' },
        cwd: { type: 'string', description: 'Working directory, relative to the workspace root (defaults to the root)' },
        env: { type: 'object', additionalProperties: { type: 'string' }, description: 'Extra environment variables' },
      },
      required: ['command'],
      additionalProperties: false,
    },
    handler: async (args, context) => {
      const command = requireString(args, 'command');
      if (command.trim() === '') {
        throw new ValidationError('command must not be empty');
      }
      const denied = findDeniedCommand(command, options.deniedCommands);
      if (denied !== undefined) {
        throw new AccessDeniedError(`Command rejected: '${denied}' is not allowed`);
      }

      const cwdArg = optionalString(args, 'cwd');
      const cwd = cwdArg === undefined ? workspace.root : await workspace.resolve(cwdArg);
      const stat = await fs.stat(cwd).catch((error: unknown) => {
        if (isMissingPathError(error)) {
          return null;
        }
        throw new ToolExecutionError(`Cannot access working directory ${cwdArg ?? '.'}: ${errorMessage(error)}`, { cause: error });
      });
      if (!stat?.isDirectory()) {
        throw new ToolExecutionError(`Working directory does not exist: ${cwdArg ?? '.'}`);
      }

      const output = await runCommand(command, cwd, optionalStringRecord(args, 'env') ?? {}, context);
      const formatted = formatCommandOutput(output);
      if (output.exitCode !== 0) {
        throw new ToolExecutionError('Command failed', { output: formatted });
      }
      return formatted;
    },
  };
}
