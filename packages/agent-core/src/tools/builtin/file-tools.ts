import { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import { applyPatch } from 'diff';

import { ToolExecutionError, ValidationError, errorMessage, isMissingPathError } from '../../errors.js';
import { ToolContext, ToolDefinition } from '../../types/tools.js';
import { optionalRange, optionalString, requireInteger, requireString } from './args.js';
import { Workspace } from './workspace.js';

type FileOperation = 'write' | 'patch' | 'replace' | 'insert';

async function statOrNull(absolutePath: string, displayPath: string): Promise<Stats | null> {
  try {
    return await fs.stat(absolutePath);
  } catch (error) {
    if (isMissingPathError(error)) {
      return null;
    }
    throw new ToolExecutionError(`Cannot access ${displayPath}: ${errorMessage(error)}`, { cause: error });
  }
}

async function readText(absolutePath: string, displayPath: string): Promise<string> {
  try {
    return await fs.readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ToolExecutionError(`Cannot read ${displayPath}: ${errorMessage(error)}`, { cause: error });
  }
}

async function readExistingFile(absolutePath: string, displayPath: string): Promise<string> {
  const stat = await statOrNull(absolutePath, displayPath);
  if (!stat) {
    throw new ToolExecutionError(`File does not exist: ${displayPath}`);
  }
  if (!stat.isFile()) {
    throw new ToolExecutionError(`Path is not a file: ${displayPath}`);
  }
  return readText(absolutePath, displayPath);
}

/**
 * Content a patch applies to: the file's text, or '' when the file does not exist yet so a diff
 * can create it. Any other failure to read is an error.
 */
export async function readPatchSource(absolutePath: string, displayPath: string): Promise<string> {
  const stat = await statOrNull(absolutePath, displayPath);
  if (!stat) {
    return '';
  }
  if (stat.isDirectory()) {
    throw new ToolExecutionError(`Path is a directory: ${displayPath}`);
  }
  if (!stat.isFile()) {
    throw new ToolExecutionError(`Path is not a file: ${displayPath}`);
  }
  return readText(absolutePath, displayPath);
}

/**
 * Returns the requested line range. Lines are 1-based and inclusive; an end of -1 reads to the end
 * of the file and an end past the last line is clamped.
 */
export function sliceLines(content: string, range: [number, number], displayPath: string): string {
  const lines = content.split('\n');
  const [start, requestedEnd] = range;
  if (start < 1 || start > lines.length) {
    throw new ValidationError(`Invalid viewRange [${start}, ${requestedEnd}] for ${displayPath}: start line should be within [1, ${lines.length}]`);
  }
  let end = requestedEnd;
  if (end === -1 || end > lines.length) {
    end = lines.length;
  } else if (end < start) {
    throw new ValidationError(`Invalid viewRange [${start}, ${requestedEnd}] for ${displayPath}: end line should be -1 or within [${start}, ${lines.length}]`);
  }
  return lines.slice(start - 1, end).join('\n');
}

/**
 * Inserts `text` after line `line` (0 inserts at the beginning). The inserted block always ends
 * with a newline, and a last line without one gets one before text is appended after it.
 */
export function insertAfterLine(content: string, line: number, text: string, displayPath: string): string {
  const lines = content === '' ? [] : content.split(/(?<=\n)/);
  if (line < 0 || line > lines.length) {
    throw new ValidationError(`Invalid line ${line} for ${displayPath}: should be within [0, ${lines.length}]`);
  }
  const block = text.endsWith('\n') ? text : `${text}\n`;
  const before = lines.slice(0, line);
  if (before.length > 0 && !before[before.length - 1].endsWith('\n')) {
    before[before.length - 1] += '\n';
  }
  return before.join('') + block + lines.slice(line).join('');
}

export function createFileTools(workspace: Workspace): ToolDefinition[] {
  const changed = async (context: ToolContext, absolutePath: string, operation: FileOperation, content: string) => {
    await workspace.writeAtomic(absolutePath, content);
    context.emit({
      type: 'FileChanged',
      runId: context.runId,
      callId: context.callId,
      path: workspace.relative(absolutePath),
      operation,
      content,
    });
  };

  return [
    {
      name: 'file-read',
      description: 'Read a text file in the workspace. Optionally restrict the output to a line range.',
      source: { kind: 'local' },
      inputSchema: {
        type: 'object',
        properties: {
          path: { type: 'string', description: 'File path, relative to the workspace root' },
          viewRange: {
            type: 'array',
            items: { type: 'integer' },
            minItems: 2,
            maxItems: 2,
            description: 'Start and end line (1-based, inclusive). Use -1 as the end to read to the end of the file.',
          },
        },
        required: ['path'],
        additionalProperties: false,
      },
      handler: async (args, context) => {
        const target = requireString(args, 'path');
        const absolutePath = await workspace.resolve(target);
        const content = await readExistingFile(absolutePath, target);
        const range = optionalRange(args, 'viewRange');
        const output = range ? sliceLines(content, range, target) : content;
        context.emit({ type: 'FileOpened', runId: context.runId, callId: context.callId, path: workspace.relative(absolutePath), content });
        return output;
      },
    },
    {
      name: 'file-write',
      description: 'Create or overwrite a file in the workspace with the given content. Parent directories are created as needed.',
      source: { kind: 'local' },
      inputSchema: {
        type: 'object',
        properties: {
          path: { type: 'string', description: 'File path, relative to the workspace root' },
          content: { type: 'string', description: 'Complete new content of the file' },
        },
        required: ['path', 'content'],
        additionalProperties: false,
      },
      handler: async (args, context) => {
        const target = requireString(args, 'path');
        const content = requireString(args, 'content');
        const absolutePath = await workspace.resolve(target);
        if ((await statOrNull(absolutePath, target))?.isDirectory()) {
          throw new ToolExecutionError(`Path is a directory: ${target}`);
        }
        await changed(context, absolutePath, 'write', content);
        return `Wrote ${content.length} characters to ${workspace.relative(absolutePath)}`;
      },
    },
    {
      name: 'file-patch',
      description: 'Apply a unified diff to a single file in the workspace.',
      source: { kind: 'local' },
      inputSchema: {
        type: 'object',
        properties: {
          path: { type: 'string', description: 'File path, relative to the workspace root' },
          diff: { type: 'string', description: 'Unified diff for this file' },
        },
        required: ['path', 'diff'],
        additionalProperties: false,
      },
      handler: async (args, context) => {
        const target = requireString(args, 'path');
        const diff = requireString(args, 'diff');
        const absolutePath = await workspace.resolve(target);
        const original = await readPatchSource(absolutePath, target);
        let patched: string | false;
        try {
          patched = applyPatch(original, diff);
        } catch (error) {
          throw new ToolExecutionError(`Invalid diff for ${target}: ${errorMessage(error)}`);
        }
        if (patched === false) {
          throw new ToolExecutionError(`Diff does not apply to ${target}; read the file again and regenerate the diff`);
        }
        await changed(context, absolutePath, 'patch', patched);
        return `Patched ${workspace.relative(absolutePath)}`;
      },
    },
    {
      name: 'file-replace',
      description: 'Replace every occurrence of a string in a file. Matching is exact, including whitespace. Omit newText to delete.',
      source: { kind: 'local' },
      inputSchema: {
        type: 'object',
        properties: {
          path: { type: 'string', description: 'File path, relative to the workspace root' },
          oldText: { type: 'string', minLength: 1, description: 'Text to replace' },
          newText: { type: 'string', description: 'Replacement text' },
        },
        required: ['path', 'oldText'],
        additionalProperties: false,
      },
      handler: async (args, context) => {
        const target = requireString(args, 'path');
        const oldText = requireString(args, 'oldText');
        const newText = optionalString(args, 'newText') ?? '';
        if (oldText.length === 0) {
          throw new ValidationError('oldText must not be empty');
        }
        const absolutePath = await workspace.resolve(target);
        const content = await readExistingFile(absolutePath, target);
        const parts = content.split(oldText);
        const occurrences = parts.length - 1;
        if (occurrences === 0) {
          throw new ToolExecutionError(`String not found in ${target}`);
        }
        await changed(context, absolutePath, 'replace', parts.join(newText));
        return `Replaced ${occurrences} occurrence${occurrences === 1 ? '' : 's'} in ${workspace.relative(absolutePath)}`;
      },
    },
    {
      name: 'file-insert',
      description: 'Insert text after a given line of a file (0 inserts at the beginning).',
      source: { kind: 'local' },
      inputSchema: {
        type: 'object',
        properties: {
          path: { type: 'string', description: 'File path, relative to the workspace root' },
          line: { type: 'integer', minimum: 0, description: 'Line after which to insert' },
          text: { type: 'string', description: 'Text to insert' },
        },
        required: ['path', 'line', 'text'],
        additionalProperties: false,
      },
      handler: async (args, context) => {
        const target = requireString(args, 'path');
        const line = requireInteger(args, 'line');
        const text = requireString(args, 'text');
        const absolutePath = await workspace.resolve(target);
        const content = await readExistingFile(absolutePath, target);
        await changed(context, absolutePath, 'insert', insertAfterLine(content, line, text, target));
        return `Inserted text after line ${line} in ${workspace.relative(absolutePath)}`;
      },
    },
  ];
}
