import { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { minimatch } from 'minimatch';

import { ToolExecutionError, errorMessage, isMissingPathError, systemErrorCode } from '../../errors.js';
import { ToolDefinition } from '../../types/tools.js';
import { optionalBoolean, optionalString, optionalStringArray, requireString } from './args.js';
import { Workspace } from './workspace.js';

export const DEFAULT_IGNORE_PATTERNS = ['.git', 'node_modules', '__pycache__', '*.pyc', '.DS_Store', 'dist'];

function matchesAny(name: string, patterns: string[]): boolean {
  return patterns.some(pattern => minimatch(name, pattern, { dot: true }));
}

// Directories first, then files, each in case-insensitive name order
function compareEntries(a: Dirent, b: Dirent): number {
  if (a.isDirectory() !== b.isDirectory()) {
    return a.isDirectory() ? -1 : 1;
  }
  return a.name.toLowerCase().localeCompare(b.name.toLowerCase());
}

async function readDirectory(absolutePath: string, displayPath: string): Promise<Dirent[]> {
  try {
    return await fs.readdir(absolutePath, { withFileTypes: true });
  } catch (error) {
    const code = systemErrorCode(error);
    if (code === 'ENOTDIR') {
      throw new ToolExecutionError(`Path is not a directory: ${displayPath}`);
    }
    if (code === 'ENOENT') {
      throw new ToolExecutionError(`Directory does not exist: ${displayPath}`);
    }
    throw error;
  }
}

/**
 * Entries of one directory after the match and ignore filters. With `match`, only entries whose
 * name matches one of its patterns are kept; ignore patterns (plus the defaults) always apply.
 */
export async function listEntries(absolutePath: string, displayPath: string, match?: string[], ignore: string[] = []): Promise<Dirent[]> {
  const ignorePatterns = [...ignore, ...DEFAULT_IGNORE_PATTERNS];
  const entries = await readDirectory(absolutePath, displayPath);
  return entries
    .filter(entry => !match || match.length === 0 || matchesAny(entry.name, match))
    .filter(entry => !matchesAny(entry.name, ignorePatterns))
    .sort(compareEntries);
}

async function collectFiles(absolutePath: string, recursive: boolean, files: string[]): Promise<void> {
  const entries = await fs.readdir(absolutePath, { withFileTypes: true });
  for (const entry of entries.sort(compareEntries)) {
    if (matchesAny(entry.name, DEFAULT_IGNORE_PATTERNS)) {
      continue;
    }
    const entryPath = path.join(absolutePath, entry.name);
    if (entry.isFile()) {
      files.push(entryPath);
    } else if (entry.isDirectory() && recursive) {
      await collectFiles(entryPath, recursive, files);
    }
  }
}

export function createSearchTools(workspace: Workspace): ToolDefinition[] {
  return [
    {
      name: 'list-dir',
      description: 'List the files and directories in a workspace directory. Directories are listed first and end with "/". Optionally filter with glob patterns.',
      source: { kind: 'local' },
      inputSchema: {
        type: 'object',
        properties: {
          path: { type: 'string', description: 'Directory path, relative to the workspace root (defaults to the root)' },
          match: { type: 'array', items: { type: 'string' }, description: 'Glob patterns of names to include, e.g. ["*.ts"]' },
          ignore: { type: 'array', items: { type: 'string' }, description: 'Glob patterns of names to exclude, e.g. ["*.log"]' },
        },
        additionalProperties: false,
      },
      handler: async (args) => {
        const target = optionalString(args, 'path') ?? '.';
        const absolutePath = await workspace.resolve(target);
        const entries = await listEntries(absolutePath, target, optionalStringArray(args, 'match'), optionalStringArray(args, 'ignore'));
        if (entries.length === 0) {
          return `No items found in ${workspace.relative(absolutePath)}.`;
        }
        return entries.map(entry => (entry.isDirectory() ? `${entry.name}/` : entry.name)).join('\n');
      },
    },
    {
      name: 'tree',
      description: 'Show the directory structure below a workspace directory as an indented tree.',
      source: { kind: 'local' },
      inputSchema: {
        type: 'object',
        properties: {
          path: { type: 'string', description: 'Directory path, relative to the workspace root (defaults to the root)' },
          maxDepth: { type: 'integer', minimum: 1, description: 'Maximum depth to descend (unlimited when omitted)' },
          match: { type: 'array', items: { type: 'string' }, description: 'Glob patterns of names to include' },
          ignore: { type: 'array', items: { type: 'string' }, description: 'Glob patterns of names to exclude' },
        },
        additionalProperties: false,
      },
      handler: async (args) => {
        const target = optionalString(args, 'path') ?? '.';
        const maxDepth = typeof args.maxDepth === 'number' ? args.maxDepth : Infinity;
        const match = optionalStringArray(args, 'match');
        const ignore = optionalStringArray(args, 'ignore');
        const absolutePath = await workspace.resolve(target);

        const lines = [`${path.basename(absolutePath)}/`];
        const walk = async (directory: string, prefix: string, depth: number): Promise<void> => {
          if (depth > maxDepth) {
            return;
          }
          const entries = await listEntries(directory, workspace.relative(directory), match, ignore);
          for (const [index, entry] of entries.entries()) {
            const last = index === entries.length - 1;
            lines.push(`${prefix}${last ? '└── ' : '├── '}${entry.name}${entry.isDirectory() ? '/' : ''}`);
            if (entry.isDirectory()) {
              await walk(path.join(directory, entry.name), prefix + (last ? '    ' : '│   '), depth + 1);
            }
          }
        };
        await walk(absolutePath, '', 1);
        return lines.join('\n');
      },
    },
    {
      name: 'grep',
      description: 'Search files for lines containing a plain-text pattern (not a regular expression). Output lines are "path:line: text".',
      source: { kind: 'local' },
      inputSchema: {
        type: 'object',
        properties: {
          pattern: { type: 'string', minLength: 1, description: 'Text to search for' },
          paths: { type: 'array', items: { type: 'string' }, minItems: 1, description: 'Files or directories to search, relative to the workspace root' },
          caseSensitive: { type: 'boolean', description: 'Match case (default true)' },
          recursive: { type: 'boolean', description: 'Descend into subdirectories of directory paths (default false)' },
          invert: { type: 'boolean', description: 'Return the lines that do not contain the pattern (default false)' },
        },
        required: ['pattern', 'paths'],
        additionalProperties: false,
      },
      handler: async (args, context) => {
        const pattern = requireString(args, 'pattern');
        const paths = optionalStringArray(args, 'paths') ?? [];
        const caseSensitive = optionalBoolean(args, 'caseSensitive', true);
        const recursive = optionalBoolean(args, 'recursive', false);
        const invert = optionalBoolean(args, 'invert', false);
        const needle = caseSensitive ? pattern : pattern.toLowerCase();

        const files: string[] = [];
        for (const target of paths) {
          const absolutePath = await workspace.resolve(target);
          let stat;
          try {
            stat = await fs.stat(absolutePath);
          } catch (error) {
            if (isMissingPathError(error)) {
              throw new ToolExecutionError(`Path does not exist: ${target}`);
            }
            throw new ToolExecutionError(`Cannot access ${target}: ${errorMessage(error)}`, { cause: error });
          }
          if (stat.isFile()) {
            files.push(absolutePath);
          } else if (stat.isDirectory()) {
            await collectFiles(absolutePath, recursive, files);
          }
        }

        const results: string[] = [];
        for (const file of files) {
          if (context.signal.aborted) {
            break;
          }
          let content: string;
          try {
            content = await fs.readFile(file, 'utf-8');
          } catch (error) {
            context.logger.debug(`[grep] skipping unreadable file ${file}: ${errorMessage(error)}`);
            continue;
          }
          const lines = content.split(/\r?\n/);
          if (lines.length > 0 && lines[lines.length - 1] === '') {
            lines.pop();
          }
          for (const [index, line] of lines.entries()) {
            const text = line.trim();
            const candidate = caseSensitive ? text : text.toLowerCase();
            if (candidate.includes(needle) !== invert) {
              results.push(`${workspace.relative(file)}:${index + 1}: ${text}`);
            }
          }
        }

        if (results.length === 0) {
          return `No matches found for '${pattern}'.`;
        }
        return results.join('\n');
      },
    },
  ];
}
