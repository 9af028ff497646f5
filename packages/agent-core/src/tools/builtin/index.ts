import { ToolDefinition } from '../../types/tools.js';
import { createFileTools } from './file-tools.js';
import { createSearchTools } from './search-tools.js';
import { createTerminalTool, TerminalToolOptions } from './terminal-tool.js';
import { Workspace } from './workspace.js';

export { Workspace } from './workspace.js';
export { DEFAULT_IGNORE_PATTERNS } from './search-tools.js';
export { findDeniedCommand } from './terminal-tool.js';

export function createBuiltinTools(workspace: Workspace, options: TerminalToolOptions): ToolDefinition[] {
  return [
    ...createFileTools(workspace),
    ...createSearchTools(workspace),
    createTerminalTool(workspace, options),
  ];
}
