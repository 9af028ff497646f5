import * as fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { AgentConfig, AgentConfigSchema, ConfigError, ProviderIdSchema, errorMessage } from '@agentshell/core';

export const DEFAULT_CONFIG_FILE = 'agentshell.yaml';

export interface CommandLineOverrides {
  root?: string;
  provider?: string;
  model?: string;
}

/**
 * Parses configuration YAML and validates it. An empty document yields the defaults.
 */
export function parseConfig(text: string, source: string): AgentConfig {
  let document: unknown;
  try {
    document = yaml.load(text);
  } catch (error) {
    throw new ConfigError(`${source} is not valid YAML: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = AgentConfigSchema.safeParse(document ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration in ${source}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/**
 * Loads the configuration file. Without an explicit path, agentshell.yaml in `cwd` is used if it
 * exists and the defaults otherwise; an explicit path that does not exist is an error.
 */
export function loadConfig(configPath: string | undefined, cwd: string = process.cwd()): { config: AgentConfig; source: string | null } {
  const resolved = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);
  if (!fs.existsSync(resolved)) {
    if (configPath) {
      throw new ConfigError(`Configuration file not found: ${resolved}`);
    }
    return { config: parseConfig('', 'defaults'), source: null };
  }
  return { config: parseConfig(fs.readFileSync(resolved, 'utf-8'), resolved), source: resolved };
}

/**
 * Applies command-line options on top of the file. A relative working root is taken relative
 * to `cwd`.
 */
export function applyOverrides(config: AgentConfig, overrides: CommandLineOverrides, cwd: string = process.cwd()): AgentConfig {
  const settings = { ...config.settings };
  const root = overrides.root ?? settings.workingRoot;
  settings.workingRoot = path.resolve(cwd, root ?? '.');
  if (overrides.provider !== undefined) {
    const provider = ProviderIdSchema.safeParse(overrides.provider);
    if (!provider.success) {
      throw new ConfigError(`Unknown provider: ${overrides.provider} (expected one of ${ProviderIdSchema.options.join(', ')})`);
    }
    settings.provider = provider.data;
  }
  if (overrides.model !== undefined) {
    settings.model = overrides.model;
  }
  return { ...config, settings };
}
