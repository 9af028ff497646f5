#!/usr/bin/env node

import { program } from 'commander';
import path from 'path';
import * as fs from 'fs';
import chalk from 'chalk';
import ora from 'ora';

import { AgentConfig, ConfigError, errorMessage } from '@agentshell/core';
import { createSession } from '@agentshell/core/runtime';

import { applyOverrides, loadConfig } from './config.js';
import { CLI_COMMAND, PRODUCT_NAME } from './constants.js';
import { WinstonLoggerAdapter } from './logger.js';
import { setupCLI } from './cli.js';

interface CommandLineOptions {
  root?: string;
  provider?: string;
  model?: string;
  debug?: boolean;
  logDir?: string;
}

function readVersion(): string {
  const packagePath = path.join(__dirname, '..', 'package.json');
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(packagePath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    console.error(chalk.yellow(`Could not read version from ${packagePath}: ${errorMessage(error)}`));
  }
  return '0.0.0';
}

function loadConfiguration(configPath: string | undefined, options: CommandLineOptions, logger: WinstonLoggerAdapter): AgentConfig {
  try {
    const loaded = loadConfig(configPath);
    logger.info(`Configuration: ${loaded.source ?? 'defaults'}`);
    return applyOverrides(loaded.config, options);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(chalk.red(error.message));
      logger.error('Invalid configuration:', error);
      process.exit(1);
    }
    throw error;
  }
}

async function main() {
  const version = readVersion();

  program
    .name(CLI_COMMAND)
    .description(PRODUCT_NAME)
    .version(version, '-v, --version', 'Display version number')
    .argument('[config]', 'Configuration file (.yaml); defaults to ./agentshell.yaml when present')
    .option('-r, --root <dir>', 'Working directory the agent operates in')
    .option('-p, --provider <provider>', 'Model provider (claude or test)')
    .option('-m, --model <model>', 'Model name')
    .option('--log-dir <dir>', 'Directory for log files')
    .option('-d, --debug', 'Enable debug logging')
    .helpOption('-h, --help', 'Display help for command');

  program.parse();

  const options = program.opts<CommandLineOptions>();
  const logger = new WinstonLoggerAdapter({ level: options.debug ? 'debug' : 'info', directory: options.logDir });
  logger.info(`Starting ${PRODUCT_NAME} v${version}`);

  const config = loadConfiguration(program.args[0], options, logger);

  const serverCount = Object.keys(config.mcpServers).length;
  const spinner = ora({ text: `Connecting to ${serverCount} tool server${serverCount === 1 ? '' : 's'}...`, stream: process.stderr });
  if (serverCount > 0) {
    spinner.start();
  }
  const session = await createSession(config, logger).finally(() => spinner.stop());

  for (const status of session.servers.status()) {
    if (!status.connected) {
      console.log(chalk.yellow(`Tool server ${status.name} is not connected: ${status.errors.join('; ')}`));
    }
  }

  await setupCLI(session, version, logger);
  process.exit(0);
}

process.on('uncaughtException', (error) => {
  console.error(chalk.red('Uncaught Exception:'), error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error(chalk.red('Unhandled Rejection:'), reason);
  process.exit(1);
});

process.on('SIGTERM', () => {
  console.log(chalk.yellow('\nReceived SIGTERM, shutting down...'));
  process.exit(0);
});

main().catch((error) => {
  console.error(chalk.red('Fatal error:'), error);
  process.exit(1);
});
