import chalk from 'chalk';
import { read } from 'read';

import { SessionController, errorMessage } from '@agentshell/core';

import { PRODUCT_NAME } from './constants.js';
import { WinstonLoggerAdapter } from './logger.js';
import { ChatPane, EditorPane, TerminalPane, attachPanes, indent } from './panes.js';

export type ParsedCommand =
  | { kind: 'message'; text: string }
  | { kind: 'cancel' }
  | { kind: 'tools' }
  | { kind: 'servers' }
  | { kind: 'transcript' }
  | { kind: 'help' }
  | { kind: 'exit' }
  | { kind: 'empty' }
  | { kind: 'unknown'; name: string };

const COMMANDS: Record<string, ParsedCommand> = {
  '/': { kind: 'help' },
  '/help': { kind: 'help' },
  '/cancel': { kind: 'cancel' },
  '/tools': { kind: 'tools' },
  '/servers': { kind: 'servers' },
  '/transcript': { kind: 'transcript' },
  '/quit': { kind: 'exit' },
  '/exit': { kind: 'exit' },
};

export function parseCommand(input: string): ParsedCommand {
  const text = input.trim();
  if (text.length === 0) {
    return { kind: 'empty' };
  }
  if (!text.startsWith('/')) {
    return { kind: 'message', text };
  }
  const name = text.split(/\s+/)[0].toLowerCase();
  return COMMANDS[name] ?? { kind: 'unknown', name };
}

function showHelp() {
  console.log(chalk.cyan('\nAvailable commands:'));
  console.log(chalk.yellow('  /help') + ' - Show this help menu');
  console.log(chalk.yellow('  /cancel') + ' - Cancel the running request');
  console.log(chalk.yellow('  /tools') + ' - List the tools available to the model');
  console.log(chalk.yellow('  /servers') + ' - Show tool server connections');
  console.log(chalk.yellow('  /transcript') + ' - Show the conversation so far');
  console.log(chalk.yellow('  /quit') + ' or ' + chalk.yellow('/exit') + ' - Exit the application');
  console.log(chalk.dim('Anything else is sent to the model. A new message cancels the running request.\n'));
}

function showTools(session: SessionController) {
  const tools = session.registry.catalog();
  if (tools.length === 0) {
    console.log(chalk.yellow('No tools available'));
    return;
  }
  for (const tool of tools) {
    console.log(chalk.cyan.bold(tool.name));
    console.log(chalk.dim(indent(tool.description.split('\n')[0])));
  }
}

function showServers(session: SessionController) {
  const servers = session.servers.status();
  if (servers.length === 0) {
    console.log(chalk.yellow('No tool servers configured'));
    return;
  }
  for (const server of servers) {
    const state = server.connected ? chalk.green('connected') : chalk.red('not connected');
    console.log(`${chalk.cyan.bold(server.name)}: ${state}, ${server.toolCount} tools`);
    for (const error of server.errors) {
      console.log(chalk.red(indent(error)));
    }
  }
}

function showTranscript(session: SessionController) {
  for (const turn of session.getTranscript()) {
    switch (turn.type) {
      case 'user':
        console.log(chalk.cyan(`user: ${turn.text}`));
        break;
      case 'assistant':
        console.log(`assistant: ${turn.text}`);
        break;
      case 'toolCall':
        console.log(chalk.dim(`call ${turn.name} ${JSON.stringify(turn.arguments)}`));
        break;
      case 'toolResult':
        console.log(chalk.dim(`result ${turn.status}${turn.status === 'error' ? ` (${turn.error.code})` : ''}`));
        break;
    }
  }
}

/**
 * Interactive loop. Messages are submitted without waiting for the run to finish, so the prompt
 * stays available for /cancel or a follow-up while the panes stream the run's progress.
 */
export async function setupCLI(session: SessionController, version: string, logger: WinstonLoggerAdapter): Promise<void> {
  console.log(chalk.green(`Welcome to ${PRODUCT_NAME} v${version}!`));
  console.log(chalk.dim(`Working in ${session.workspace.root} with ${session.model.modelName} (${session.model.info.name})`));
  showHelp();

  const panes = attachPanes(session.broker, [new ChatPane(), new EditorPane(), new TerminalPane()], text => process.stdout.write(text));

  const commandHistory: string[] = [];

  async function processInput(input: string): Promise<boolean> {
    const command = parseCommand(input);
    if (command.kind !== 'message' && command.kind !== 'empty') {
      commandHistory.unshift(input.trim());
      commandHistory.splice(10);
    }

    switch (command.kind) {
      case 'empty':
        break;
      case 'help':
        showHelp();
        break;
      case 'exit':
        console.log(chalk.green('Goodbye!'));
        return false;
      case 'tools':
        showTools(session);
        break;
      case 'servers':
        showServers(session);
        break;
      case 'transcript':
        showTranscript(session);
        break;
      case 'cancel': {
        if (!session.currentRun()) {
          console.log(chalk.yellow('Nothing to cancel'));
          break;
        }
        await session.cancelCurrent();
        break;
      }
      case 'unknown':
        console.log(chalk.red(`Unknown command: ${command.name}`));
        showHelp();
        break;
      case 'message': {
        const handle = await session.submit(command.text);
        logger.debug(`Submitted run ${handle.id}`);
        handle.done.then(
          outcome => logger.info(`Run ${outcome.runId} ended: ${outcome.status}`),
          error => logger.error('Run bookkeeping failed:', error),
        );
        break;
      }
    }
    return true;
  }

  let running = true;
  while (running) {
    try {
      const input = await read({
        prompt: chalk.cyan('> '),
        terminal: true,
        history: [...commandHistory],
      });
      running = await processInput(input.toString());
    } catch (error) {
      if (errorMessage(error).includes('canceled')) {
        console.log(chalk.yellow('Input cancelled via Ctrl+C'));
        running = false;
      } else {
        console.log(chalk.red('Error:'), errorMessage(error));
        logger.error('Error in CLI loop:', error);
      }
    }
  }

  await session.dispose();
  await panes.finished;
}
