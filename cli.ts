#!/usr/bin/env node
/**
 * Crosstalk CLI
 *
 * Console front end for the router: an interactive chat channel plus a
 * few read-only inspection commands.
 */

import { program } from 'commander';
import { config as loadEnv } from 'dotenv';
import { nanoid } from 'nanoid';
import * as readline from 'readline';
import { createCrosstalk, type Crosstalk } from './src/app';
import { loadConfig } from './src/config';
import { ConsoleTransport } from './src/conversation/ConsoleTransport';
import { toUserMessage } from './src/errors';

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  blue: '\x1b[34m',
  red: '\x1b[31m',
};

function log(message: string, color: string = colors.reset) {
  console.log(`${color}${message}${colors.reset}`);
}

async function open(): Promise<Crosstalk> {
  loadEnv();
  const color = process.stdout.isTTY === true;
  return createCrosstalk(loadConfig(), { transport: new ConsoleTransport({ color }) });
}

async function fail(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    log(`\n❌ ${toUserMessage(error)}`, colors.red);
    if (error instanceof Error) log(error.message, colors.dim);
    process.exitCode = 1;
  }
}

program
  .name('crosstalk')
  .description('Several chat handlers sharing one conversation')
  .version('0.1.0');

program
  .command('chat')
  .description('Talk to the handlers in an interactive console channel')
  .option('-c, --channel <id>', 'channel id', 'console')
  .option('-u, --user <name>', 'display name', 'You')
  .option('--user-id <id>', 'user id', 'console-user')
  .action((options: { channel: string; user: string; userId: string }) => fail(async () => {
    const app = await open();
    const caller = { userId: options.userId, isAdmin: app.config.adminIds.includes(options.userId) };
    const window = app.store.getWindowSettings(options.channel);

    log(`\n${colors.bright}Crosstalk${colors.reset} ${colors.dim}#${options.channel}, ` +
      `${app.registry.list().length} handlers, window ${window.windowSize}${colors.reset}`);
    log("Name a handler to talk to it, type !st_handlers for the list, 'exit' to leave.\n", colors.dim);

    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: `${colors.bright}${colors.blue}${options.user}>${colors.reset} `,
    });

    // Ctrl+C stops the reply in progress; a second one with nothing running exits
    let current: AbortController | null = null;
    rl.on('SIGINT', () => {
      if (current) {
        current.abort();
      } else {
        rl.close();
      }
    });

    rl.prompt();
    for await (const line of rl) {
      const text = line.trim();
      if (text === 'exit' || text === 'quit') break;
      if (!text) {
        rl.prompt();
        continue;
      }

      // Commands run under the controller too: !st_reroll generates
      current = new AbortController();
      const { signal } = current;
      try {
        const reply = await app.commands.handle(text, caller, options.channel, { signal });
        if (reply) {
          log(reply.text, reply.ok ? colors.green : colors.red);
        } else {
          await app.engine.handleInbound({
            messageId: nanoid(),
            channelId: options.channel,
            authorId: options.userId,
            authorDisplayName: options.user,
            body: text,
            attachments: [],
            isDirectMessage: false,
            mentionsBot: false,
            timestamp: Date.now(),
            serverName: 'Console',
            channelName: options.channel,
          }, { signal });
        }
      } finally {
        current = null;
      }
      rl.prompt();
    }

    rl.close();
    log('Goodbye!', colors.dim);
  }));

program
  .command('handlers')
  .description('List registered handlers in tier order')
  .action(() => fail(async () => {
    const app = await open();
    for (const handler of app.registry.list()) {
      const marks = [
        handler.isDefaultFallback ? 'default' : '',
        handler.clonedFrom ? `clone of ${handler.clonedFrom}` : '',
      ].filter(Boolean);
      const suffix = marks.length > 0 ? ` ${colors.dim}(${marks.join(', ')})${colors.reset}` : '';
      console.log(`${handler.priorityTier.padEnd(13)} ${handler.handlerId.padEnd(16)} ${handler.model}${suffix}`);
    }
  }));

program
  .command('history <channel>')
  .description('Print the stored window of a channel')
  .option('-n, --limit <count>', 'number of messages (defaults to the channel window)')
  .action((channel: string, options: { limit?: string }) => fail(async () => {
    const app = await open();
    const limit = options.limit === undefined ? undefined : Number(options.limit);
    const messages = await app.store.window(channel, limit);

    if (messages.length === 0) {
      log(`No messages in #${channel}`, colors.dim);
      return;
    }
    for (const message of messages) {
      const at = new Date(message.createdAt).toISOString();
      const name = message.isResponse ? `[${message.authorDisplayName}]` : message.authorDisplayName;
      console.log(`${colors.dim}${at}${colors.reset} ${colors.bright}${name}${colors.reset} ${message.body}`);
    }
  }));

program.parseAsync().catch((error: unknown) => {
  log(`\n❌ ${toUserMessage(error)}`, colors.red);
  process.exitCode = 1;
});
