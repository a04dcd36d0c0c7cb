/**
 * Command Parser
 *
 * Maps `!st_*` chat commands onto the admin surface and renders a one-line
 * (or one-block) reply. Command messages never enter the context store.
 */

import { InvalidArgumentError, isCrosstalkError, toUserMessage } from '../errors';
import type { HandlerDescriptor } from '../handler-registry/types';
import { createLogger } from '../logger';
import type { AdminCommands } from './AdminCommands';
import type { ConversationEngine, HandleOptions } from './ConversationEngine';
import type { Caller } from './types';

const log = createLogger('commands');

export const COMMAND_PREFIX = '!st_';

const HOUR_MS = 3_600_000;

export interface ParsedCommand {
  command: string;
  args: string[];
  /** Everything after the command name, whitespace preserved */
  argText: string;
}

export interface CommandContext extends ParsedCommand {
  caller: Caller;
  channelId: string;
  /** Cancels a command that generates, i.e. reroll */
  signal?: AbortSignal;
}

export type CommandHandler = (context: CommandContext) => Promise<string>;

export interface CommandReply {
  command: string;
  ok: boolean;
  text: string;
}

export class CommandParser {
  private commands = new Map<string, CommandHandler>();
  private pattern: RegExp;

  constructor(
    private admin: AdminCommands,
    private engine: ConversationEngine,
    private readonly prefix: string = COMMAND_PREFIX
  ) {
    const escaped = prefix.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    this.pattern = new RegExp(`^${escaped}([a-z0-9_]+)(?:\\s+([\\s\\S]*))?$`, 'i');
    this.registerBuiltIns();
  }

  registerCommand(command: string, handler: CommandHandler): void {
    this.commands.set(command.toLowerCase(), handler);
  }

  getCommands(): string[] {
    return Array.from(this.commands.keys()).map(command => `${this.prefix}${command}`);
  }

  isCommand(text: string): boolean {
    return text.trimStart().toLowerCase().startsWith(this.prefix.toLowerCase());
  }

  parseCommand(text: string): ParsedCommand | null {
    const match = this.pattern.exec(text.trim());
    if (!match) return null;

    const argText = (match[2] ?? '').trim();
    return {
      command: match[1].toLowerCase(),
      args: argText ? argText.split(/\s+/) : [],
      argText,
    };
  }

  /**
   * Run a command message. Resolves null when the text is not a command.
   */
  async handle(
    text: string,
    caller: Caller,
    channelId: string,
    options: HandleOptions = {}
  ): Promise<CommandReply | null> {
    if (!this.isCommand(text)) return null;

    const parsed = this.parseCommand(text);
    const handler = parsed ? this.commands.get(parsed.command) : undefined;
    if (!parsed || !handler) {
      const name = text.trim().split(/\s+/)[0];
      return { command: name, ok: false, text: `Unknown command: ${name}` };
    }

    try {
      const reply = await handler({ ...parsed, caller, channelId, signal: options.signal });
      return { command: parsed.command, ok: true, text: reply };
    } catch (error) {
      if (!isCrosstalkError(error)) throw error;
      log.warn('Command failed', { command: parsed.command, channelId, code: error.code, error: error.message });
      return { command: parsed.command, ok: false, text: toUserMessage(error) };
    }
  }

  // ============================================================================
  // Built-in Commands
  // ============================================================================

  private registerBuiltIns(): void {
    this.registerCommand('handlers', async () => this.admin.listHandlers().map(describeHandler).join('\n'));

    this.registerCommand('setprompt', async ({ caller, args, argText }) => {
      const handlerId = args[0];
      const prompt = handlerId ? argText.slice(handlerId.length).trim() : '';
      if (!handlerId || !prompt) throw usage('setprompt <handler> <prompt>');

      const handler = await this.admin.setSystemPrompt(caller, handlerId, prompt);
      return `System prompt updated for ${handler.displayName}.`;
    });

    this.registerCommand('resetprompt', async ({ caller, args }) => {
      const handlerId = args[0];
      if (!handlerId) throw usage('resetprompt <handler>');

      const handler = await this.admin.resetSystemPrompt(caller, handlerId);
      return `System prompt reset for ${handler.displayName}.`;
    });

    this.registerCommand('clone', async ({ caller, args, argText }) => {
      const [sourceId, newId] = args;
      const prompt = sourceId && newId
        ? argText.slice(argText.indexOf(newId, sourceId.length) + newId.length).trim()
        : '';
      if (!sourceId || !newId || !prompt) throw usage('clone <source> <new_id> <prompt>');

      const clone = await this.admin.cloneHandler(caller, sourceId, newId, prompt);
      return `Cloned ${sourceId} as ${clone.handlerId}.`;
    });

    this.registerCommand('setcontext', async ({ caller, channelId, args }) => {
      const size = Number(args[0]);
      if (args.length !== 1 || !Number.isInteger(size)) throw usage('setcontext <size>');

      const window = await this.admin.setContextWindow(caller, channelId, size);
      return `Context window set to ${window.windowSize} messages.`;
    });

    this.registerCommand('getcontext', async ({ channelId }) => {
      const window = this.admin.getContextWindow(channelId);
      const mode = window.activeRouterMode ? 'on' : 'off';
      return `Context window: ${window.windowSize} messages (router mode ${mode}).`;
    });

    this.registerCommand('resetcontext', async ({ channelId }) => {
      const window = await this.admin.resetContextWindow(channelId);
      return `Context window reset to ${window.windowSize} messages.`;
    });

    this.registerCommand('clearcontext', async ({ caller, channelId, args }) => {
      if (args.length === 0) {
        const removed = await this.admin.clearContext(caller, channelId);
        return `Cleared ${plural(removed, 'message')}.`;
      }

      const hours = Number(args[0]);
      if (args.length !== 1 || !Number.isFinite(hours) || hours <= 0) {
        throw usage('clearcontext [hours]');
      }
      const removed = await this.admin.clearContext(caller, channelId, hours * HOUR_MS);
      return `Cleared ${plural(removed, 'message')} older than ${plural(hours, 'hour')}.`;
    });

    this.registerCommand('activate', async ({ caller, channelId }) => {
      await this.admin.activateRouterMode(caller, channelId);
      return 'Router mode activated: every message in this channel gets a reply.';
    });

    this.registerCommand('deactivate', async ({ caller, channelId }) => {
      await this.admin.deactivateRouterMode(caller, channelId);
      return 'Router mode deactivated: only addressed or triggered messages get a reply.';
    });

    this.registerCommand('reroll', async ({ channelId, args, signal }) => {
      const temperature = args[0] === undefined ? undefined : Number(args[0]);
      if (temperature !== undefined && !(temperature >= 0 && temperature <= 2)) {
        throw usage('reroll [temperature 0-2]');
      }

      const outcome = await this.engine.reroll(channelId, temperature, { signal });
      switch (outcome.status) {
        case 'responded':
          return 'Rerolled.';
        case 'cancelled':
          return 'Reroll cancelled.';
        case 'failed':
          // The failure notice already went out with the reroll
          return 'Reroll failed.';
      }
    });
  }
}

function describeHandler(handler: Readonly<HandlerDescriptor>): string {
  const notes: string[] = [handler.priorityTier];
  if (handler.isDefaultFallback) notes.push('default');
  if (handler.clonedFrom) notes.push(`clone of ${handler.clonedFrom}`);
  return `${handler.displayName} (${handler.handlerId}) - ${notes.join(', ')}`;
}

function usage(syntax: string): InvalidArgumentError {
  return new InvalidArgumentError('arguments', `usage: ${COMMAND_PREFIX}${syntax}`);
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
