/**
 * Context Store
 *
 * Durable, ordered per-channel message log shared by every handler.
 * Each channel has one writer lane; the dedup ledger is the channel's
 * set of stored message ids, checked and extended inside that lane.
 */

import * as path from 'path';
import { z } from 'zod';
import {
  DuplicateMessageError,
  InvalidArgumentError,
  StoreUnavailableError,
  isCrosstalkError,
} from '../errors';
import { createLogger } from '../logger';
import { ChannelLock } from './ChannelLock';
import { ChannelSettings } from './ChannelSettings';
import type { FileSystem } from './FileSystem';
import { JSONLFile } from './JSONLFile';
import type {
  AppendResult,
  ContextStoreConfig,
  ConversationWindow,
  Message,
  WindowOptions,
} from './types';

const log = createLogger('context-store');

const messageSchema = z.object({
  id: z.string().min(1),
  channelId: z.string().min(1),
  authorId: z.string(),
  authorDisplayName: z.string(),
  body: z.string(),
  attachments: z.array(
    z.object({
      kind: z.enum(['image', 'text']),
      extractedText: z.string().optional(),
      url: z.string().optional(),
    })
  ),
  createdAt: z.number(),
  handlerId: z.string().nullable(),
  isResponse: z.boolean(),
});

function parseMessage(value: unknown): Message | null {
  const result = messageSchema.safeParse(value);
  return result.success ? result.data : null;
}

interface ChannelLog {
  file: JSONLFile<Message>;
  messages: Message[];
  /** Dedup ledger */
  seen: Set<string>;
}

export class ContextStore {
  private channels = new Map<string, ChannelLog>();
  private lock = new ChannelLock();
  private settings: ChannelSettings;
  private now: () => number;
  private initialized = false;

  constructor(
    private fs: FileSystem,
    private config: ContextStoreConfig
  ) {
    if (config.defaultWindowSize < 1 || config.defaultWindowSize > config.maxWindowSize) {
      throw new InvalidArgumentError('defaultWindowSize', `must be between 1 and ${config.maxWindowSize}`);
    }
    this.now = config.now ?? Date.now;
    this.settings = new ChannelSettings(fs, {
      indexPath: path.join(config.storageDir, 'channels.json'),
      now: this.now,
    });
  }

  /**
   * Load channel settings; message logs load lazily per channel
   */
  async init(): Promise<void> {
    if (this.initialized) return;
    await this.guard('init', 'channels.json', () => this.settings.load());
    this.initialized = true;
  }

  // ============================================================================
  // Messages
  // ============================================================================

  /**
   * Persist a message. Rejects with DuplicateMessageError when the id was
   * already recorded for the channel; resolves only once the record is durable.
   */
  async append(message: Message): Promise<Message> {
    return this.lock.run(message.channelId, async () => {
      const channel = await this.loadChannel(message.channelId);
      return this.appendTo(channel, message);
    });
  }

  /**
   * Append and, in the same lane, take the window of messages stored
   * before it. Nothing appended concurrently can appear in that window.
   * `size` defaults to the channel's configured window.
   */
  async appendWithWindow(message: Message, size?: number): Promise<AppendResult> {
    const limit = this.windowLimit(message.channelId, size);

    return this.lock.run(message.channelId, async () => {
      const channel = await this.loadChannel(message.channelId);
      const window = limit === 0 ? [] : channel.messages.slice(-limit);
      const stored = await this.appendTo(channel, message);
      return { stored, window };
    });
  }

  /**
   * Most recent messages, oldest first. `size` defaults to the channel's
   * configured window.
   */
  async window(channelId: string, size?: number, options: WindowOptions = {}): Promise<Message[]> {
    const limit = this.windowLimit(channelId, size);
    if (limit === 0) return [];

    const channel = await this.lock.run(channelId, () => this.loadChannel(channelId));
    const source = options.excludeMessageId === undefined
      ? channel.messages
      : channel.messages.filter(m => m.id !== options.excludeMessageId);

    return source.slice(-limit);
  }

  async has(channelId: string, messageId: string): Promise<boolean> {
    const channel = await this.lock.run(channelId, () => this.loadChannel(channelId));
    return channel.seen.has(messageId);
  }

  async count(channelId: string): Promise<number> {
    const channel = await this.lock.run(channelId, () => this.loadChannel(channelId));
    return channel.messages.length;
  }

  /**
   * Remove all messages, or only those older than `now - olderThanMs`.
   * Removed ids leave the dedup ledger too.
   */
  async clear(channelId: string, olderThanMs?: number): Promise<number> {
    if (olderThanMs !== undefined && (!Number.isFinite(olderThanMs) || olderThanMs < 0)) {
      throw new InvalidArgumentError('older_than', 'must be a non-negative duration', { olderThanMs });
    }

    return this.lock.run(channelId, async () => {
      const channel = await this.loadChannel(channelId);
      const cutoff = olderThanMs === undefined ? Infinity : this.now() - olderThanMs;
      const kept = channel.messages.filter(m => m.createdAt >= cutoff);
      const removed = channel.messages.length - kept.length;

      if (removed === 0) return 0;

      await this.guard('clear', channelId, () => channel.file.writeAll(kept));

      channel.messages = kept;
      channel.seen = new Set(kept.map(m => m.id));
      log.info('Cleared channel history', { channelId, removed, olderThanMs });
      return removed;
    });
  }

  // ============================================================================
  // Channel Settings
  // ============================================================================

  getWindowSettings(channelId: string): ConversationWindow {
    const record = this.settings.get(channelId);
    return {
      channelId,
      windowSize: record?.windowSize ?? this.config.defaultWindowSize,
      activeRouterMode: record?.activeRouterMode ?? false,
    };
  }

  async setWindowSize(channelId: string, size: number): Promise<ConversationWindow> {
    if (!Number.isInteger(size) || size < 1 || size > this.config.maxWindowSize) {
      throw new InvalidArgumentError(
        'context window size',
        `must be between 1 and ${this.config.maxWindowSize}`,
        { size }
      );
    }
    await this.guard('setWindowSize', channelId, () => this.settings.update(channelId, { windowSize: size }));
    return this.getWindowSettings(channelId);
  }

  async resetWindowSize(channelId: string): Promise<ConversationWindow> {
    await this.guard('resetWindowSize', channelId, () => this.settings.clearWindowSize(channelId));
    return this.getWindowSettings(channelId);
  }

  async setRouterMode(channelId: string, active: boolean): Promise<ConversationWindow> {
    await this.guard('setRouterMode', channelId, () => this.settings.update(channelId, { activeRouterMode: active }));
    return this.getWindowSettings(channelId);
  }

  get defaultWindowSize(): number {
    return this.config.defaultWindowSize;
  }

  get maxWindowSize(): number {
    return this.config.maxWindowSize;
  }

  /**
   * Channels that have received at least one message or setting
   */
  channelIds(): string[] {
    return this.settings.channelIds();
  }

  // ============================================================================
  // Internals
  // ============================================================================

  /**
   * Caller must hold the channel's lane
   */
  private async appendTo(channel: ChannelLog, message: Message): Promise<Message> {
    const { channelId } = message;
    if (channel.seen.has(message.id)) {
      throw new DuplicateMessageError(channelId, message.id);
    }

    // Stored order is arrival order, so timestamps never step backwards
    const last = channel.messages[channel.messages.length - 1];
    const createdAt = last && message.createdAt < last.createdAt ? last.createdAt : message.createdAt;

    const stored: Message = Object.freeze({
      ...message,
      attachments: message.attachments.map(attachment => ({ ...attachment })),
      createdAt,
    });

    await this.guard('append', channelId, async () => {
      await this.settings.ensure(channelId);
      await channel.file.append(stored);
    });

    channel.messages.push(stored);
    channel.seen.add(stored.id);
    return stored;
  }

  private windowLimit(channelId: string, size?: number): number {
    const limit = size ?? this.getWindowSettings(channelId).windowSize;
    if (!Number.isInteger(limit) || limit < 0) {
      throw new InvalidArgumentError('window size', 'must be a non-negative integer', { size: limit });
    }
    return limit;
  }

  /**
   * Caller must hold the channel's lane
   */
  private async loadChannel(channelId: string): Promise<ChannelLog> {
    const cached = this.channels.get(channelId);
    if (cached) return cached;

    const file = new JSONLFile<Message>(this.fs, this.messagesPath(channelId), parseMessage);
    const messages = await this.guard('load', channelId, () => file.load());
    const channel: ChannelLog = { file, messages, seen: new Set(messages.map(m => m.id)) };
    this.channels.set(channelId, channel);
    return channel;
  }

  private messagesPath(channelId: string): string {
    return path.join(this.config.storageDir, 'channels', encodeURIComponent(channelId), 'messages.jsonl');
  }

  private async guard<T>(operation: string, target: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (isCrosstalkError(error)) throw error;
      log.error('Store operation failed', { operation, target, error: String(error) });
      throw new StoreUnavailableError(operation, target, error);
    }
  }
}
