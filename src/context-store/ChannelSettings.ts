/**
 * Channel Settings - keyed per-channel configuration (channels.json)
 */

import { z } from 'zod';
import { isNotFoundError } from '../errors';
import { ChannelLock } from './ChannelLock';
import { type FileSystem, writeAtomic } from './FileSystem';
import type { ChannelSettingsIndex, ChannelSettingsRecord } from './types';

const recordSchema = z.object({
  windowSize: z.number().int().positive().optional(),
  activeRouterMode: z.boolean(),
  createdAt: z.number(),
  updatedAt: z.number(),
});

const indexSchema = z.object({
  channels: z.record(recordSchema),
});

export interface ChannelSettingsConfig {
  /** Path to channels.json */
  indexPath: string;
  now: () => number;
}

const INDEX_LANE = 'channels.json';

/**
 * Holds every channel's settings in memory and writes the whole
 * index through on each change. Writes share one lane.
 */
export class ChannelSettings {
  private index: ChannelSettingsIndex = { channels: {} };
  private writes = new ChannelLock();

  constructor(
    private fs: FileSystem,
    private config: ChannelSettingsConfig
  ) {}

  async load(): Promise<void> {
    let content: string;
    try {
      content = await this.fs.read(this.config.indexPath);
    } catch (error) {
      if (isNotFoundError(error)) {
        this.index = { channels: {} };
        return;
      }
      throw error;
    }
    this.index = indexSchema.parse(JSON.parse(content));
  }

  get(channelId: string): ChannelSettingsRecord | undefined {
    return this.index.channels[channelId];
  }

  has(channelId: string): boolean {
    return channelId in this.index.channels;
  }

  channelIds(): string[] {
    return Object.keys(this.index.channels).sort();
  }

  /**
   * Create the channel's record on first use
   */
  async ensure(channelId: string): Promise<ChannelSettingsRecord> {
    return this.writes.run(INDEX_LANE, () => this.ensureUnlocked(channelId));
  }

  async update(
    channelId: string,
    changes: Partial<Pick<ChannelSettingsRecord, 'windowSize' | 'activeRouterMode'>>
  ): Promise<ChannelSettingsRecord> {
    return this.writes.run(INDEX_LANE, async () => {
      const current = await this.ensureUnlocked(channelId);
      const next: ChannelSettingsRecord = { ...current, ...changes, updatedAt: this.config.now() };
      await this.commit({ ...this.index.channels, [channelId]: next });
      return next;
    });
  }

  /**
   * Drop the window override so the channel falls back to the default
   */
  async clearWindowSize(channelId: string): Promise<ChannelSettingsRecord> {
    return this.writes.run(INDEX_LANE, async () => {
      const current = await this.ensureUnlocked(channelId);
      const next: ChannelSettingsRecord = {
        activeRouterMode: current.activeRouterMode,
        createdAt: current.createdAt,
        updatedAt: this.config.now(),
      };
      await this.commit({ ...this.index.channels, [channelId]: next });
      return next;
    });
  }

  private async ensureUnlocked(channelId: string): Promise<ChannelSettingsRecord> {
    const existing = this.index.channels[channelId];
    if (existing) return existing;

    const now = this.config.now();
    const record: ChannelSettingsRecord = { activeRouterMode: false, createdAt: now, updatedAt: now };
    await this.commit({ ...this.index.channels, [channelId]: record });
    return record;
  }

  /**
   * The in-memory index only changes once the file write succeeded
   */
  private async commit(channels: Record<string, ChannelSettingsRecord>): Promise<void> {
    const next: ChannelSettingsIndex = { channels };
    await writeAtomic(this.fs, this.config.indexPath, JSON.stringify(next, null, 2));
    this.index = next;
  }
}
