/**
 * Interaction Log - one JSONL record per committed response
 */

import { z } from 'zod';
import { JSONLFile } from '../context-store/JSONLFile';
import type { FileSystem } from '../context-store/FileSystem';
import { StoreUnavailableError } from '../errors';
import type { InteractionRecord } from './types';

const recordSchema = z.object({
  timestamp: z.string(),
  channelId: z.string(),
  userId: z.string(),
  handlerId: z.string(),
  prompt: z.string(),
  response: z.string(),
});

export class InteractionLog {
  private file: JSONLFile<InteractionRecord>;

  constructor(fs: FileSystem, filePath: string) {
    this.file = new JSONLFile(fs, filePath, value => {
      const parsed = recordSchema.safeParse(value);
      return parsed.success ? parsed.data : null;
    });
  }

  async record(record: InteractionRecord): Promise<void> {
    try {
      await this.file.append(record);
    } catch (error) {
      throw new StoreUnavailableError('interaction log', this.file.path, error);
    }
  }

  async readAll(): Promise<InteractionRecord[]> {
    return this.file.readAll();
  }
}
