/**
 * JSONL (JSON Lines) Reader/Writer
 * One record per line, append-only in normal operation
 */

import { isNotFoundError } from '../errors';
import { createLogger } from '../logger';
import { type FileSystem, writeAtomic } from './FileSystem';

const log = createLogger('jsonl');

/**
 * Turns a parsed line into a record, or null to skip it
 */
export type RecordParser<T> = (value: unknown) => T | null;

export class JSONLFile<T> {
  constructor(
    private fs: FileSystem,
    private filePath: string,
    private parseRecord: RecordParser<T>
  ) {}

  get path(): string {
    return this.filePath;
  }

  async append(record: T): Promise<void> {
    await this.fs.append(this.filePath, JSON.stringify(record) + '\n');
  }

  /**
   * Read all records; a missing file reads as empty
   */
  async readAll(): Promise<T[]> {
    const content = await this.readContent();
    return content === null ? [] : this.parseContent(content);
  }

  /**
   * Read all records and terminate a torn trailing line, so the next
   * append starts a line of its own instead of extending the fragment
   */
  async load(): Promise<T[]> {
    const content = await this.readContent();
    if (content === null) return [];

    if (content.length > 0 && !content.endsWith('\n')) {
      log.warn('Terminating torn trailing line', { file: this.filePath });
      await this.fs.append(this.filePath, '\n');
    }
    return this.parseContent(content);
  }

  /**
   * Replace the whole file (used by pruning)
   */
  async writeAll(records: T[]): Promise<void> {
    const lines = records.map(record => JSON.stringify(record) + '\n').join('');
    await writeAtomic(this.fs, this.filePath, lines);
  }

  private async readContent(): Promise<string | null> {
    try {
      return await this.fs.read(this.filePath);
    } catch (error) {
      if (isNotFoundError(error)) return null;
      throw error;
    }
  }

  private parseContent(content: string): T[] {
    const results: T[] = [];

    for (const line of content.split('\n')) {
      if (!line.trim()) continue;

      let value: unknown;
      try {
        value = JSON.parse(line);
      } catch {
        // Torn write from a crash mid-append
        log.warn('Skipping invalid JSON line', { file: this.filePath, line: line.slice(0, 100) });
        continue;
      }

      const record = this.parseRecord(value);
      if (record === null) {
        log.warn('Skipping malformed record', { file: this.filePath, line: line.slice(0, 100) });
        continue;
      }
      results.push(record);
    }

    return results;
  }
}
