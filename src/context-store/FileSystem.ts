/**
 * File System Abstraction
 * Lets the store run against disk in production and memory in tests
 */

import * as fs from 'fs/promises';
import * as path from 'path';

export interface FileSystem {
  /** Read entire file content; rejects with ENOENT when missing */
  read(path: string): Promise<string>;

  /** Write content to file (overwrites) */
  write(path: string, content: string): Promise<void>;

  /** Append content to file, creating it if needed */
  append(path: string, content: string): Promise<void>;

  exists(path: string): Promise<boolean>;

  /** Move a file over another one in a single step */
  rename(from: string, to: string): Promise<void>;

  /** Create directory (recursive) */
  mkdir(dirPath: string): Promise<void>;
}

/**
 * Replace a file's content without ever exposing a half-written file
 */
export async function writeAtomic(fileSystem: FileSystem, filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  await fileSystem.write(tempPath, content);
  await fileSystem.rename(tempPath, filePath);
}

export class NodeFileSystem implements FileSystem {
  async read(filePath: string): Promise<string> {
    return await fs.readFile(filePath, 'utf-8');
  }

  async write(filePath: string, content: string): Promise<void> {
    await this.mkdir(path.dirname(filePath));
    await fs.writeFile(filePath, content, 'utf-8');
  }

  async append(filePath: string, content: string): Promise<void> {
    await this.mkdir(path.dirname(filePath));
    await fs.appendFile(filePath, content, 'utf-8');
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async rename(from: string, to: string): Promise<void> {
    await this.mkdir(path.dirname(to));
    await fs.rename(from, to);
  }

  async mkdir(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath, { recursive: true });
  }
}

function notFound(operation: string, filePath: string): Error {
  return Object.assign(new Error(`ENOENT: no such file or directory, ${operation} '${filePath}'`), {
    code: 'ENOENT',
  });
}

/**
 * In-memory file system for testing
 */
export class InMemoryFileSystem implements FileSystem {
  private files = new Map<string, string>();
  private directories = new Set<string>();

  async read(filePath: string): Promise<string> {
    const content = this.files.get(this.normalizePath(filePath));
    if (content === undefined) {
      throw notFound('open', filePath);
    }
    return content;
  }

  async write(filePath: string, content: string): Promise<void> {
    await this.mkdir(path.dirname(filePath));
    this.files.set(this.normalizePath(filePath), content);
  }

  async append(filePath: string, content: string): Promise<void> {
    await this.mkdir(path.dirname(filePath));
    const key = this.normalizePath(filePath);
    this.files.set(key, (this.files.get(key) ?? '') + content);
  }

  async exists(filePath: string): Promise<boolean> {
    const key = this.normalizePath(filePath);
    return this.files.has(key) || this.directories.has(key);
  }

  async rename(from: string, to: string): Promise<void> {
    const source = this.normalizePath(from);
    const content = this.files.get(source);
    if (content === undefined) {
      throw notFound('rename', from);
    }
    await this.mkdir(path.dirname(to));
    this.files.delete(source);
    this.files.set(this.normalizePath(to), content);
  }

  async mkdir(dirPath: string): Promise<void> {
    let current = this.normalizePath(dirPath);
    while (!this.directories.has(current)) {
      this.directories.add(current);
      const parent = this.normalizePath(path.dirname(current));
      if (parent === current) break;
      current = parent;
    }
  }

  /** Snapshot of stored paths (for assertions) */
  listFiles(): string[] {
    return Array.from(this.files.keys()).sort();
  }

  private normalizePath(p: string): string {
    return path.normalize(p).replace(/\\/g, '/');
  }
}
