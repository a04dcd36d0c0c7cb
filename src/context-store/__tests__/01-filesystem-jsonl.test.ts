/**
 * Tests for the in-memory FileSystem and JSONLFile
 */

import { InMemoryFileSystem, writeAtomic } from '../FileSystem';
import { JSONLFile } from '../JSONLFile';

interface Entry {
  n: number;
}

function parseEntry(value: unknown): Entry | null {
  if (typeof value === 'object' && value !== null && 'n' in value && typeof value.n === 'number') {
    return { n: value.n };
  }
  return null;
}

describe('InMemoryFileSystem', () => {
  let fileSystem: InMemoryFileSystem;

  beforeEach(() => {
    fileSystem = new InMemoryFileSystem();
  });

  it('should write, append and read', async () => {
    await fileSystem.write('/data/a.txt', 'hello');
    await fileSystem.append('/data/a.txt', ' world');
    expect(await fileSystem.read('/data/a.txt')).toBe('hello world');
  });

  it('should reject reads of missing files with ENOENT', async () => {
    await expect(fileSystem.read('/missing.txt')).rejects.toThrow('ENOENT');
  });

  it('should create parent directories', async () => {
    await fileSystem.write('/a/b/c.txt', 'x');
    expect(await fileSystem.exists('/a/b')).toBe(true);
    expect(await fileSystem.exists('/a')).toBe(true);
  });

  it('should rename files', async () => {
    await fileSystem.write('/a.tmp', 'new');
    await fileSystem.write('/a.txt', 'old');
    await fileSystem.rename('/a.tmp', '/a.txt');

    expect(await fileSystem.read('/a.txt')).toBe('new');
    expect(await fileSystem.exists('/a.tmp')).toBe(false);
  });

  it('should replace content atomically through a temp file', async () => {
    await writeAtomic(fileSystem, '/state/index.json', '{}');
    expect(fileSystem.listFiles()).toEqual(['/state/index.json']);
  });
});

describe('JSONLFile', () => {
  let fileSystem: InMemoryFileSystem;
  let file: JSONLFile<Entry>;

  beforeEach(() => {
    fileSystem = new InMemoryFileSystem();
    file = new JSONLFile(fileSystem, '/log/entries.jsonl', parseEntry);
  });

  it('should read a missing file as empty', async () => {
    expect(await file.readAll()).toEqual([]);
  });

  it('should append one line per record', async () => {
    await file.append({ n: 1 });
    await file.append({ n: 2 });

    expect(await fileSystem.read('/log/entries.jsonl')).toBe('{"n":1}\n{"n":2}\n');
    expect(await file.readAll()).toEqual([{ n: 1 }, { n: 2 }]);
  });

  it('should skip a torn trailing line', async () => {
    await fileSystem.write('/log/entries.jsonl', '{"n":1}\n{"n":2}\n{"n":');
    expect(await file.readAll()).toEqual([{ n: 1 }, { n: 2 }]);
  });

  it('should start a fresh line after loading a torn tail', async () => {
    await fileSystem.write('/log/entries.jsonl', '{"n":1}\n{"n":2,');

    expect(await file.load()).toEqual([{ n: 1 }]);
    await file.append({ n: 3 });

    expect(await fileSystem.read('/log/entries.jsonl')).toBe('{"n":1}\n{"n":2,\n{"n":3}\n');
    expect(await file.readAll()).toEqual([{ n: 1 }, { n: 3 }]);
  });

  it('should leave a cleanly terminated file untouched on load', async () => {
    await fileSystem.write('/log/entries.jsonl', '{"n":1}\n');

    expect(await file.load()).toEqual([{ n: 1 }]);
    expect(await fileSystem.read('/log/entries.jsonl')).toBe('{"n":1}\n');
  });

  it('should skip records the parser rejects', async () => {
    await fileSystem.write('/log/entries.jsonl', '{"n":1}\n{"m":2}\n{"n":3}\n');
    expect(await file.readAll()).toEqual([{ n: 1 }, { n: 3 }]);
  });

  it('should overwrite with writeAll', async () => {
    await file.append({ n: 1 });
    await file.writeAll([{ n: 7 }]);
    expect(await file.readAll()).toEqual([{ n: 7 }]);
  });
});
