import { describe, expect, it } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import { mkdtemp, readdir, readFile, writeFile } from 'node:fs/promises';
import { readTaskFile, writeTaskFile } from '../src/store/taskFile.js';
import { DecodeError, IoError } from '../src/errors.js';
import { serializeTasks } from '../src/codec/taskCodec.js';

const tmp = () => mkdtemp(path.join(os.tmpdir(), 'todo-desk-'));

describe('task file store', () => {
  it('writes the serialized form and reads it back', async () => {
    const dir = await tmp();
    const file = path.join(dir, 'list.json');
    const tasks = [
      { id: 1, description: 'A', completed: false },
      { id: 2, description: 'B', completed: true },
    ];

    await writeTaskFile(file, tasks);

    expect(await readFile(file, 'utf8')).toBe(serializeTasks(tasks));
    expect(await readTaskFile(file)).toEqual(tasks);
    expect(await readdir(dir)).toEqual(['list.json']);
  });

  it('replaces an existing file', async () => {
    const file = path.join(await tmp(), 'list.json');
    await writeTaskFile(file, [{ id: 1, description: 'old', completed: false }]);
    await writeTaskFile(file, [{ id: 9, description: 'new', completed: true }]);
    expect(await readTaskFile(file)).toEqual([{ id: 9, description: 'new', completed: true }]);
  });

  it('reports a missing file as an IoError with its code', async () => {
    const file = path.join(await tmp(), 'nope.json');
    const err = await readTaskFile(file).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(IoError);
    if (!(err instanceof IoError)) return;
    expect(err.operation).toBe('read');
    expect(err.path).toBe(file);
    expect(err.syscallCode).toBe('ENOENT');
    expect(err.message).toBe(`Failed to read ${file} (ENOENT)`);
  });

  it('reports malformed content as a DecodeError, not an IoError', async () => {
    const file = path.join(await tmp(), 'bad.json');
    await writeFile(file, 'not json at all', 'utf8');
    await expect(readTaskFile(file)).rejects.toBeInstanceOf(DecodeError);
  });

  it('fails a write into a missing directory without leaving files behind', async () => {
    const dir = await tmp();
    const file = path.join(dir, 'missing', 'list.json');
    const err = await writeTaskFile(file, []).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(IoError);
    if (!(err instanceof IoError)) return;
    expect(err.operation).toBe('write');
    expect(err.syscallCode).toBe('ENOENT');
    expect(await readdir(dir)).toEqual([]);
  });

  it('reports reading a directory as an IoError', async () => {
    const dir = await tmp();
    await expect(readTaskFile(dir)).rejects.toBeInstanceOf(IoError);
  });

  it('does not touch the target when the write is aborted', async () => {
    const dir = await tmp();
    const file = path.join(dir, 'list.json');
    await writeTaskFile(file, [{ id: 1, description: 'kept', completed: false }]);

    const ac = new AbortController();
    ac.abort();
    await expect(writeTaskFile(file, [], { signal: ac.signal })).rejects.toBeInstanceOf(IoError);

    expect(await readTaskFile(file)).toEqual([{ id: 1, description: 'kept', completed: false }]);
    expect(await readdir(dir)).toEqual(['list.json']);
  });
});
