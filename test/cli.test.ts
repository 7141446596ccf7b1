import { describe, expect, it } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import { mkdtemp, readdir } from 'node:fs/promises';
import {
  addTask,
  createContext,
  editTask,
  exitCodeFor,
  listFile,
  moveTask,
  removeTask,
  toggleTask,
} from '../src/commands.js';
import { ConfigError, IoError, NotFoundError } from '../src/errors.js';
import { readTaskFile } from '../src/store/taskFile.js';

const tmp = () => mkdtemp(path.join(os.tmpdir(), 'todo-desk-'));

function contextWith(env: NodeJS.ProcessEnv = {}) {
  const out: string[] = [];
  return { ctx: createContext(env, { write: (l) => out.push(l) }), out };
}

describe('one-shot commands', () => {
  it('add starts a new list when the file does not exist', async () => {
    const file = path.join(await tmp(), 'list.json');
    const { ctx, out } = contextWith();

    await addTask(ctx, file, ['Buy', 'milk']);

    expect(out).toEqual(['Todo List', '  1. [ ] #1 Buy milk']);
    expect(await readTaskFile(file)).toEqual([{ id: 1, description: 'Buy milk', completed: false }]);
  });

  it('other commands report a missing file', async () => {
    const file = path.join(await tmp(), 'missing.json');
    const { ctx } = contextWith();

    await expect(toggleTask(ctx, file, '1')).rejects.toBeInstanceOf(IoError);
    await expect(listFile(ctx, file)).rejects.toBeInstanceOf(IoError);
    await expect(removeTask(ctx, file, '1')).rejects.toThrow(`Failed to read ${file} (ENOENT)`);
  });

  it('add refuses blank text and writes nothing', async () => {
    const dir = await tmp();
    const file = path.join(dir, 'list.json');
    const { ctx } = contextWith();

    await expect(addTask(ctx, file, ['   '])).rejects.toThrow('Task description is empty');
    expect(await readdir(dir)).toEqual([]);
  });

  it('edit without text clears the description', async () => {
    const file = path.join(await tmp(), 'list.json');
    const { ctx } = contextWith();
    await addTask(ctx, file, ['first']);

    await editTask(ctx, file, '1');

    expect(await readTaskFile(file)).toEqual([{ id: 1, description: '', completed: false }]);
  });

  it('toggles, moves and removes by id', async () => {
    const file = path.join(await tmp(), 'list.json');
    const { ctx, out } = contextWith();
    await addTask(ctx, file, ['a']);
    await addTask(ctx, file, ['b']);

    await toggleTask(ctx, file, '1');
    await moveTask(ctx, file, '2', '1');
    expect(await readTaskFile(file)).toEqual([
      { id: 2, description: 'b', completed: false },
      { id: 1, description: 'a', completed: true },
    ]);

    await removeTask(ctx, file, '2');
    out.length = 0;
    await listFile(ctx, file);
    expect(out).toEqual(['Todo List', '  1. [x] #1 a']);
  });

  it('lists as json', async () => {
    const file = path.join(await tmp(), 'list.json');
    const { ctx, out } = contextWith();
    await addTask(ctx, file, ['a']);
    out.length = 0;

    await listFile(ctx, file, 'json');

    expect(JSON.parse(out.join('\n'))).toEqual({
      version: 1,
      tasks: [{ id: 1, description: 'a', completed: false }],
    });
  });

  it('rejects unknown ids and malformed arguments', async () => {
    const file = path.join(await tmp(), 'list.json');
    const { ctx } = contextWith();
    await addTask(ctx, file, ['a']);

    await expect(toggleTask(ctx, file, '9')).rejects.toBeInstanceOf(NotFoundError);
    await expect(removeTask(ctx, file, 'x')).rejects.toThrow('Invalid task id "x"');
    await expect(moveTask(ctx, file, '1', '0')).rejects.toThrow('Invalid position "0"');
  });
});

describe('exit codes', () => {
  it('uses 1 for operation errors and 2 for configuration errors', () => {
    expect(exitCodeFor(new NotFoundError(3))).toBe(1);
    expect(exitCodeFor(new Error('Task description is empty'))).toBe(1);

    let configError: unknown;
    try {
      createContext({ TODO_DESK_THEME: 'neon' });
    } catch (err) {
      configError = err;
    }
    expect(configError).toBeInstanceOf(ConfigError);
    expect(exitCodeFor(configError)).toBe(2);
  });
});
