import { readFile, writeFile, rename, unlink } from 'node:fs/promises';
import { deserializeTasks, serializeTasks } from '../codec/taskCodec.js';
import { IoError } from '../errors.js';
import type { Task } from '../model.js';

export interface TaskFileOptions {
  /** Aborting rejects with an IoError; the target file is left as it was. */
  signal?: AbortSignal;
}

/**
 * Read and decode a task file. I/O failures surface as IoError, malformed
 * content as DecodeError; the two are never mixed.
 */
export async function readTaskFile(filePath: string, opts: TaskFileOptions = {}): Promise<Task[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, { encoding: 'utf8', signal: opts.signal });
  } catch (err) {
    throw new IoError('read', filePath, err);
  }
  return deserializeTasks(raw);
}

/** Write via a sibling temp file and rename, so `filePath` is never partial. */
export async function writeTaskFile(
  filePath: string,
  tasks: readonly Task[],
  opts: TaskFileOptions = {},
): Promise<void> {
  const body = serializeTasks(tasks);
  const tmp = filePath + '.tmp';
  try {
    await writeFile(tmp, body, { encoding: 'utf8', signal: opts.signal });
    opts.signal?.throwIfAborted();
    await rename(tmp, filePath);
  } catch (err) {
    await unlink(tmp).catch(() => undefined);
    throw new IoError('write', filePath, err);
  }
}

export interface TaskFileIO {
  read(filePath: string, opts?: TaskFileOptions): Promise<Task[]>;
  write(filePath: string, tasks: readonly Task[], opts?: TaskFileOptions): Promise<void>;
}

export const fsTaskFileIO: TaskFileIO = {
  read: readTaskFile,
  write: writeTaskFile,
};
