import { z } from 'zod';
import { DecodeError } from '../errors.js';
import type { Task } from '../model.js';

export const FORMAT_VERSION = 1;

/**
 * One task record. Unknown keys are stripped, so files written by newer
 * versions (or the legacy `edit` flag) still decode.
 */
const TaskRecordSchema = z.object({
  id: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  description: z.string(),
  completed: z.boolean(),
});

const TaskRecordsSchema = z.array(TaskRecordSchema);

const EnvelopeSchema = z.object({
  version: z.number().int().positive(),
  tasks: z.unknown(),
});

export interface TaskFile {
  version: typeof FORMAT_VERSION;
  tasks: Task[];
}

function formatIssues(err: z.ZodError, base: Array<string | number> = []): string[] {
  return err.issues.map((i) => {
    const at = [...base, ...i.path].join('.');
    return at ? `${at}: ${i.message}` : i.message;
  });
}

/**
 * Encode tasks as pretty-printed JSON with a fixed key order so equal lists
 * always produce identical bytes.
 */
export function serializeTasks(tasks: readonly Task[]): string {
  const file: TaskFile = {
    version: FORMAT_VERSION,
    tasks: tasks.map((t) => ({ id: t.id, description: t.description, completed: t.completed })),
  };
  return JSON.stringify(file, null, 2) + '\n';
}

/**
 * Decode a task file. Accepts the versioned envelope and the legacy form
 * (a bare array of records). Throws DecodeError on anything else.
 */
export function deserializeTasks(text: string): Task[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new DecodeError('Task file is not valid JSON', [], { cause: err });
  }

  let records: unknown;
  let base: Array<string | number> = [];
  if (Array.isArray(raw)) {
    // v0: written before the envelope existed
    records = raw;
  } else {
    const env = EnvelopeSchema.safeParse(raw);
    if (!env.success) throw new DecodeError('Unrecognized task file structure', formatIssues(env.error));
    if (env.data.version !== FORMAT_VERSION) {
      throw new DecodeError(`Unsupported task file version ${env.data.version}`);
    }
    records = env.data.tasks;
    base = ['tasks'];
  }

  const parsed = TaskRecordsSchema.safeParse(records);
  if (!parsed.success) throw new DecodeError('Invalid task records', formatIssues(parsed.error, base));

  const seen = new Set<number>();
  const dupes: string[] = [];
  for (const t of parsed.data) {
    if (seen.has(t.id)) dupes.push(`duplicate id ${t.id}`);
    seen.add(t.id);
  }
  if (dupes.length) throw new DecodeError('Invalid task records', dupes);

  return parsed.data;
}
