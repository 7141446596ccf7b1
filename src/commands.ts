import { configReport, readEnv, useColor, type EnvConfig } from './config.js';
import { serializeTasks } from './codec/taskCodec.js';
import type { OpResult, TaskListController } from './controller/taskList.js';
import { ConfigError, IoError } from './errors.js';
import { createLogger, type Logger } from './log.js';
import type { FilePicker } from './picker/picker.js';
import { ScriptedFilePicker } from './picker/scripted.js';
import { renderState } from './render.js';
import { Session } from './session.js';

export interface CommandContext {
  env: EnvConfig;
  logger: Logger;
  color: boolean;
  write: (line: string) => void;
}

export function createContext(
  env: NodeJS.ProcessEnv = process.env,
  opts: { isTTY?: boolean; write?: (line: string) => void } = {},
): CommandContext {
  const parsed = readEnv(env);
  return {
    env: parsed,
    logger: createLogger(parsed.TODO_DESK_LOG_LEVEL ?? 'warn'),
    color: useColor(parsed.TODO_DESK_COLOR ?? 'auto', opts.isTTY),
    write: opts.write ?? ((line) => console.log(line)),
  };
}

/** Configuration problems exit with 2, everything else with 1. */
export function exitCodeFor(err: unknown): number {
  return err instanceof ConfigError ? 2 : 1;
}

export function newSession(ctx: CommandContext, picker: FilePicker): Session {
  return new Session({
    picker,
    preferences: { textSize: ctx.env.TODO_DESK_TEXT_SIZE, theme: ctx.env.TODO_DESK_THEME },
    logger: ctx.logger,
  });
}

function parseNumberArg(raw: string, what: string): number {
  if (!/^\d+$/.test(raw)) throw new Error(`Invalid ${what} "${raw}"`);
  return Number(raw);
}

function printList(ctx: CommandContext, session: Session) {
  for (const l of renderState(session.controller, session.preferences, { color: ctx.color })) ctx.write(l);
}

/**
 * Loads `file`, applies one operation and saves it back. With `allowMissing`
 * a file that does not exist yet starts as an empty list.
 */
async function editFile(
  ctx: CommandContext,
  file: string,
  opts: { allowMissing?: boolean },
  op: (c: TaskListController) => OpResult,
): Promise<void> {
  // one-shot commands never ask for a path
  const session = newSession(ctx, new ScriptedFilePicker());

  const loaded = await session.openFrom(file);
  if (!loaded.ok) {
    const missing = loaded.error instanceof IoError && loaded.error.syscallCode === 'ENOENT';
    if (!(missing && opts.allowMissing)) throw loaded.error;
    ctx.logger.info(`starting new list at ${file}`);
  }

  const result = op(session.controller);
  if (!result.ok) throw result.error;

  if (result.changed) {
    const saved = await session.saveTo(file);
    if (!saved.ok) throw saved.error;
  }
  printList(ctx, session);
}

export function doctor(ctx: CommandContext): void {
  const report = configReport(ctx.env);
  ctx.write('todo-desk doctor');
  ctx.write(`log level: ${report.logLevel}`);
  ctx.write(`text size: ${report.textSize}`);
  ctx.write(`theme: ${report.theme}`);
  ctx.write(`color: ${report.color}`);
  ctx.write('\nNotes:');
  for (const n of report.notes) ctx.write(`- ${n}`);
}

export async function listFile(ctx: CommandContext, file: string, format = 'pretty'): Promise<void> {
  const session = newSession(ctx, new ScriptedFilePicker());
  const loaded = await session.openFrom(file);
  if (!loaded.ok) throw loaded.error;

  if (format === 'json') {
    ctx.write(serializeTasks(session.controller.tasks).trimEnd());
    return;
  }
  printList(ctx, session);
}

export async function addTask(ctx: CommandContext, file: string, text: string[]): Promise<void> {
  await editFile(ctx, file, { allowMissing: true }, (c) => {
    const begun = c.beginCompose();
    if (!begun.ok) return begun;
    c.updateDraft(text.join(' '));
    const committed = c.commitCompose();
    if (committed.ok && !committed.changed) throw new Error('Task description is empty');
    return committed;
  });
}

export async function toggleTask(ctx: CommandContext, file: string, id: string): Promise<void> {
  await editFile(ctx, file, {}, (c) => c.toggleComplete(parseNumberArg(id, 'task id')));
}

/** Replaces the description; no text clears it. */
export async function editTask(ctx: CommandContext, file: string, id: string, text: string[] = []): Promise<void> {
  await editFile(ctx, file, {}, (c) => {
    const begun = c.beginEdit(parseNumberArg(id, 'task id'));
    if (!begun.ok) return begun;
    c.updateDraft(text.join(' '));
    return c.commitEdit();
  });
}

export async function removeTask(ctx: CommandContext, file: string, id: string): Promise<void> {
  await editFile(ctx, file, {}, (c) => c.delete(parseNumberArg(id, 'task id')));
}

export async function moveTask(ctx: CommandContext, file: string, id: string, pos: string): Promise<void> {
  const to = parseNumberArg(pos, 'position');
  if (to < 1) throw new Error(`Invalid position "${pos}"`);
  await editFile(ctx, file, {}, (c) => c.move(parseNumberArg(id, 'task id'), to - 1));
}
