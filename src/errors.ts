import type { EditStateKind, TaskId } from './model.js';

export type ErrorCode = 'NOT_FOUND' | 'BUSY' | 'NOT_EDITING' | 'ID_EXHAUSTED' | 'DECODE' | 'IO' | 'CONFIG';

export abstract class TodoDeskError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends TodoDeskError {
  readonly code = 'NOT_FOUND';

  constructor(readonly taskId: TaskId) {
    super(`No task with id ${taskId}`);
  }
}

/** A compose or edit was requested while another draft is open. */
export class BusyError extends TodoDeskError {
  readonly code = 'BUSY';

  constructor(readonly activeState: Exclude<EditStateKind, 'idle'>) {
    super(activeState === 'composing' ? 'A new task is being composed' : 'A task is being edited');
  }
}

export class NotEditingError extends TodoDeskError {
  readonly code = 'NOT_EDITING';

  constructor(
    readonly expected: 'composing' | 'editing' | 'draft',
    readonly actual: EditStateKind,
  ) {
    super(expected === 'draft' ? 'No draft is open' : `Not ${expected} (state: ${actual})`);
  }
}

/** The id counter has left the safe-integer range; no more tasks can be added. */
export class IdExhaustedError extends TodoDeskError {
  readonly code = 'ID_EXHAUSTED';

  constructor() {
    super('No task ids left in this list');
  }
}

export class DecodeError extends TodoDeskError {
  readonly code = 'DECODE';

  constructor(
    message: string,
    readonly issues: string[] = [],
    options?: { cause?: unknown },
  ) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message, options);
  }
}

export type IoOperation = 'read' | 'write';

export class IoError extends TodoDeskError {
  readonly code = 'IO';
  /** System error code such as ENOENT or EACCES, when known. */
  readonly syscallCode?: string;

  constructor(
    readonly operation: IoOperation,
    readonly path: string,
    cause: unknown,
  ) {
    const syscallCode = systemErrorCode(cause);
    super(`Failed to ${operation} ${path}${syscallCode ? ` (${syscallCode})` : ''}`, { cause });
    this.syscallCode = syscallCode;
  }
}

export class ConfigError extends TodoDeskError {
  readonly code = 'CONFIG';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export function isTodoDeskError(err: unknown): err is TodoDeskError {
  return err instanceof TodoDeskError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function systemErrorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}
