import {
  BusyError,
  DecodeError,
  IdExhaustedError,
  IoError,
  NotEditingError,
  NotFoundError,
  TodoDeskError,
  errorMessage,
} from '../errors.js';
import { createLogger, type Logger } from '../log.js';
import { IDLE, type EditState, type Task, type TaskId } from '../model.js';
import { fsTaskFileIO, type TaskFileIO, type TaskFileOptions } from '../store/taskFile.js';

export interface OpSuccess {
  ok: true;
  /** Task the operation touched, when there is one. */
  taskId?: TaskId;
  /** False when the call was accepted but left the task list as it was. */
  changed: boolean;
}

export interface OpFailure<E extends TodoDeskError = TodoDeskError> {
  ok: false;
  error: E;
}

export type OpResult<E extends TodoDeskError = TodoDeskError> = OpSuccess | OpFailure<E>;

export type LoadResult = (OpSuccess & { count: number }) | OpFailure<DecodeError | IoError>;

export type SaveResult = (OpSuccess & { count: number }) | OpFailure<IoError>;

export type TaskListEvent =
  | { type: 'added' | 'updated' | 'removed' | 'moved'; taskId: TaskId }
  | { type: 'draft'; state: EditState }
  | { type: 'replaced'; count: number }
  | { type: 'saved'; path: string };

export type TaskListListener = (event: TaskListEvent) => void;

export interface TaskListControllerOptions {
  tasks?: readonly Task[];
  io?: TaskFileIO;
  logger?: Logger;
}

function fail<E extends TodoDeskError>(error: E): OpFailure<E> {
  return { ok: false, error };
}

function nextIdAfter(tasks: readonly Task[]): TaskId {
  return tasks.reduce((max, t) => Math.max(max, t.id), 0) + 1;
}

/**
 * Owns the ordered task list and the single open draft.
 *
 * Tasks are replaced, never mutated in place, so the arrays handed out by
 * `tasks` and taken by `save` stay valid snapshots.
 */
export class TaskListController {
  private items: Task[] = [];
  private state: EditState = IDLE;
  private counter: TaskId = 1;
  private listeners = new Set<TaskListListener>();
  private io: TaskFileIO;
  private log: Logger;

  constructor(opts: TaskListControllerOptions = {}) {
    this.io = opts.io ?? fsTaskFileIO;
    this.log = opts.logger ?? createLogger('silent');
    if (opts.tasks) {
      const ids = new Set(opts.tasks.map((t) => t.id));
      if (ids.size !== opts.tasks.length) throw new Error('Initial tasks contain duplicate ids');
      this.items = opts.tasks.map((t) => ({ ...t }));
      this.counter = nextIdAfter(this.items);
    }
  }

  get tasks(): readonly Task[] {
    return this.items;
  }

  get editState(): EditState {
    return this.state;
  }

  /** Id the next composed task will receive. */
  get nextId(): TaskId {
    return this.counter;
  }

  find(id: TaskId): Task | undefined {
    return this.items.find((t) => t.id === id);
  }

  indexOf(id: TaskId): number {
    return this.items.findIndex((t) => t.id === id);
  }

  subscribe(listener: TaskListListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  beginCompose(): OpResult<BusyError> {
    if (this.state.kind !== 'idle') return this.busy();
    this.setState({ kind: 'composing', draft: '' });
    return { ok: true, changed: false };
  }

  beginEdit(id: TaskId): OpResult<BusyError | NotFoundError> {
    if (this.state.kind !== 'idle') return this.busy();
    const task = this.find(id);
    if (!task) return this.notFound(id);
    this.setState({ kind: 'editing', taskId: id, draft: task.description });
    return { ok: true, taskId: id, changed: false };
  }

  updateDraft(text: string): OpResult<NotEditingError> {
    const s = this.state;
    if (s.kind === 'idle') return fail(new NotEditingError('draft', s.kind));
    this.setState(s.kind === 'composing' ? { kind: 'composing', draft: text } : { ...s, draft: text });
    return { ok: true, taskId: s.kind === 'editing' ? s.taskId : undefined, changed: false };
  }

  /**
   * Appends the trimmed draft as a new task; a blank draft appends nothing.
   * Once ids pass the safe-integer range nothing more can be appended and the
   * draft stays open.
   */
  commitCompose(): OpResult<NotEditingError | IdExhaustedError> {
    const s = this.state;
    if (s.kind !== 'composing') return fail(new NotEditingError('composing', s.kind));

    const description = s.draft.trim();
    if (!description) {
      this.log.debug('compose committed empty, nothing appended');
      this.setState(IDLE);
      return { ok: true, changed: false };
    }

    if (this.counter > Number.MAX_SAFE_INTEGER) {
      this.log.warn('task ids exhausted, compose rejected');
      return fail(new IdExhaustedError());
    }

    const task: Task = { id: this.counter++, description, completed: false };
    this.items = [...this.items, task];
    this.setState(IDLE);
    this.log.debug(`task added #${task.id}`);
    this.emit({ type: 'added', taskId: task.id });
    return { ok: true, taskId: task.id, changed: true };
  }

  cancelCompose(): OpResult<NotEditingError> {
    if (this.state.kind !== 'composing') return fail(new NotEditingError('composing', this.state.kind));
    this.setState(IDLE);
    return { ok: true, changed: false };
  }

  /** Writes the draft to the task verbatim, even when it is empty. */
  commitEdit(): OpResult<NotEditingError> {
    const s = this.state;
    if (s.kind !== 'editing') return fail(new NotEditingError('editing', s.kind));

    // delete() resets the state when the edited task goes away, so it exists here
    this.items = this.items.map((t) => (t.id === s.taskId ? { ...t, description: s.draft } : t));
    this.setState(IDLE);
    this.log.debug(`task edited #${s.taskId}`);
    this.emit({ type: 'updated', taskId: s.taskId });
    return { ok: true, taskId: s.taskId, changed: true };
  }

  cancelEdit(): OpResult<NotEditingError> {
    const s = this.state;
    if (s.kind !== 'editing') return fail(new NotEditingError('editing', s.kind));
    this.setState(IDLE);
    return { ok: true, taskId: s.taskId, changed: false };
  }

  toggleComplete(id: TaskId): OpResult<NotFoundError> {
    if (!this.find(id)) return this.notFound(id);
    this.items = this.items.map((t) => (t.id === id ? { ...t, completed: !t.completed } : t));
    this.emit({ type: 'updated', taskId: id });
    return { ok: true, taskId: id, changed: true };
  }

  delete(id: TaskId): OpResult<NotFoundError> {
    if (!this.find(id)) return this.notFound(id);
    this.items = this.items.filter((t) => t.id !== id);
    if (this.state.kind === 'editing' && this.state.taskId === id) {
      this.log.debug(`edit target #${id} deleted, draft discarded`);
      this.setState(IDLE);
    }
    this.emit({ type: 'removed', taskId: id });
    return { ok: true, taskId: id, changed: true };
  }

  /**
   * Moves a task to `toIndex` (0-based, clamped to the list bounds). A
   * non-finite index leaves the task where it is.
   */
  move(id: TaskId, toIndex: number): OpResult<NotFoundError> {
    const from = this.indexOf(id);
    const task = this.items[from];
    if (from < 0 || !task) return this.notFound(id);
    if (!Number.isFinite(toIndex)) return { ok: true, taskId: id, changed: false };

    const target = Math.min(this.items.length - 1, Math.max(0, Math.trunc(toIndex)));
    if (target === from) return { ok: true, taskId: id, changed: false };

    const rest = this.items.filter((t) => t.id !== id);
    this.items = [...rest.slice(0, target), task, ...rest.slice(target)];
    this.emit({ type: 'moved', taskId: id });
    return { ok: true, taskId: id, changed: true };
  }

  /**
   * Persists the committed tasks as they are when called. Open drafts are not
   * written and edits made while the write is pending do not affect it.
   */
  async save(filePath: string, opts: TaskFileOptions = {}): Promise<SaveResult> {
    const snapshot = this.items;
    try {
      await this.io.write(filePath, snapshot, opts);
    } catch (err) {
      if (err instanceof IoError) {
        this.log.warn(`save failed: ${err.message}`);
        return fail(err);
      }
      throw err;
    }
    this.log.info(`saved ${snapshot.length} task(s)`, { path: filePath });
    this.emit({ type: 'saved', path: filePath });
    return { ok: true, changed: false, count: snapshot.length };
  }

  /**
   * Replaces the list with the file's content. A successful load wins over any
   * open draft, which is discarded; a failed load changes nothing.
   */
  async load(filePath: string, opts: TaskFileOptions = {}): Promise<LoadResult> {
    let loaded: Task[];
    try {
      loaded = await this.io.read(filePath, opts);
    } catch (err) {
      if (err instanceof IoError || err instanceof DecodeError) {
        this.log.warn(`load failed: ${errorMessage(err)}`);
        return fail(err);
      }
      throw err;
    }

    this.items = loaded;
    this.counter = nextIdAfter(loaded);
    if (this.state.kind !== 'idle') {
      this.log.info(`load replaced open ${this.state.kind} draft`);
      this.setState(IDLE);
    }
    this.log.info(`loaded ${loaded.length} task(s)`, { path: filePath });
    this.emit({ type: 'replaced', count: loaded.length });
    return { ok: true, changed: true, count: loaded.length };
  }

  private setState(next: EditState) {
    this.state = next;
    this.emit({ type: 'draft', state: next });
  }

  private busy(): OpFailure<BusyError> {
    const kind = this.state.kind === 'idle' ? 'composing' : this.state.kind;
    this.log.debug(`rejected: ${kind} in progress`);
    return fail(new BusyError(kind));
  }

  private notFound(id: TaskId): OpFailure<NotFoundError> {
    this.log.debug(`task #${id} not found`);
    return fail(new NotFoundError(id));
  }

  private emit(event: TaskListEvent) {
    for (const l of this.listeners) l(event);
  }
}
