import { TaskListController, type LoadResult, type SaveResult } from './controller/taskList.js';
import { createLogger, type Logger } from './log.js';
import { DEFAULT_SAVE_NAME, JSON_FILTER, type FilePicker } from './picker/picker.js';
import { defaultPreferences, toggleTheme, withTextSize, type Preferences } from './preferences.js';

export type FileActionResult<R> = { status: 'cancelled' } | { status: 'done'; path: string; result: R };

export interface SessionOptions {
  picker: FilePicker;
  controller?: TaskListController;
  preferences?: Partial<Preferences>;
  logger?: Logger;
}

/**
 * What a window holds: the task list, the file it came from and view
 * preferences. Save and Open go through the picker; a cancelled pick does no
 * I/O.
 */
export class Session {
  readonly controller: TaskListController;
  private picker: FilePicker;
  private file: string | undefined;
  private prefs: Preferences;
  private log: Logger;

  constructor(opts: SessionOptions) {
    this.log = opts.logger ?? createLogger('silent');
    this.controller = opts.controller ?? new TaskListController({ logger: this.log.child('tasks') });
    this.picker = opts.picker;
    this.prefs = defaultPreferences(opts.preferences);
  }

  /** Set only after a successful save or load. */
  get currentFile(): string | undefined {
    return this.file;
  }

  get preferences(): Preferences {
    return this.prefs;
  }

  setTextSize(size: number): Preferences {
    this.prefs = withTextSize(this.prefs, size);
    return this.prefs;
  }

  toggleTheme(): Preferences {
    this.prefs = toggleTheme(this.prefs);
    return this.prefs;
  }

  async saveAction(): Promise<FileActionResult<SaveResult>> {
    const picked = await this.picker.pickSavePath({
      suggested: this.file ?? DEFAULT_SAVE_NAME,
      filters: [JSON_FILTER],
    });
    if (picked === undefined) {
      this.log.debug('save cancelled');
      return { status: 'cancelled' };
    }
    return { status: 'done', path: picked, result: await this.saveTo(picked) };
  }

  async openAction(): Promise<FileActionResult<LoadResult>> {
    const picked = await this.picker.pickOpenPath({ filters: [JSON_FILTER] });
    if (picked === undefined) {
      this.log.debug('open cancelled');
      return { status: 'cancelled' };
    }
    return { status: 'done', path: picked, result: await this.openFrom(picked) };
  }

  async saveTo(filePath: string): Promise<SaveResult> {
    const result = await this.controller.save(filePath);
    if (result.ok) this.file = filePath;
    return result;
  }

  async openFrom(filePath: string): Promise<LoadResult> {
    const result = await this.controller.load(filePath);
    if (result.ok) this.file = filePath;
    return result;
  }
}
