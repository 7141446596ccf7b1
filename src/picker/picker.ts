export interface FileFilter {
  name: string;
  extensions: string[];
}

export const JSON_FILTER: FileFilter = { name: 'JSON files', extensions: ['json'] };

export const DEFAULT_SAVE_NAME = 'todo_list_save.json';

export interface SavePickOptions {
  /** Pre-filled answer: the current file, or a default file name. */
  suggested: string;
  filters?: FileFilter[];
}

export interface OpenPickOptions {
  filters?: FileFilter[];
}

/**
 * The file dialog. Resolves to the chosen path, or `undefined` when the user
 * cancels.
 */
export interface FilePicker {
  pickSavePath(opts: SavePickOptions): Promise<string | undefined>;
  pickOpenPath(opts?: OpenPickOptions): Promise<string | undefined>;
}
