import path from 'node:path';
import { JSON_FILTER, type FileFilter, type FilePicker, type OpenPickOptions, type SavePickOptions } from './picker.js';

/** What the picker asks through; `LineReader` in the shell. */
export interface Asker {
  question(query: string): Promise<string>;
}

function withExtension(answer: string, filters: FileFilter[]): string {
  const ext = filters[0]?.extensions[0];
  if (!ext || path.extname(answer)) return answer;
  return `${answer}.${ext}`;
}

function filterLabel(filters: FileFilter[]) {
  return filters.map((f) => `${f.name} (${f.extensions.map((e) => `*.${e}`).join(', ')})`).join(', ');
}

/**
 * Picker that asks for a path on the terminal. Relative answers resolve
 * against `cwd`.
 */
export class PromptFilePicker implements FilePicker {
  constructor(
    private asker: Asker,
    private cwd: string = process.cwd(),
  ) {}

  async pickSavePath(opts: SavePickOptions): Promise<string | undefined> {
    const filters = opts.filters ?? [JSON_FILTER];
    const answer = (
      await this.asker.question(`Save as [${opts.suggested}] (${filterLabel(filters)}, "-" to cancel): `)
    ).trim();
    if (answer === '-') return undefined;
    return path.resolve(this.cwd, withExtension(answer || opts.suggested, filters));
  }

  async pickOpenPath(opts: OpenPickOptions = {}): Promise<string | undefined> {
    const filters = opts.filters ?? [JSON_FILTER];
    const answer = (await this.asker.question(`Open file (${filterLabel(filters)}, empty to cancel): `)).trim();
    if (!answer) return undefined;
    return path.resolve(this.cwd, answer);
  }
}
