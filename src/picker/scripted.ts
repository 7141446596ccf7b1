import type { FilePicker, OpenPickOptions, SavePickOptions } from './picker.js';

export type PickRequest =
  | { kind: 'save'; opts: SavePickOptions }
  | { kind: 'open'; opts: OpenPickOptions };

/**
 * Picker that answers from a queue, for tests and non-interactive runs.
 *
 * - `undefined` in the queue is a cancel.
 * - An empty queue cancels.
 * - Every request is recorded in `requests`.
 */
export class ScriptedFilePicker implements FilePicker {
  readonly requests: PickRequest[] = [];
  private answers: Array<string | undefined>;

  constructor(answers: Array<string | undefined> = []) {
    this.answers = [...answers];
  }

  queue(...answers: Array<string | undefined>): this {
    this.answers.push(...answers);
    return this;
  }

  async pickSavePath(opts: SavePickOptions): Promise<string | undefined> {
    this.requests.push({ kind: 'save', opts });
    return this.answers.shift();
  }

  async pickOpenPath(opts: OpenPickOptions = {}): Promise<string | undefined> {
    this.requests.push({ kind: 'open', opts });
    return this.answers.shift();
  }
}
