import type { Interface } from 'node:readline/promises';
import type { Asker } from './picker/prompt.js';

/**
 * Queues every line a readline interface emits, so the command loop and the
 * picker's questions read from one ordered stream. Lines that arrive in one
 * chunk (piped input) wait in the queue until someone asks for them.
 */
export class LineReader implements Asker {
  private queued: string[] = [];
  private waiting: Array<(line: string | undefined) => void> = [];
  private ended = false;

  constructor(
    rl: Interface,
    private showPrompt: (text: string) => void = () => {},
  ) {
    rl.on('line', (line: string) => {
      const next = this.waiting.shift();
      if (next) next(line);
      else this.queued.push(line);
    });
    rl.on('close', () => {
      this.ended = true;
      for (const w of this.waiting.splice(0)) w(undefined);
    });
  }

  /** Next line, or `undefined` once input has ended and the queue is empty. */
  next(prompt?: string): Promise<string | undefined> {
    if (prompt) this.showPrompt(prompt);
    const line = this.queued.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.ended) return Promise.resolve(undefined);
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  async question(query: string): Promise<string> {
    const line = await this.next(query);
    if (line === undefined) throw new Error('Input ended before an answer was given');
    return line;
  }
}
