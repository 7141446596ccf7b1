import type { OpResult } from './controller/taskList.js';
import { NotEditingError, errorMessage } from './errors.js';
import type { LineReader } from './lineReader.js';
import { renderState } from './render.js';
import type { Session } from './session.js';

export interface ShellOutput {
  lines: string[];
  quit: boolean;
}

export interface ShellOptions {
  color?: boolean;
}

export const HELP = [
  'Commands:',
  '  list               show the list',
  '  new                start a new task',
  '  edit <id>          edit a task',
  '  text <words>       set the open draft',
  '  ok                 commit the open draft',
  '  cancel             discard the open draft',
  '  toggle <id>        mark done / not done',
  '  rm <id>            delete a task',
  '  move <id> <pos>    move a task to position <pos> (1-based)',
  '  save               save to a file',
  '  open               load a file',
  '  size <n>           set text size',
  '  theme              switch light / dark',
  '  quit               leave',
];

function parseId(raw: string | undefined): number | undefined {
  if (!raw || !/^\d+$/.test(raw)) return undefined;
  return Number(raw);
}

/** Interprets one line of input against a session. */
export class Shell {
  constructor(
    readonly session: Session,
    private opts: ShellOptions = {},
  ) {}

  render(): string[] {
    return renderState(this.session.controller, this.session.preferences, { color: this.opts.color });
  }

  async execute(line: string): Promise<ShellOutput> {
    const trimmed = line.trim();
    if (!trimmed) return { lines: [], quit: false };

    const [cmd = '', ...args] = trimmed.split(/\s+/);
    const c = this.session.controller;
    const out = (lines: string[]): ShellOutput => ({ lines, quit: false });
    const withId = (fn: (id: number) => OpResult): ShellOutput => {
      const id = parseId(args[0]);
      if (id === undefined) return out([`error: invalid id "${args[0] ?? ''}"`]);
      return this.report(fn(id));
    };

    switch (cmd) {
      case 'help':
        return out(HELP);
      case 'list':
      case 'ls':
        return out(this.render());
      case 'new':
        return this.report(c.beginCompose());
      case 'edit':
        return withId((id) => c.beginEdit(id));
      case 'text':
        // keep the user's spacing after the command word
        return this.report(c.updateDraft(trimmed.slice(cmd.length).replace(/^\s/, '')));
      case 'ok': {
        const kind = c.editState.kind;
        if (kind === 'composing') return this.report(c.commitCompose());
        if (kind === 'editing') return this.report(c.commitEdit());
        return out([`error: ${new NotEditingError('draft', kind).message}`]);
      }
      case 'cancel': {
        const kind = c.editState.kind;
        if (kind === 'composing') return this.report(c.cancelCompose());
        if (kind === 'editing') return this.report(c.cancelEdit());
        return out([`error: ${new NotEditingError('draft', kind).message}`]);
      }
      case 'toggle':
        return withId((id) => c.toggleComplete(id));
      case 'rm':
        return withId((id) => c.delete(id));
      case 'move': {
        const pos = parseId(args[1]);
        if (pos === undefined || pos < 1) return out([`error: invalid position "${args[1] ?? ''}"`]);
        return withId((id) => c.move(id, pos - 1));
      }
      case 'save':
        return out(await this.save());
      case 'open':
        return out(await this.open());
      case 'size': {
        const n = Number(args[0]);
        if (!args[0] || !Number.isFinite(n)) return out([`error: invalid size "${args[0] ?? ''}"`]);
        return out([`text size: ${this.session.setTextSize(n).textSize}`]);
      }
      case 'theme':
        return out([`theme: ${this.session.toggleTheme().theme}`]);
      case 'quit':
      case 'exit':
        return { lines: [], quit: true };
      default:
        return out([`error: unknown command "${cmd}" (try help)`]);
    }
  }

  private report(result: OpResult): ShellOutput {
    if (!result.ok) return { lines: [`error: ${result.error.message}`], quit: false };
    return { lines: this.render(), quit: false };
  }

  private async save(): Promise<string[]> {
    const action = await this.session.saveAction();
    if (action.status === 'cancelled') return ['save cancelled'];
    const r = action.result;
    if (!r.ok) return [`error: ${r.error.message}`];
    return [`saved ${r.count} task(s) to ${action.path}`];
  }

  private async open(): Promise<string[]> {
    const action = await this.session.openAction();
    if (action.status === 'cancelled') return ['open cancelled'];
    const r = action.result;
    if (!r.ok) return [`error: ${r.error.message}`];
    return [`loaded ${r.count} task(s) from ${action.path}`, ...this.render()];
  }
}

/** Reads commands from `reader` until `quit` or end of input. */
export async function runShell(shell: Shell, reader: LineReader, write: (line: string) => void): Promise<void> {
  for (const l of shell.render()) write(l);
  for (;;) {
    const line = await reader.next('> ');
    if (line === undefined) return;
    let result: ShellOutput;
    try {
      result = await shell.execute(line);
    } catch (err) {
      result = { lines: [`error: ${errorMessage(err)}`], quit: false };
    }
    for (const l of result.lines) write(l);
    if (result.quit) return;
  }
}
