import type { EditState, Task } from './model.js';
import type { Preferences } from './preferences.js';

export interface RenderView {
  tasks: readonly Task[];
  editState: EditState;
}

export interface RenderOptions {
  color?: boolean;
}

const STRIKE = ['\x1b[9m', '\x1b[29m'] as const;
const DIM = ['\x1b[2m', '\x1b[22m'] as const;

function completedText(text: string, prefs: Preferences, color: boolean) {
  if (!color) return text;
  const [open, close] = prefs.theme === 'dark' ? DIM : STRIKE;
  return `${open}${text}${close}`;
}

export function renderTask(task: Task, position: number, editState: EditState, prefs: Preferences, opts: RenderOptions = {}) {
  const box = task.completed ? '[x]' : '[ ]';
  const head = `${String(position).padStart(3)}. ${box} #${task.id}`;
  if (editState.kind === 'editing' && editState.taskId === task.id) {
    return `${head} ✎ ${editState.draft}`;
  }
  const text = task.completed ? completedText(task.description, prefs, !!opts.color) : task.description;
  return `${head} ${text}`;
}

export function renderState(view: RenderView, prefs: Preferences, opts: RenderOptions = {}): string[] {
  const lines = ['Todo List'];
  if (!view.tasks.length) lines.push('    (no tasks)');
  view.tasks.forEach((t, i) => lines.push(renderTask(t, i + 1, view.editState, prefs, opts)));
  if (view.editState.kind === 'composing') lines.push(`    + ${view.editState.draft}`);
  return lines;
}
