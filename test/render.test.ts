import { describe, expect, it } from 'vitest';
import { renderState } from '../src/render.js';
import { defaultPreferences } from '../src/preferences.js';
import type { Task } from '../src/model.js';

const tasks: Task[] = [
  { id: 1, description: 'Buy milk', completed: true },
  { id: 4, description: 'Call mom', completed: false },
];

describe('renderState', () => {
  it('renders an empty list', () => {
    expect(renderState({ tasks: [], editState: { kind: 'idle' } }, defaultPreferences())).toEqual([
      'Todo List',
      '    (no tasks)',
    ]);
  });

  it('renders positions, boxes and ids', () => {
    expect(renderState({ tasks, editState: { kind: 'idle' } }, defaultPreferences())).toEqual([
      'Todo List',
      '  1. [x] #1 Buy milk',
      '  2. [ ] #4 Call mom',
    ]);
  });

  it('shows the edit draft in place and the compose draft at the end', () => {
    expect(
      renderState({ tasks, editState: { kind: 'editing', taskId: 4, draft: 'Call dad' } }, defaultPreferences()),
    ).toEqual(['Todo List', '  1. [x] #1 Buy milk', '  2. [ ] #4 ✎ Call dad']);

    expect(renderState({ tasks: [], editState: { kind: 'composing', draft: 'new' } }, defaultPreferences())).toEqual([
      'Todo List',
      '    (no tasks)',
      '    + new',
    ]);
  });

  it('strikes completed tasks in light and dims them in dark when color is on', () => {
    const done: Task = { id: 1, description: 'Buy milk', completed: true };
    const view = { tasks: [done], editState: { kind: 'idle' } as const };
    expect(renderState(view, defaultPreferences(), { color: true })[1]).toBe('  1. [x] #1 \x1b[9mBuy milk\x1b[29m');
    expect(renderState(view, defaultPreferences({ theme: 'dark' }), { color: true })[1]).toBe(
      '  1. [x] #1 \x1b[2mBuy milk\x1b[22m',
    );
  });
});
