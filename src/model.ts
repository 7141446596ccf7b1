export type TaskId = number;

export interface Task {
  /** Unique within a list for its lifetime; never reused after deletion. */
  readonly id: TaskId;
  readonly description: string;
  readonly completed: boolean;
}

/**
 * The single active draft of a task list. Only one compose or edit may be in
 * progress at a time, so this is a union rather than a flag per task.
 */
export type EditState =
  | { kind: 'idle' }
  | { kind: 'composing'; draft: string }
  | { kind: 'editing'; taskId: TaskId; draft: string };

export type EditStateKind = EditState['kind'];

export const IDLE: EditState = { kind: 'idle' };
