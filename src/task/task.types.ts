import { TaskKind, TaskOf, TaskPayloads } from './domain/task';

export const TASK_WORKER_OPTIONS = Symbol('TASK_WORKER_OPTIONS');
export const TASK_HANDLERS = Symbol('TASK_HANDLERS');
export const TASK_DEFAULT_MAX_ATTEMPTS = Symbol('TASK_DEFAULT_MAX_ATTEMPTS');

export interface TaskWorkerOptions {
  pollIntervalMs: number;
  batchSize: number;
  timeoutMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

/**
 * Runs one kind of task. Delivery is at-least-once, so a handler may see the
 * same task again after a crash or a timeout and must tolerate that.
 */
export interface TaskHandler<K extends TaskKind> {
  handle(payload: TaskPayloads[K], task: TaskOf<K>): Promise<void>;
}

export type TaskHandlers = { [K in TaskKind]: TaskHandler<K> };
