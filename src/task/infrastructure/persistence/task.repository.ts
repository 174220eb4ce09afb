import { NewTask, TaskHandle, TaskRecord } from '../../domain/task';

export abstract class TaskRepository {
  /**
   * Persists the task. When `uniqueKey` is already taken nothing is written
   * and the handle of the existing task is returned.
   */
  abstract insert(task: NewTask): Promise<TaskHandle>;

  /**
   * Locks up to `limit` tasks that are due, or running with a lease older
   * than `leaseMs`, skipping rows other workers hold, and marks them running
   * with one more attempt.
   */
  abstract claimDue(
    now: Date,
    limit: number,
    leaseMs: number,
  ): Promise<TaskRecord[]>;

  abstract complete(id: number): Promise<void>;

  abstract retry(id: number, runAt: Date, error: string): Promise<void>;

  abstract fail(id: number, error: string): Promise<void>;
}
