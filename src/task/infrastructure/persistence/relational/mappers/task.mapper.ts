import { TaskRecord } from '../../../../domain/task';
import { TaskEntity } from '../entities/task.entity';

export class TaskMapper {
  static toRecord(raw: TaskEntity): TaskRecord {
    return {
      id: raw.id,
      kind: raw.kind,
      payload: raw.payload,
      status: raw.status,
      attempts: raw.attempts,
      maxAttempts: raw.maxAttempts,
      runAt: raw.runAt,
      lockedAt: raw.lockedAt,
      lastError: raw.lastError,
      uniqueKey: raw.uniqueKey,
    };
  }
}
