import { registerAs } from '@nestjs/config';
import { IsInt, IsOptional, Min } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { TaskConfig } from './task-config.type';

class EnvironmentVariablesValidator {
  @IsInt()
  @Min(10)
  @IsOptional()
  TASK_POLL_INTERVAL_MS?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  TASK_BATCH_SIZE?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  TASK_TIMEOUT_MS?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  TASK_MAX_ATTEMPTS?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  TASK_BACKOFF_BASE_MS?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  TASK_BACKOFF_MAX_MS?: number;
}

export default registerAs<TaskConfig>('task', () => {
  const env = validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    pollIntervalMs: env.TASK_POLL_INTERVAL_MS ?? 1000,
    batchSize: env.TASK_BATCH_SIZE ?? 10,
    timeoutMs: env.TASK_TIMEOUT_MS ?? 30000,
    maxAttempts: env.TASK_MAX_ATTEMPTS ?? 4,
    backoffBaseMs: env.TASK_BACKOFF_BASE_MS ?? 2000,
    backoffMaxMs: env.TASK_BACKOFF_MAX_MS ?? 5 * 60 * 1000,
  };
});
