import { registerAs } from '@nestjs/config';
import { IsInt, IsOptional, Max, Min } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { EventConfig } from './event-config.type';

class EnvironmentVariablesValidator {
  @IsInt()
  @Min(1)
  @IsOptional()
  EVENT_DEFAULT_CAPACITY?: number;

  @IsInt()
  @Min(1)
  @Max(100)
  @IsOptional()
  EVENT_PAGE_SIZE?: number;
}

export default registerAs<EventConfig>('event', () => {
  const env = validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    defaultCapacity: env.EVENT_DEFAULT_CAPACITY ?? null,
    pageSize: env.EVENT_PAGE_SIZE ?? 25,
  };
});
