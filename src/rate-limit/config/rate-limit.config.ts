import { registerAs } from '@nestjs/config';
import { IsEnum, IsInt, IsOptional, Min } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import {
  RateLimitConfig,
  RateLimitFailureMode,
  RateLimitStoreKind,
} from './rate-limit-config.type';

class EnvironmentVariablesValidator {
  @IsInt()
  @Min(1)
  @IsOptional()
  RATE_LIMIT_REQUESTS?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  RATE_LIMIT_WINDOW_SECONDS?: number;

  @IsEnum(RateLimitStoreKind)
  @IsOptional()
  RATE_LIMIT_STORE?: RateLimitStoreKind;

  @IsEnum(RateLimitFailureMode)
  @IsOptional()
  RATE_LIMIT_FAILURE_MODE?: RateLimitFailureMode;
}

export default registerAs<RateLimitConfig>('rateLimit', () => {
  const env = validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    limit: env.RATE_LIMIT_REQUESTS ?? 100,
    windowSeconds: env.RATE_LIMIT_WINDOW_SECONDS ?? 60 * 60,
    store: env.RATE_LIMIT_STORE ?? RateLimitStoreKind.Redis,
    failureMode: env.RATE_LIMIT_FAILURE_MODE ?? RateLimitFailureMode.Open,
  };
});
