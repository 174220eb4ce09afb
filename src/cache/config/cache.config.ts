import { registerAs } from '@nestjs/config';
import {
  IsBooleanString,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { CacheConfig } from './cache-config.type';

class EnvironmentVariablesValidator {
  @IsBooleanString()
  @IsOptional()
  REDIS_ENABLED?: string;

  @IsString()
  @IsOptional()
  REDIS_HOST?: string;

  @IsInt()
  @Min(0)
  @Max(65535)
  @IsOptional()
  REDIS_PORT?: number;

  @IsString()
  @IsOptional()
  REDIS_PASSWORD?: string;

  @IsBooleanString()
  @IsOptional()
  REDIS_TLS?: string;
}

export default registerAs<CacheConfig>('cache', () => {
  const env = validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    enabled: env.REDIS_ENABLED !== 'false',
    host: env.REDIS_HOST ?? 'localhost',
    port: env.REDIS_PORT ?? 6379,
    password: env.REDIS_PASSWORD,
    tls: env.REDIS_TLS === 'true',
  };
});
