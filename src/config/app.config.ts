import { registerAs } from '@nestjs/config';
import {
  IsBooleanString,
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
} from 'class-validator';
import validateConfig from '../utils/validate-config';
import { AppConfig } from './app-config.type';

enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

class EnvironmentVariablesValidator {
  @IsEnum(Environment)
  @IsOptional()
  NODE_ENV?: Environment;

  @IsInt()
  @Min(0)
  @Max(65535)
  @IsOptional()
  APP_PORT?: number;

  @IsString()
  @IsOptional()
  APP_NAME?: string;

  @IsUrl({ require_tld: false })
  @IsOptional()
  FRONTEND_DOMAIN?: string;

  @IsUrl({ require_tld: false })
  @IsOptional()
  BACKEND_DOMAIN?: string;

  @IsString()
  @IsOptional()
  API_PREFIX?: string;

  @IsBooleanString()
  @IsOptional()
  APP_TRUST_PROXY?: string;
}

export default registerAs<AppConfig>('app', () => {
  const env = validateConfig(process.env, EnvironmentVariablesValidator);
  const port = env.APP_PORT ?? 3000;

  return {
    nodeEnv: env.NODE_ENV ?? Environment.Development,
    name: env.APP_NAME ?? 'Events Scheduler',
    workingDirectory: process.env.PWD ?? process.cwd(),
    frontendDomain: env.FRONTEND_DOMAIN ?? 'http://localhost:9000',
    backendDomain: env.BACKEND_DOMAIN ?? `http://localhost:${port}`,
    port,
    apiPrefix: env.API_PREFIX ?? 'api',
    trustProxy: env.APP_TRUST_PROXY === 'true',
  };
});
