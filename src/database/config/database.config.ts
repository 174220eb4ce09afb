import { registerAs } from '@nestjs/config';
import {
  IsBooleanString,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateIf,
} from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { DatabaseConfig } from './database-config.type';

class EnvironmentVariablesValidator {
  @ValidateIf((envValues: EnvironmentVariablesValidator) => !!envValues.DATABASE_URL)
  @IsString()
  DATABASE_URL?: string;

  @ValidateIf((envValues: EnvironmentVariablesValidator) => !envValues.DATABASE_URL)
  @IsString()
  DATABASE_HOST?: string;

  @IsInt()
  @Min(0)
  @Max(65535)
  @IsOptional()
  DATABASE_PORT?: number;

  @ValidateIf((envValues: EnvironmentVariablesValidator) => !envValues.DATABASE_URL)
  @IsString()
  DATABASE_USERNAME?: string;

  @ValidateIf((envValues: EnvironmentVariablesValidator) => !envValues.DATABASE_URL)
  @IsString()
  DATABASE_PASSWORD?: string;

  @ValidateIf((envValues: EnvironmentVariablesValidator) => !envValues.DATABASE_URL)
  @IsString()
  DATABASE_NAME?: string;

  @IsBooleanString()
  @IsOptional()
  DATABASE_SYNCHRONIZE?: string;

  @IsBooleanString()
  @IsOptional()
  DATABASE_LOGGING?: string;

  @IsInt()
  @Min(1)
  @IsOptional()
  DATABASE_MAX_CONNECTIONS?: number;

  @IsBooleanString()
  @IsOptional()
  DATABASE_SSL_ENABLED?: string;

  @IsBooleanString()
  @IsOptional()
  DATABASE_REJECT_UNAUTHORIZED?: string;
}

export default registerAs<DatabaseConfig>('database', () => {
  const env = validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    url: env.DATABASE_URL,
    host: env.DATABASE_HOST,
    port: env.DATABASE_PORT ?? 5432,
    username: env.DATABASE_USERNAME,
    password: env.DATABASE_PASSWORD,
    name: env.DATABASE_NAME,
    synchronize: env.DATABASE_SYNCHRONIZE === 'true',
    logging: env.DATABASE_LOGGING === 'true',
    maxConnections: env.DATABASE_MAX_CONNECTIONS ?? 100,
    sslEnabled: env.DATABASE_SSL_ENABLED === 'true',
    rejectUnauthorized: env.DATABASE_REJECT_UNAUTHORIZED === 'true',
  };
});
