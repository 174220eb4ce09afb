import { registerAs } from '@nestjs/config';

import { IsString, IsOptional, Matches } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { AuthConfig } from './auth-config.type';

const DURATION = /^\d+(ms|s|m|h|d|w|y)?$/;

class EnvironmentVariablesValidator {
  @IsString()
  AUTH_JWT_SECRET!: string;

  @Matches(DURATION)
  @IsOptional()
  AUTH_JWT_TOKEN_EXPIRES_IN?: string;

  @IsString()
  AUTH_REFRESH_SECRET!: string;

  @Matches(DURATION)
  @IsOptional()
  AUTH_REFRESH_TOKEN_EXPIRES_IN?: string;

  @Matches(DURATION)
  @IsOptional()
  AUTH_EMAIL_VERIFICATION_TTL?: string;

  @Matches(DURATION)
  @IsOptional()
  AUTH_PASSWORD_RESET_TTL?: string;

  @Matches(DURATION)
  @IsOptional()
  AUTH_TOKEN_RETENTION?: string;
}

export default registerAs<AuthConfig>('auth', () => {
  const env = validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    secret: env.AUTH_JWT_SECRET,
    expires: env.AUTH_JWT_TOKEN_EXPIRES_IN ?? '15m',
    refreshSecret: env.AUTH_REFRESH_SECRET,
    refreshExpires: env.AUTH_REFRESH_TOKEN_EXPIRES_IN ?? '3650d',
    emailVerificationExpires: env.AUTH_EMAIL_VERIFICATION_TTL ?? '1h',
    passwordResetExpires: env.AUTH_PASSWORD_RESET_TTL ?? '30m',
    tokenRetention: env.AUTH_TOKEN_RETENTION ?? '7d',
  };
});
