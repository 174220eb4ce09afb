import { registerAs } from '@nestjs/config';
import {
  IsBooleanString,
  IsEmail,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { MailConfig } from './mail-config.type';

class EnvironmentVariablesValidator {
  @IsInt()
  @Min(0)
  @Max(65535)
  MAIL_PORT!: number;

  @IsString()
  MAIL_HOST!: string;

  @IsString()
  @IsOptional()
  MAIL_USER?: string;

  @IsString()
  @IsOptional()
  MAIL_PASSWORD?: string;

  @IsEmail()
  MAIL_DEFAULT_EMAIL!: string;

  @IsString()
  MAIL_DEFAULT_NAME!: string;

  @IsBooleanString()
  @IsOptional()
  MAIL_IGNORE_TLS?: string;

  @IsBooleanString()
  @IsOptional()
  MAIL_SECURE?: string;

  @IsBooleanString()
  @IsOptional()
  MAIL_REQUIRE_TLS?: string;
}

export default registerAs<MailConfig>('mail', () => {
  const env = validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    port: env.MAIL_PORT,
    host: env.MAIL_HOST,
    user: env.MAIL_USER,
    password: env.MAIL_PASSWORD,
    defaultEmail: env.MAIL_DEFAULT_EMAIL,
    defaultName: env.MAIL_DEFAULT_NAME,
    ignoreTLS: env.MAIL_IGNORE_TLS === 'true',
    secure: env.MAIL_SECURE === 'true',
    requireTLS: env.MAIL_REQUIRE_TLS === 'true',
  };
});
