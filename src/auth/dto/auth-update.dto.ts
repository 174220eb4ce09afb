import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import {
  IsEmail,
  IsNotEmpty,
  IsOptional,
  IsStrongPassword,
  ValidateIf,
} from 'class-validator';
import { lowerCaseTransformer } from '../../utils/transformers/lower-case.transformer';
import { PASSWORD_POLICY, PASSWORD_POLICY_MESSAGE } from './password-policy';

export class AuthUpdateDto {
  @ApiPropertyOptional({ example: 'new.email@example.com', type: String })
  @IsOptional()
  @Transform(lowerCaseTransformer)
  @IsEmail()
  email?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsStrongPassword(PASSWORD_POLICY, { message: PASSWORD_POLICY_MESSAGE })
  password?: string;

  @ApiPropertyOptional()
  @ValidateIf((dto: AuthUpdateDto) => dto.password !== undefined)
  @IsNotEmpty({ message: 'missingOldPassword' })
  oldPassword?: string;
}
