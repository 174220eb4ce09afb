import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsEmail, IsString, IsStrongPassword } from 'class-validator';
import { lowerCaseTransformer } from '../../utils/transformers/lower-case.transformer';
import { MatchesProperty } from '../../utils/validators/matches-property.validator';
import { PASSWORD_POLICY, PASSWORD_POLICY_MESSAGE } from './password-policy';

export class AuthRegisterLoginDto {
  @ApiProperty({ example: 'jane@example.com', type: String })
  @Transform(lowerCaseTransformer)
  @IsEmail()
  email!: string;

  @ApiProperty()
  @IsStrongPassword(PASSWORD_POLICY, { message: PASSWORD_POLICY_MESSAGE })
  password!: string;

  @ApiProperty()
  @IsString()
  @MatchesProperty('password', { message: 'passwordsDoNotMatch' })
  confirmPassword!: string;
}
