import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsEmail } from 'class-validator';
import { lowerCaseTransformer } from '../../utils/transformers/lower-case.transformer';

/** Body of the requests that only name an account: resend verification and forgot password. */
export class AuthEmailDto {
  @ApiProperty({ example: 'jane@example.com', type: String })
  @Transform(lowerCaseTransformer)
  @IsEmail()
  email!: string;
}
