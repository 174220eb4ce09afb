import { ApiProperty } from '@nestjs/swagger';
import { UserEntity } from '../../user/infrastructure/persistence/relational/entities/user.entity';

export class RefreshResponseDto {
  @ApiProperty()
  token!: string;

  @ApiProperty()
  refreshToken!: string;

  @ApiProperty()
  tokenExpires!: number;
}

export class LoginResponseDto extends RefreshResponseDto {
  @ApiProperty({ type: () => UserEntity })
  user!: UserEntity;
}
