import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Patch,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBearerAuth,
  ApiNoContentResponse,
  ApiOkResponse,
  ApiTags,
} from '@nestjs/swagger';
import { UserEntity } from '../user/infrastructure/persistence/relational/entities/user.entity';
import { JWTAuthGuard } from './auth.guard';
import { AuthService } from './auth.service';
import { AuthUser } from './decorators/auth-user.decorator';
import { AuthConfirmEmailDto } from './dto/auth-confirm-email.dto';
import { AuthEmailLoginDto } from './dto/auth-email-login.dto';
import { AuthEmailDto } from './dto/auth-email.dto';
import { AuthRegisterLoginDto } from './dto/auth-register-login.dto';
import { AuthResetPasswordDto } from './dto/auth-reset-password.dto';
import { AuthUpdateDto } from './dto/auth-update.dto';
import { LoginResponseDto, RefreshResponseDto } from './dto/login-response.dto';
import { JwtPayloadType } from './strategies/types/jwt-payload.type';
import { JwtRefreshPayloadType } from './strategies/types/jwt-refresh-payload.type';

@ApiTags('Auth')
@Controller({
  path: 'auth',
  version: '1',
})
export class AuthController {
  constructor(private readonly service: AuthService) {}

  @Post('email/register')
  @ApiNoContentResponse({ description: 'Verification email queued' })
  @HttpCode(HttpStatus.NO_CONTENT)
  public register(@Body() createUserDto: AuthRegisterLoginDto): Promise<void> {
    return this.service.register(createUserDto);
  }

  @Post('email/login')
  @ApiOkResponse({
    type: LoginResponseDto,
  })
  @HttpCode(HttpStatus.OK)
  public login(@Body() loginDto: AuthEmailLoginDto): Promise<LoginResponseDto> {
    return this.service.validateLogin(loginDto);
  }

  @Post('email/confirm')
  @ApiNoContentResponse()
  @HttpCode(HttpStatus.NO_CONTENT)
  public confirmEmail(
    @Body() confirmEmailDto: AuthConfirmEmailDto,
  ): Promise<void> {
    return this.service.confirmEmail(confirmEmailDto.token);
  }

  @Post('email/resend')
  @ApiNoContentResponse()
  @HttpCode(HttpStatus.NO_CONTENT)
  public resendVerification(@Body() dto: AuthEmailDto): Promise<void> {
    return this.service.resendVerification(dto.email);
  }

  @Post('forgot/password')
  @ApiNoContentResponse()
  @HttpCode(HttpStatus.NO_CONTENT)
  public forgotPassword(@Body() forgotPasswordDto: AuthEmailDto): Promise<void> {
    return this.service.forgotPassword(forgotPasswordDto.email);
  }

  @Post('reset/password')
  @ApiNoContentResponse()
  @HttpCode(HttpStatus.NO_CONTENT)
  public resetPassword(
    @Body() resetPasswordDto: AuthResetPasswordDto,
  ): Promise<void> {
    return this.service.resetPassword(
      resetPasswordDto.token,
      resetPasswordDto.password,
    );
  }

  @ApiBearerAuth()
  @Get('me')
  @UseGuards(JWTAuthGuard)
  @ApiOkResponse({
    type: UserEntity,
  })
  @HttpCode(HttpStatus.OK)
  public me(@AuthUser() user: JwtPayloadType): Promise<UserEntity> {
    return this.service.me(user);
  }

  @ApiBearerAuth()
  @Patch('me')
  @UseGuards(JWTAuthGuard)
  @ApiOkResponse({
    type: UserEntity,
  })
  @HttpCode(HttpStatus.OK)
  public update(
    @AuthUser() user: JwtPayloadType,
    @Body() userDto: AuthUpdateDto,
  ): Promise<UserEntity> {
    return this.service.update(user, userDto);
  }

  @ApiBearerAuth()
  @Delete('me')
  @UseGuards(JWTAuthGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  public delete(@AuthUser() user: JwtPayloadType): Promise<void> {
    return this.service.softDelete(user);
  }

  @ApiOkResponse({
    type: RefreshResponseDto,
  })
  @ApiBearerAuth()
  @Post('refresh')
  @UseGuards(AuthGuard('jwt-refresh'))
  @HttpCode(HttpStatus.OK)
  public refresh(
    @AuthUser() refresh: JwtRefreshPayloadType,
  ): Promise<RefreshResponseDto> {
    return this.service.refreshToken({
      sessionId: refresh.sessionId,
      hash: refresh.hash,
    });
  }

  @ApiBearerAuth()
  @Post('logout')
  @UseGuards(JWTAuthGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  public logout(@AuthUser() user: JwtPayloadType): Promise<void> {
    return this.service.logout({ sessionId: user.sessionId });
  }
}
