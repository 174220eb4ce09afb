import {
  ConflictException,
  HttpStatus,
  Injectable,
  Logger,
  NotFoundException,
  UnauthorizedException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import bcrypt from 'bcryptjs';
import crypto from 'crypto';
import ms from 'ms';
import { DataSource } from 'typeorm';
import { AllConfigType } from '../config/config.type';
import { AuditLoggerService } from '../logger/audit-logger.provider';
import { SessionService } from '../session/session.service';
import { TaskKind } from '../task/domain/task';
import { TaskDispatcherService } from '../task/task-dispatcher.service';
import { UserEntity } from '../user/infrastructure/persistence/relational/entities/user.entity';
import { hashPassword, UserService } from '../user/user.service';
import { TransactionHelper } from '../utils/transaction-helper';
import {
  TokenPurpose,
  TokenStatus,
  TokenValidation,
} from '../verification-token/domain/verification-token';
import { VerificationTokenService } from '../verification-token/verification-token.service';
import { AuthEmailLoginDto } from './dto/auth-email-login.dto';
import { AuthRegisterLoginDto } from './dto/auth-register-login.dto';
import { AuthUpdateDto } from './dto/auth-update.dto';
import { LoginResponseDto, RefreshResponseDto } from './dto/login-response.dto';
import { JwtPayloadType } from './strategies/types/jwt-payload.type';
import { JwtRefreshPayloadType } from './strategies/types/jwt-refresh-payload.type';

function newSessionHash(): string {
  return crypto
    .createHash('sha256')
    .update(crypto.randomBytes(32))
    .digest('hex');
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly jwtService: JwtService,
    private readonly userService: UserService,
    private readonly sessionService: SessionService,
    private readonly verificationTokenService: VerificationTokenService,
    private readonly taskDispatcher: TaskDispatcherService,
    private readonly auditLogger: AuditLoggerService,
    private readonly configService: ConfigService<AllConfigType>,
    private readonly dataSource: DataSource,
  ) {}

  async register(dto: AuthRegisterLoginDto): Promise<void> {
    const user = await this.userService.create({
      email: dto.email,
      password: dto.password,
    });
    await this.taskDispatcher.enqueue(TaskKind.SendVerificationEmail, {
      userId: user.id,
    });
    this.auditLogger.log('user.registered', { userId: user.id });
  }

  async validateLogin(loginDto: AuthEmailLoginDto): Promise<LoginResponseDto> {
    const user = await this.userService.findByEmail(loginDto.email);

    if (!user) {
      throw new UnprocessableEntityException({
        status: HttpStatus.UNPROCESSABLE_ENTITY,
        errors: {
          email: 'notFound',
        },
      });
    }

    const isValidPassword = await bcrypt.compare(
      loginDto.password,
      user.password,
    );

    if (!isValidPassword) {
      this.auditLogger.warn('user.login_failed', { userId: user.id });
      throw new UnprocessableEntityException({
        status: HttpStatus.UNPROCESSABLE_ENTITY,
        errors: {
          password: 'incorrectPassword',
        },
      });
    }

    const hash = newSessionHash();
    const session = await this.sessionService.create({ userId: user.id, hash });
    const tokens = await this.getTokensData({
      id: user.id,
      sessionId: session.id,
      hash,
    });
    this.auditLogger.log('user.login', {
      userId: user.id,
      sessionId: session.id,
    });

    return { ...tokens, user };
  }

  async confirmEmail(token: string): Promise<void> {
    const result = await this.verificationTokenService.validate(
      token,
      TokenPurpose.EmailVerification,
      { type: 'verify-email' },
    );

    if (result.status === TokenStatus.Expired) {
      await this.requeueVerification(result.userId);
    }
    this.assertTokenAccepted(result);

    this.auditLogger.log('user.email_verified', { userId: result.userId });
  }

  async resendVerification(email: string): Promise<void> {
    const user = await this.userService.findByEmail(email);
    if (!user || user.isVerified) {
      return;
    }
    await this.taskDispatcher.enqueue(TaskKind.SendVerificationEmail, {
      userId: user.id,
    });
  }

  async forgotPassword(email: string): Promise<void> {
    const user = await this.userService.findByEmail(email);
    if (!user) {
      this.logger.debug('Password reset requested for an unknown email');
      return;
    }
    await this.taskDispatcher.enqueue(TaskKind.SendPasswordResetEmail, {
      userId: user.id,
    });
    this.auditLogger.log('user.password_reset_requested', { userId: user.id });
  }

  async resetPassword(token: string, password: string): Promise<void> {
    const result = await this.verificationTokenService.validate(
      token,
      TokenPurpose.PasswordReset,
      { type: 'reset-password', passwordHash: await hashPassword(password) },
    );
    this.assertTokenAccepted(result);

    this.auditLogger.log('user.password_reset', { userId: result.userId });
  }

  me(jwtPayload: JwtPayloadType): Promise<UserEntity> {
    return this.userService.getById(jwtPayload.id);
  }

  async update(
    jwtPayload: JwtPayloadType,
    dto: AuthUpdateDto,
  ): Promise<UserEntity> {
    if (dto.password !== undefined) {
      await this.changePassword(jwtPayload, dto.password, dto.oldPassword);
    }

    if (dto.email !== undefined) {
      const email = dto.email;
      // Links already mailed to the old address must not verify the new one.
      const user = await TransactionHelper.runInTransaction(
        this.dataSource,
        async (manager) => {
          const changed = await this.userService.changeEmail(
            jwtPayload.id,
            email,
            manager,
          );
          await this.verificationTokenService.revokeLive(
            changed.id,
            TokenPurpose.EmailVerification,
            new Date(),
            manager,
          );
          return changed;
        },
      );
      await this.taskDispatcher.enqueue(TaskKind.SendVerificationEmail, {
        userId: user.id,
      });
      this.auditLogger.log('user.email_changed', { userId: user.id });
    }

    return this.userService.getById(jwtPayload.id);
  }

  async refreshToken(
    data: Pick<JwtRefreshPayloadType, 'sessionId' | 'hash'>,
  ): Promise<RefreshResponseDto> {
    const session = await this.sessionService.findById(data.sessionId);

    if (!session || session.hash !== data.hash) {
      throw new UnauthorizedException();
    }

    const hash = newSessionHash();
    await this.sessionService.updateHash(session.id, hash);

    return this.getTokensData({
      id: session.userId,
      sessionId: session.id,
      hash,
    });
  }

  async logout(jwtPayload: Pick<JwtPayloadType, 'sessionId'>): Promise<void> {
    await this.sessionService.deleteById(jwtPayload.sessionId);
  }

  async softDelete(jwtPayload: JwtPayloadType): Promise<void> {
    await this.userService.remove(jwtPayload.id);
    await this.sessionService.deleteByUserId(jwtPayload.id);
    this.auditLogger.log('user.disabled', { userId: jwtPayload.id });
  }

  private async changePassword(
    jwtPayload: JwtPayloadType,
    password: string,
    oldPassword: string | undefined,
  ): Promise<void> {
    const user = await this.userService.getById(jwtPayload.id);
    const isValidOldPassword =
      oldPassword !== undefined &&
      (await bcrypt.compare(oldPassword, user.password));

    if (!isValidOldPassword) {
      throw new UnprocessableEntityException({
        status: HttpStatus.UNPROCESSABLE_ENTITY,
        errors: {
          oldPassword: 'incorrectOldPassword',
        },
      });
    }

    await this.userService.updatePassword(user.id, password);
    await this.sessionService.deleteByUserIdExcept(
      user.id,
      jwtPayload.sessionId,
    );
    this.auditLogger.log('user.password_changed', { userId: user.id });
  }

  private async requeueVerification(userId: number): Promise<void> {
    const user = await this.userService.findById(userId);
    if (!user || user.isVerified) {
      return;
    }
    await this.taskDispatcher.enqueue(TaskKind.SendVerificationEmail, {
      userId: user.id,
    });
  }

  private assertTokenAccepted(
    result: TokenValidation,
  ): asserts result is { status: TokenStatus.Valid; userId: number } {
    switch (result.status) {
      case TokenStatus.Valid:
        return;
      case TokenStatus.Expired:
        throw new UnprocessableEntityException({
          status: HttpStatus.UNPROCESSABLE_ENTITY,
          errors: {
            token: 'expired',
          },
        });
      case TokenStatus.Consumed:
        throw new ConflictException({
          status: HttpStatus.CONFLICT,
          errors: {
            token: 'alreadyUsed',
          },
        });
      case TokenStatus.Superseded:
        throw new ConflictException({
          status: HttpStatus.CONFLICT,
          errors: {
            token: 'superseded',
          },
        });
      case TokenStatus.NotFound:
        throw new NotFoundException({
          status: HttpStatus.NOT_FOUND,
          errors: {
            token: 'notFound',
          },
        });
    }
  }

  private async getTokensData(data: {
    id: number;
    sessionId: number;
    hash: string;
  }): Promise<RefreshResponseDto> {
    const tokenExpiresIn = this.configService.getOrThrow('auth.expires', {
      infer: true,
    });

    const tokenExpires = Date.now() + ms(tokenExpiresIn);

    const [token, refreshToken] = await Promise.all([
      this.jwtService.signAsync(
        {
          id: data.id,
          sessionId: data.sessionId,
        },
        {
          secret: this.configService.getOrThrow('auth.secret', { infer: true }),
          expiresIn: tokenExpiresIn,
        },
      ),
      this.jwtService.signAsync(
        {
          sessionId: data.sessionId,
          hash: data.hash,
        },
        {
          secret: this.configService.getOrThrow('auth.refreshSecret', {
            infer: true,
          }),
          expiresIn: this.configService.getOrThrow('auth.refreshExpires', {
            infer: true,
          }),
        },
      ),
    ]);

    return {
      token,
      refreshToken,
      tokenExpires,
    };
  }
}
