import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { SessionModule } from '../session/session.module';
import { TaskModule } from '../task/task.module';
import { UserModule } from '../user/user.module';
import { VerificationTokenModule } from '../verification-token/verification-token.module';
import { AuthController } from './auth.controller';
import { JWTAuthGuard } from './auth.guard';
import { AuthService } from './auth.service';
import { JwtRefreshStrategy } from './strategies/jwt-refresh.strategy';
import { JwtStrategy } from './strategies/jwt.strategy';

@Module({
  imports: [
    UserModule,
    SessionModule,
    VerificationTokenModule,
    TaskModule,
    PassportModule,
    JwtModule.register({}),
  ],
  controllers: [AuthController],
  providers: [AuthService, JwtStrategy, JwtRefreshStrategy, JWTAuthGuard],
  exports: [AuthService, JWTAuthGuard, SessionModule],
})
export class AuthModule {}
