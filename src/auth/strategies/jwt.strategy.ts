import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { AllConfigType } from '../../config/config.type';
import { SessionService } from '../../session/session.service';
import { JwtPayloadType } from './types/jwt-payload.type';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  constructor(
    configService: ConfigService<AllConfigType>,
    private readonly sessionService: SessionService,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      secretOrKey: configService.getOrThrow('auth.secret', { infer: true }),
    });
  }

  // Logging out or resetting the password ends the session, which revokes
  // access tokens still inside their lifetime.
  async validate(payload: JwtPayloadType): Promise<JwtPayloadType> {
    if (!payload.id || !payload.sessionId) {
      throw new UnauthorizedException();
    }
    const session = await this.sessionService.findById(payload.sessionId);
    if (!session || session.userId !== payload.id) {
      throw new UnauthorizedException('Session has ended');
    }
    return payload;
  }
}
