import { ExtractJwt, Strategy } from 'passport-jwt';
import { Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ConfigService } from '@nestjs/config';
import { JwtPayloadType } from './types/jwt-payload.type';
import { AllConfigType } from '../../config/config.type';
import { AuditService, AuthEventType } from '../../audit/audit.service';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  constructor(
    private readonly auditService: AuditService,
    configService: ConfigService<AllConfigType>,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      secretOrKey: configService.getOrThrow('auth.secret', { infer: true }),
      issuer: configService.get('auth.issuer', { infer: true }),
    });
  }

  // The account is not loaded here: RolesGuard resolves it per request,
  // so a deleted or deactivated account loses access on its next call.
  public validate(payload: Partial<JwtPayloadType>): JwtPayloadType {
    if (typeof payload.id !== 'number') {
      this.auditService.logAuthEvent({
        userId: 'unknown',
        portal: 'jwt',
        event: AuthEventType.TOKEN_VALIDATION_FAILED,
        success: false,
        errorMessage: 'Token payload has no account id',
      });
      throw new UnauthorizedException();
    }

    return { id: payload.id, iat: payload.iat, exp: payload.exp };
  }
}
