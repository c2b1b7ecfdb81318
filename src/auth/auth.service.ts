import {
  ForbiddenException,
  HttpStatus,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import bcrypt from 'bcryptjs';
import ms from 'ms';
import { plainToClass } from 'class-transformer';
import { UserRepository } from '../users/infrastructure/persistence/user.repository';
import { UserResponseDto } from '../users/dto/user-response.dto';
import { User } from '../users/domain/user';
import { IdentityDirectoryService } from '../identity/identity-directory.service';
import { RoleEnum } from '../roles/roles.enum';
import { AllConfigType } from '../config/config.type';
import { AuditService, AuthEventType } from '../audit/audit.service';
import { AuthLoginDto } from './dto/auth-login.dto';
import { LoginResponseDto } from './dto/login-response.dto';
import { JwtPayloadType } from './strategies/types/jwt-payload.type';

@Injectable()
export class AuthService {
  constructor(
    private readonly jwtService: JwtService,
    private readonly userRepository: UserRepository,
    private readonly identityDirectory: IdentityDirectoryService,
    private readonly configService: ConfigService<AllConfigType>,
    private readonly auditService: AuditService,
  ) {}

  /**
   * Each role logs in through its own portal. Valid credentials presented
   * at another role's portal are refused with 403.
   */
  async validateLogin(
    portal: RoleEnum,
    loginDto: AuthLoginDto,
  ): Promise<LoginResponseDto> {
    const user = await this.userRepository.findByUsername(loginDto.username);

    if (!user) {
      this.auditService.logAuthEvent({
        userId: 'unknown',
        portal,
        event: AuthEventType.LOGIN_FAILED,
        success: false,
        errorMessage: 'User not found',
      });
      throw this.invalidCredentials();
    }

    const isValidPassword = await bcrypt.compare(
      loginDto.password,
      user.password,
    );
    if (!isValidPassword) {
      this.auditService.logAuthEvent({
        userId: user.id,
        portal,
        event: AuthEventType.LOGIN_FAILED,
        success: false,
        errorMessage: 'Incorrect password',
      });
      throw this.invalidCredentials();
    }

    if (!user.isActive) {
      this.auditService.logAuthEvent({
        userId: user.id,
        portal,
        event: AuthEventType.LOGIN_FAILED,
        success: false,
        errorMessage: 'Account inactive',
      });
      throw new UnauthorizedException({
        status: HttpStatus.UNAUTHORIZED,
        errors: { username: 'inactive' },
      });
    }

    const principal = await this.identityDirectory.resolveUser(user);
    if (principal.kind !== portal) {
      this.auditService.logAuthEvent({
        userId: user.id,
        portal,
        event: AuthEventType.LOGIN_FAILED,
        success: false,
        errorMessage: `Wrong portal for ${principal.kind}`,
      });
      throw new ForbiddenException(
        principal.kind === 'anonymous'
          ? 'No employee or admin profile exists for this account'
          : `Please log in through the ${principal.kind} portal`,
      );
    }

    const { token, tokenExpires } = await this.getTokenData({ id: user.id });

    this.auditService.logAuthEvent({
      userId: user.id,
      portal,
      event: AuthEventType.LOGIN_SUCCESS,
      success: true,
    });

    return {
      token,
      tokenExpires,
      role: portal,
      user: this.toUserResponse(user),
    };
  }

  private async getTokenData(
    payload: Pick<JwtPayloadType, 'id'>,
  ): Promise<{ token: string; tokenExpires: number }> {
    const tokenExpiresIn = this.configService.getOrThrow('auth.expires', {
      infer: true,
    });
    const issuer = this.configService.get('auth.issuer', { infer: true });

    const token = await this.jwtService.signAsync(
      { id: payload.id },
      {
        secret: this.configService.getOrThrow('auth.secret', { infer: true }),
        expiresIn: tokenExpiresIn,
        ...(issuer ? { issuer } : {}),
      },
    );

    return { token, tokenExpires: Date.now() + ms(tokenExpiresIn) };
  }

  private invalidCredentials(): UnauthorizedException {
    return new UnauthorizedException({
      status: HttpStatus.UNAUTHORIZED,
      errors: { credentials: 'invalid' },
    });
  }

  private toUserResponse(user: User): UserResponseDto {
    return plainToClass(UserResponseDto, user, {
      excludeExtraneousValues: true,
    });
  }
}
