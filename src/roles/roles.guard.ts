import {
  Injectable,
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { RoleEnum } from './roles.enum';
import { ROLES_KEY } from './roles.decorator';
import { IdentityDirectoryService } from '../identity/identity-directory.service';
import { AuthenticatedRequest } from '../identity/authenticated-request.type';

/**
 * Resolves the caller's principal once and checks it against the roles
 * declared with @Roles(). Handlers without @Roles() accept any
 * authenticated principal, including one without a profile.
 *
 * Must run after AuthGuard('jwt').
 */
@Injectable()
export class RolesGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly identityDirectory: IdentityDirectoryService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();

    const userId = request.user?.id;
    if (!userId) {
      throw new UnauthorizedException();
    }

    const principal = await this.identityDirectory.resolve(Number(userId));
    request.principal = principal;

    const roles = this.reflector.getAllAndOverride<RoleEnum[] | undefined>(
      ROLES_KEY,
      [context.getHandler(), context.getClass()],
    );
    if (!roles?.length) {
      return true;
    }

    if (principal.kind === 'anonymous') {
      throw new ForbiddenException(
        'No employee or admin profile exists for this account',
      );
    }
    if (!roles.includes(principal.kind)) {
      throw new ForbiddenException(
        `This resource requires one of the roles: ${roles.join(', ')}`,
      );
    }

    return true;
  }
}
