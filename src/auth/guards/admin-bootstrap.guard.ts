import {
  ExecutionContext,
  ForbiddenException,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { lastValueFrom, Observable } from 'rxjs';
import { EmployeesService } from '../../employees/employees.service';
import { IdentityDirectoryService } from '../../identity/identity-directory.service';
import { AuthenticatedRequest } from '../../identity/authenticated-request.type';
import { RoleEnum } from '../../roles/roles.enum';

/**
 * Open while no admin exists, so the first admin can be created.
 * Afterwards behaves as AuthGuard('jwt') followed by an admin role check.
 */
@Injectable()
export class AdminBootstrapGuard extends AuthGuard('jwt') {
  constructor(
    private readonly employeesService: EmployeesService,
    private readonly identityDirectory: IdentityDirectoryService,
  ) {
    super();
  }

  async canActivate(context: ExecutionContext): Promise<boolean> {
    if (!(await this.employeesService.hasAdmin())) {
      return true;
    }

    const result = super.canActivate(context);
    const authenticated =
      result instanceof Observable ? await lastValueFrom(result) : await result;
    if (!authenticated) {
      return false;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.user) {
      throw new UnauthorizedException();
    }

    const principal = await this.identityDirectory.resolve(request.user.id);
    request.principal = principal;
    if (principal.kind !== RoleEnum.admin) {
      throw new ForbiddenException('Only admins can create admins');
    }

    return true;
  }
}
