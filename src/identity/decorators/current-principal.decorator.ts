import {
  createParamDecorator,
  ExecutionContext,
  ForbiddenException,
  InternalServerErrorException,
} from '@nestjs/common';
import { AuthenticatedRequest } from '../authenticated-request.type';
import { Principal, PrincipalKind } from '../domain/principal';

/**
 * Injects the principal resolved by RolesGuard. Handlers using it must
 * run behind that guard.
 *
 * With a kind, e.g. `@CurrentPrincipal(RoleEnum.manager)`, any other kind
 * of principal is refused, so the parameter can be typed as the narrowed
 * principal.
 */
export const CurrentPrincipal = createParamDecorator(
  (kind: PrincipalKind | undefined, context: ExecutionContext): Principal => {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.principal) {
      throw new InternalServerErrorException('Principal was not resolved');
    }
    if (kind && request.principal.kind !== kind) {
      throw new ForbiddenException(`This resource requires the role: ${kind}`);
    }
    return request.principal;
  },
);
