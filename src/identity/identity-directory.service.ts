import {
  HttpStatus,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { UserRepository } from '../users/infrastructure/persistence/user.repository';
import { EmployeeRepositoryPort } from '../employees/domain/repositories/employee.repository.port';
import { User } from '../users/domain/user';
import { RoleEnum } from '../roles/roles.enum';
import { Principal } from './domain/principal';

/**
 * Identity Directory
 *
 * Maps an authenticated account to exactly one role profile. Lookup
 * failures are not errors here: an account without a profile resolves to
 * `anonymous` and is denied by the roles guard. A deactivated account is
 * refused with 401 so tokens issued before deactivation stop working.
 */
@Injectable()
export class IdentityDirectoryService {
  constructor(
    private readonly userRepository: UserRepository,
    private readonly employeeRepository: EmployeeRepositoryPort,
  ) {}

  async resolve(userId: number): Promise<Principal> {
    const user = await this.userRepository.findById(userId);
    if (!user) {
      return { kind: 'anonymous', userId };
    }
    if (!user.isActive) {
      throw new UnauthorizedException({
        status: HttpStatus.UNAUTHORIZED,
        errors: { username: 'inactive' },
      });
    }
    return this.resolveUser(user);
  }

  async resolveUser(user: User): Promise<Principal> {
    if (user.isSuperuser) {
      return { kind: RoleEnum.admin, userId: user.id };
    }

    const employee = await this.employeeRepository.findByUserId(user.id);
    if (!employee) {
      return { kind: 'anonymous', userId: user.id };
    }

    return employee.isManager
      ? { kind: RoleEnum.manager, userId: user.id, employeeId: employee.id }
      : { kind: RoleEnum.employee, userId: user.id, employeeId: employee.id };
  }
}
