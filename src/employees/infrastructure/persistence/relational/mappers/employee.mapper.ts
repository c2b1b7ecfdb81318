import {
  Employee,
  EmployeeReference,
} from '../../../../domain/entities/employee.entity';
import { Admin } from '../../../../domain/entities/admin.entity';
import { EmployeeEntity } from '../entities/employee.entity';
import { AdminEntity } from '../entities/admin.entity';

export class EmployeeMapper {
  /**
   * Requires the `user` relation (and `manager.user` when a manager is set)
   * to be loaded
   */
  static toDomain(entity: EmployeeEntity): Employee {
    return {
      ...EmployeeMapper.toReference(entity),
      userId: entity.userId,
      isActive: entity.user.isActive,
      isManager: entity.isManager,
      managerId: entity.managerId,
      manager: entity.manager ? EmployeeMapper.toReference(entity.manager) : null,
      status: entity.status,
      createdOn: entity.createdOn,
    };
  }

  static toReference(entity: EmployeeEntity): EmployeeReference {
    return {
      id: entity.id,
      username: entity.user?.username ?? '',
      firstName: entity.user?.firstName ?? '',
      lastName: entity.user?.lastName ?? '',
      email: entity.user?.email ?? '',
    };
  }

  static adminToDomain(entity: AdminEntity): Admin {
    return {
      id: entity.id,
      userId: entity.userId,
      username: entity.user?.username ?? '',
    };
  }
}
