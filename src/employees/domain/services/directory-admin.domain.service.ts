import {
  BadRequestException,
  HttpStatus,
  Injectable,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import bcrypt from 'bcryptjs';
import { EmployeeRepositoryPort } from '../repositories/employee.repository.port';
import { AdminRepositoryPort } from '../repositories/admin.repository.port';
import { UserRepository } from '../../../users/infrastructure/persistence/user.repository';
import { AccountChanges, NewAccount } from '../../../users/domain/user';
import {
  Employee,
  EmployeeProfileChanges,
} from '../entities/employee.entity';
import { Admin } from '../entities/admin.entity';
import { EmployeeStatus } from '../enums/employee-status.enum';
import { AuditService, AuthEventType } from '../../../audit/audit.service';
import { today } from '../../../utils/date';

export interface AccountInput {
  username: string;
  password: string;
  passwordConfirmation: string;
  firstName?: string;
  lastName?: string;
  email?: string;
}

export interface EmployeeInput extends AccountInput {
  isActive?: boolean;
  isManager?: boolean;
  status?: EmployeeStatus;
  managerId?: number;
}

export interface EmployeeUpdateInput {
  username?: string;
  firstName?: string;
  lastName?: string;
  email?: string;
  isActive?: boolean;
  isManager?: boolean;
  status?: EmployeeStatus;
  createdOn?: string;
  managerId?: number | null;
}

/**
 * DirectoryAdminDomainService
 *
 * Provisioning of employees and admins. Every operation that writes both
 * an account and a profile does so in one transaction (in the repository).
 *
 * Manager assignments never point an employee at itself, and never close
 * a loop in the reporting chain.
 */
@Injectable()
export class DirectoryAdminDomainService {
  constructor(
    private readonly employeeRepository: EmployeeRepositoryPort,
    private readonly adminRepository: AdminRepositoryPort,
    private readonly userRepository: UserRepository,
    private readonly auditService: AuditService,
  ) {}

  listEmployees(searchName?: string): Promise<Employee[]> {
    return this.employeeRepository.findMany(searchName);
  }

  async getEmployee(id: number): Promise<Employee> {
    const employee = await this.employeeRepository.findById(id);
    if (!employee) {
      throw new NotFoundException('Employee not found');
    }
    return employee;
  }

  async createEmployee(input: EmployeeInput): Promise<Employee> {
    const account = await this.prepareAccount(input);

    const managerId = input.managerId ?? null;
    if (managerId !== null) {
      await this.getManager(managerId);
    }

    const employee = await this.employeeRepository.createWithAccount(
      { ...account, isActive: input.isActive ?? true },
      {
        isManager: input.isManager ?? false,
        managerId,
        status: input.status ?? EmployeeStatus.ACTIVE,
        createdOn: today(),
      },
    );

    this.auditService.logAuthEvent({
      userId: employee.userId,
      portal: 'admin',
      event: AuthEventType.ACCOUNT_CREATED,
      success: true,
      metadata: { profile: 'employee', employeeId: employee.id },
    });

    return employee;
  }

  /**
   * Partial update. `managerId: null` clears the manager; a new manager
   * must exist, must not be the employee and must not report (directly or
   * indirectly) to the employee.
   */
  async updateEmployee(
    id: number,
    input: EmployeeUpdateInput,
  ): Promise<Employee> {
    const employee = await this.getEmployee(id);

    const accountChanges: AccountChanges = {};
    if (input.username !== undefined && input.username !== employee.username) {
      await this.assertUsernameFree(input.username);
      accountChanges.username = input.username;
    }
    if (input.firstName !== undefined) accountChanges.firstName = input.firstName;
    if (input.lastName !== undefined) accountChanges.lastName = input.lastName;
    if (input.email !== undefined) accountChanges.email = input.email;
    if (input.isActive !== undefined) accountChanges.isActive = input.isActive;

    const profileChanges: EmployeeProfileChanges = {};
    if (input.isManager !== undefined) profileChanges.isManager = input.isManager;
    if (input.status !== undefined) profileChanges.status = input.status;
    if (input.createdOn !== undefined) profileChanges.createdOn = input.createdOn;
    if (input.managerId !== undefined) {
      if (input.managerId !== null) {
        await this.assertAssignableManager(id, input.managerId);
      }
      profileChanges.managerId = input.managerId;
    }

    const updated = await this.employeeRepository.update(
      id,
      accountChanges,
      profileChanges,
    );

    this.auditService.logAuthEvent({
      userId: updated.userId,
      portal: 'admin',
      event: AuthEventType.ACCOUNT_UPDATED,
      success: true,
      metadata: {
        employeeId: id,
        fields: [
          ...Object.keys(accountChanges),
          ...Object.keys(profileChanges),
        ],
      },
    });

    return updated;
  }

  /**
   * Requests owned by or addressed to the employee, and subordinates
   * reporting to it, are kept with the reference cleared
   */
  async deleteEmployee(id: number): Promise<void> {
    const employee = await this.getEmployee(id);
    await this.employeeRepository.deleteWithAccount(id);

    this.auditService.logAuthEvent({
      userId: employee.userId,
      portal: 'admin',
      event: AuthEventType.ACCOUNT_DELETED,
      success: true,
      metadata: { employeeId: id },
    });
  }

  /**
   * Bootstrap check for the admin creation endpoint
   */
  async hasAdmin(): Promise<boolean> {
    return (await this.adminRepository.count()) > 0;
  }

  async createAdmin(input: AccountInput): Promise<Admin> {
    const account = await this.prepareAccount(input);
    const admin = await this.adminRepository.createWithAccount({
      ...account,
      isActive: true,
    });

    this.auditService.logAuthEvent({
      userId: admin.userId,
      portal: 'admin',
      event: AuthEventType.ACCOUNT_CREATED,
      success: true,
      metadata: { profile: 'admin', adminId: admin.id },
    });

    return admin;
  }

  private async prepareAccount(
    input: AccountInput,
  ): Promise<Omit<NewAccount, 'isActive'>> {
    if (input.password !== input.passwordConfirmation) {
      throw new BadRequestException({
        status: HttpStatus.BAD_REQUEST,
        errors: { passwordConfirmation: 'doesNotMatch' },
      });
    }

    await this.assertUsernameFree(input.username);

    const salt = await bcrypt.genSalt();
    return {
      username: input.username,
      password: await bcrypt.hash(input.password, salt),
      firstName: input.firstName ?? '',
      lastName: input.lastName ?? '',
      email: input.email ?? '',
    };
  }

  private async assertUsernameFree(username: string): Promise<void> {
    const existing = await this.userRepository.findByUsername(username);
    if (existing) {
      throw new UnprocessableEntityException({
        status: HttpStatus.UNPROCESSABLE_ENTITY,
        errors: { username: 'usernameAlreadyExists' },
      });
    }
  }

  private async getManager(managerId: number): Promise<Employee> {
    const manager = await this.employeeRepository.findById(managerId);
    if (!manager) {
      throw new NotFoundException(`Manager ${managerId} not found`);
    }
    return manager;
  }

  private async assertAssignableManager(
    employeeId: number,
    managerId: number,
  ): Promise<void> {
    if (managerId === employeeId) {
      throw new BadRequestException({
        status: HttpStatus.BAD_REQUEST,
        errors: { managerId: 'cannotManageSelf' },
      });
    }

    // Walk up from the new manager; reaching the employee means a loop
    const visited = new Set<number>([employeeId]);
    let current: Employee | null = await this.getManager(managerId);
    while (current) {
      if (visited.has(current.id)) {
        throw new BadRequestException({
          status: HttpStatus.BAD_REQUEST,
          errors: { managerId: 'managerCycle' },
        });
      }
      visited.add(current.id);
      current =
        current.managerId === null
          ? null
          : await this.employeeRepository.findById(current.managerId);
    }
  }
}
