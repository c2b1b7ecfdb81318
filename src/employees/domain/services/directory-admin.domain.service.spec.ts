import { Test, TestingModule } from '@nestjs/testing';
import {
  BadRequestException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import bcrypt from 'bcryptjs';
import { DirectoryAdminDomainService } from './directory-admin.domain.service';
import { EmployeeRepositoryPort } from '../repositories/employee.repository.port';
import { AdminRepositoryPort } from '../repositories/admin.repository.port';
import { UserRepository } from '../../../users/infrastructure/persistence/user.repository';
import { AuditService, AuthEventType } from '../../../audit/audit.service';
import { Employee } from '../entities/employee.entity';
import { EmployeeStatus } from '../enums/employee-status.enum';
import { User } from '../../../users/domain/user';
import { today } from '../../../utils/date';

function buildEmployee(overrides: Partial<Employee> = {}): Employee {
  return {
    id: 1,
    username: 'user1',
    firstName: 'First',
    lastName: 'Last',
    email: 'user1@example.com',
    userId: 101,
    isActive: true,
    isManager: false,
    managerId: null,
    manager: null,
    status: EmployeeStatus.ACTIVE,
    createdOn: '2024-01-01',
    ...overrides,
  };
}

const existingUser: User = {
  id: 101,
  username: 'taken',
  password: 'hash',
  firstName: '',
  lastName: '',
  email: '',
  isActive: true,
  isSuperuser: false,
  createdAt: new Date('2024-01-01T00:00:00Z'),
  updatedAt: new Date('2024-01-01T00:00:00Z'),
};

function errorsOf(error: unknown): unknown {
  return error instanceof BadRequestException ||
    error instanceof UnprocessableEntityException
    ? error.getResponse()
    : error;
}

describe('DirectoryAdminDomainService', () => {
  let service: DirectoryAdminDomainService;
  let employeeRepository: jest.Mocked<EmployeeRepositoryPort>;
  let adminRepository: jest.Mocked<AdminRepositoryPort>;
  let userRepository: jest.Mocked<UserRepository>;
  let audit: jest.Mocked<Pick<AuditService, 'logAuthEvent' | 'logWorkflowEvent'>>;

  // Chain used by the reassignment tests: 3 -> 2 -> 1 (top)
  const chain: Record<number, Employee> = {
    1: buildEmployee({ id: 1, isManager: true }),
    2: buildEmployee({ id: 2, isManager: true, managerId: 1 }),
    3: buildEmployee({ id: 3, managerId: 2 }),
    4: buildEmployee({ id: 4, isManager: true }),
  };

  beforeEach(async () => {
    employeeRepository = {
      findById: jest.fn((id: number) => Promise.resolve(chain[id] ?? null)),
      findByUserId: jest.fn(),
      findMany: jest.fn(),
      createWithAccount: jest.fn(),
      update: jest.fn(),
      deleteWithAccount: jest.fn(),
    };
    adminRepository = {
      count: jest.fn(),
      createWithAccount: jest.fn(),
    };
    userRepository = {
      findById: jest.fn(),
      findByUsername: jest.fn().mockResolvedValue(null),
    };
    audit = { logAuthEvent: jest.fn(), logWorkflowEvent: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DirectoryAdminDomainService,
        { provide: EmployeeRepositoryPort, useValue: employeeRepository },
        { provide: AdminRepositoryPort, useValue: adminRepository },
        { provide: UserRepository, useValue: userRepository },
        { provide: AuditService, useValue: audit },
      ],
    }).compile();

    service = module.get(DirectoryAdminDomainService);
  });

  describe('createEmployee', () => {
    const input = {
      username: 'newhire',
      password: 'long-enough',
      passwordConfirmation: 'long-enough',
      firstName: 'New',
      managerId: 4,
    };

    it('should hash the password and apply profile defaults', async () => {
      employeeRepository.createWithAccount.mockResolvedValue(
        buildEmployee({ id: 9, userId: 109 }),
      );

      await service.createEmployee(input);

      const [account, profile] =
        employeeRepository.createWithAccount.mock.calls[0];
      expect(account).toEqual({
        username: 'newhire',
        password: expect.any(String),
        firstName: 'New',
        lastName: '',
        email: '',
        isActive: true,
      });
      await expect(
        bcrypt.compare('long-enough', account.password),
      ).resolves.toBe(true);
      expect(profile).toEqual({
        isManager: false,
        managerId: 4,
        status: EmployeeStatus.ACTIVE,
        createdOn: today(),
      });
      expect(audit.logAuthEvent).toHaveBeenCalledWith(
        expect.objectContaining({
          userId: 109,
          event: AuthEventType.ACCOUNT_CREATED,
        }),
      );
    });

    it('should refuse mismatching passwords', async () => {
      const error = await service
        .createEmployee({ ...input, passwordConfirmation: 'other-value' })
        .catch((caught: unknown) => caught);

      expect(errorsOf(error)).toEqual({
        status: 400,
        errors: { passwordConfirmation: 'doesNotMatch' },
      });
      expect(employeeRepository.createWithAccount).not.toHaveBeenCalled();
    });

    it('should refuse a username that is taken', async () => {
      userRepository.findByUsername.mockResolvedValue(existingUser);

      const error = await service
        .createEmployee({ ...input, username: 'taken' })
        .catch((caught: unknown) => caught);

      expect(errorsOf(error)).toEqual({
        status: 422,
        errors: { username: 'usernameAlreadyExists' },
      });
    });

    it('should refuse an unknown manager', async () => {
      await expect(
        service.createEmployee({ ...input, managerId: 77 }),
      ).rejects.toThrow(NotFoundException);
    });
  });

  describe('updateEmployee', () => {
    beforeEach(() => {
      employeeRepository.update.mockImplementation((id: number) =>
        Promise.resolve(chain[id]),
      );
    });

    it('should refuse making an employee its own manager', async () => {
      const error = await service
        .updateEmployee(2, { managerId: 2 })
        .catch((caught: unknown) => caught);

      expect(errorsOf(error)).toEqual({
        status: 400,
        errors: { managerId: 'cannotManageSelf' },
      });
    });

    it('should refuse closing a loop in the reporting chain', async () => {
      const error = await service
        .updateEmployee(1, { managerId: 3 })
        .catch((caught: unknown) => caught);

      expect(errorsOf(error)).toEqual({
        status: 400,
        errors: { managerId: 'managerCycle' },
      });
      expect(employeeRepository.update).not.toHaveBeenCalled();
    });

    it('should allow moving an employee under another branch', async () => {
      await service.updateEmployee(3, { managerId: 4 });

      expect(employeeRepository.update).toHaveBeenCalledWith(
        3,
        {},
        { managerId: 4 },
      );
    });

    it('should clear the manager with null', async () => {
      await service.updateEmployee(3, { managerId: null });

      expect(employeeRepository.update).toHaveBeenCalledWith(
        3,
        {},
        { managerId: null },
      );
    });

    it('should split account and profile changes', async () => {
      await service.updateEmployee(3, {
        firstName: 'Renamed',
        isActive: false,
        isManager: true,
      });

      expect(employeeRepository.update).toHaveBeenCalledWith(
        3,
        { firstName: 'Renamed', isActive: false },
        { isManager: true },
      );
    });

    it('should report a missing employee as not found', async () => {
      await expect(
        service.updateEmployee(99, { firstName: 'x' }),
      ).rejects.toThrow('Employee not found');
    });
  });

  describe('admins', () => {
    it('should report whether any admin exists', async () => {
      adminRepository.count.mockResolvedValue(0);
      await expect(service.hasAdmin()).resolves.toBe(false);

      adminRepository.count.mockResolvedValue(2);
      await expect(service.hasAdmin()).resolves.toBe(true);
    });

    it('should create an active admin account', async () => {
      adminRepository.createWithAccount.mockResolvedValue({
        id: 1,
        userId: 200,
        username: 'root',
      });

      await service.createAdmin({
        username: 'root',
        password: 'long-enough',
        passwordConfirmation: 'long-enough',
      });

      expect(adminRepository.createWithAccount).toHaveBeenCalledWith(
        expect.objectContaining({ username: 'root', isActive: true }),
      );
    });
  });
});
