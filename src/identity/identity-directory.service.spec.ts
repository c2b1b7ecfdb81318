import { UnauthorizedException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { IdentityDirectoryService } from './identity-directory.service';
import { UserRepository } from '../users/infrastructure/persistence/user.repository';
import { EmployeeRepositoryPort } from '../employees/domain/repositories/employee.repository.port';
import { User } from '../users/domain/user';
import { Employee } from '../employees/domain/entities/employee.entity';
import { EmployeeStatus } from '../employees/domain/enums/employee-status.enum';
import { RoleEnum } from '../roles/roles.enum';

function buildUser(overrides: Partial<User> = {}): User {
  return {
    id: 21,
    username: 'ada',
    password: 'hash',
    firstName: 'Ada',
    lastName: 'Byron',
    email: 'ada@example.com',
    isActive: true,
    isSuperuser: false,
    createdAt: new Date('2024-01-01T00:00:00Z'),
    updatedAt: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  };
}

function buildEmployee(overrides: Partial<Employee> = {}): Employee {
  return {
    id: 8,
    username: 'ada',
    firstName: 'Ada',
    lastName: 'Byron',
    email: 'ada@example.com',
    userId: 21,
    isActive: true,
    isManager: false,
    managerId: null,
    manager: null,
    status: EmployeeStatus.ACTIVE,
    createdOn: '2024-01-01',
    ...overrides,
  };
}

describe('IdentityDirectoryService', () => {
  let service: IdentityDirectoryService;
  let userRepository: jest.Mocked<UserRepository>;
  let employeeRepository: jest.Mocked<EmployeeRepositoryPort>;

  beforeEach(async () => {
    userRepository = { findById: jest.fn(), findByUsername: jest.fn() };
    employeeRepository = {
      findById: jest.fn(),
      findByUserId: jest.fn(),
      findMany: jest.fn(),
      createWithAccount: jest.fn(),
      update: jest.fn(),
      deleteWithAccount: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        IdentityDirectoryService,
        { provide: UserRepository, useValue: userRepository },
        { provide: EmployeeRepositoryPort, useValue: employeeRepository },
      ],
    }).compile();

    service = module.get(IdentityDirectoryService);
  });

  it('should resolve superusers to admin without a profile lookup', async () => {
    userRepository.findById.mockResolvedValue(buildUser({ isSuperuser: true }));

    await expect(service.resolve(21)).resolves.toEqual({
      kind: RoleEnum.admin,
      userId: 21,
    });
    expect(employeeRepository.findByUserId).not.toHaveBeenCalled();
  });

  it('should resolve a manager profile to manager', async () => {
    userRepository.findById.mockResolvedValue(buildUser());
    employeeRepository.findByUserId.mockResolvedValue(
      buildEmployee({ isManager: true }),
    );

    await expect(service.resolve(21)).resolves.toEqual({
      kind: RoleEnum.manager,
      userId: 21,
      employeeId: 8,
    });
  });

  it('should resolve a plain profile to employee', async () => {
    userRepository.findById.mockResolvedValue(buildUser());
    employeeRepository.findByUserId.mockResolvedValue(buildEmployee());

    await expect(service.resolve(21)).resolves.toEqual({
      kind: RoleEnum.employee,
      userId: 21,
      employeeId: 8,
    });
  });

  it('should resolve an account without profile to anonymous', async () => {
    userRepository.findById.mockResolvedValue(buildUser());
    employeeRepository.findByUserId.mockResolvedValue(null);

    await expect(service.resolve(21)).resolves.toEqual({
      kind: 'anonymous',
      userId: 21,
    });
  });

  it('should refuse a deactivated account', async () => {
    userRepository.findById.mockResolvedValue(buildUser({ isActive: false }));

    await expect(service.resolve(21)).rejects.toThrow(UnauthorizedException);
    expect(employeeRepository.findByUserId).not.toHaveBeenCalled();
  });

  it('should resolve an unknown account to anonymous', async () => {
    userRepository.findById.mockResolvedValue(null);

    await expect(service.resolve(404)).resolves.toEqual({
      kind: 'anonymous',
      userId: 404,
    });
  });
});
