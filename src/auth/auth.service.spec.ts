import { Test, TestingModule } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';
import { JwtModule, JwtService } from '@nestjs/jwt';
import { ForbiddenException, UnauthorizedException } from '@nestjs/common';
import bcrypt from 'bcryptjs';
import { AuthService } from './auth.service';
import authConfig from './config/auth.config';
import { UserRepository } from '../users/infrastructure/persistence/user.repository';
import { IdentityDirectoryService } from '../identity/identity-directory.service';
import { AuditService, AuthEventType } from '../audit/audit.service';
import { RoleEnum } from '../roles/roles.enum';
import { User } from '../users/domain/user';
import { JwtPayloadType } from './strategies/types/jwt-payload.type';

describe('AuthService', () => {
  let service: AuthService;
  let jwtService: JwtService;
  let userRepository: jest.Mocked<UserRepository>;
  let identityDirectory: jest.Mocked<
    Pick<IdentityDirectoryService, 'resolve' | 'resolveUser'>
  >;
  let audit: jest.Mocked<Pick<AuditService, 'logAuthEvent' | 'logWorkflowEvent'>>;
  let user: User;

  beforeAll(async () => {
    user = {
      id: 12,
      username: 'mhill',
      password: await bcrypt.hash('correct-password', 4),
      firstName: 'Mark',
      lastName: 'Hill',
      email: 'mark@example.com',
      isActive: true,
      isSuperuser: false,
      createdAt: new Date('2024-01-01T00:00:00Z'),
      updatedAt: new Date('2024-01-01T00:00:00Z'),
    };
  });

  beforeEach(async () => {
    userRepository = {
      findById: jest.fn(),
      findByUsername: jest.fn().mockResolvedValue(user),
    };
    identityDirectory = {
      resolve: jest.fn(),
      resolveUser: jest.fn().mockResolvedValue({
        kind: RoleEnum.manager,
        userId: 12,
        employeeId: 3,
      }),
    };
    audit = { logAuthEvent: jest.fn(), logWorkflowEvent: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ load: [authConfig], ignoreEnvFile: true }),
        JwtModule.register({}),
      ],
      providers: [
        AuthService,
        { provide: UserRepository, useValue: userRepository },
        { provide: IdentityDirectoryService, useValue: identityDirectory },
        { provide: AuditService, useValue: audit },
      ],
    }).compile();

    service = module.get(AuthService);
    jwtService = module.get(JwtService);
  });

  it('should issue a token carrying the account id', async () => {
    const result = await service.validateLogin(RoleEnum.manager, {
      username: 'mhill',
      password: 'correct-password',
    });

    expect(result.role).toBe(RoleEnum.manager);
    expect(result.user).toEqual({
      id: 12,
      username: 'mhill',
      firstName: 'Mark',
      lastName: 'Hill',
      email: 'mark@example.com',
      isActive: true,
    });
    expect(result.tokenExpires).toBeGreaterThan(Date.now());

    const payload = await jwtService.verifyAsync<JwtPayloadType>(
      result.token,
      { secret: 'test-secret' },
    );
    expect(payload.id).toBe(12);
    expect(audit.logAuthEvent).toHaveBeenCalledWith({
      userId: 12,
      portal: RoleEnum.manager,
      event: AuthEventType.LOGIN_SUCCESS,
      success: true,
    });
  });

  it('should refuse a wrong password as invalid credentials', async () => {
    await expect(
      service.validateLogin(RoleEnum.manager, {
        username: 'mhill',
        password: 'wrong-password',
      }),
    ).rejects.toThrow(UnauthorizedException);
  });

  it('should refuse an unknown username the same way', async () => {
    userRepository.findByUsername.mockResolvedValue(null);

    const error = await service
      .validateLogin(RoleEnum.manager, {
        username: 'nobody',
        password: 'correct-password',
      })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UnauthorizedException);
    expect(
      error instanceof UnauthorizedException && error.getResponse(),
    ).toEqual({ status: 401, errors: { credentials: 'invalid' } });
  });

  it('should refuse inactive accounts', async () => {
    userRepository.findByUsername.mockResolvedValue({
      ...user,
      isActive: false,
    });

    const error = await service
      .validateLogin(RoleEnum.manager, {
        username: 'mhill',
        password: 'correct-password',
      })
      .catch((caught: unknown) => caught);

    expect(
      error instanceof UnauthorizedException && error.getResponse(),
    ).toEqual({ status: 401, errors: { username: 'inactive' } });
  });

  it('should send a manager to the manager portal', async () => {
    await expect(
      service.validateLogin(RoleEnum.employee, {
        username: 'mhill',
        password: 'correct-password',
      }),
    ).rejects.toThrow('Please log in through the manager portal');
  });

  it('should refuse accounts without any profile', async () => {
    identityDirectory.resolveUser.mockResolvedValue({
      kind: 'anonymous',
      userId: 12,
    });

    await expect(
      service.validateLogin(RoleEnum.admin, {
        username: 'mhill',
        password: 'correct-password',
      }),
    ).rejects.toThrow(ForbiddenException);
  });
});
