import { Test, TestingModule } from '@nestjs/testing';
import {
  BadRequestException,
  ForbiddenException,
  NotFoundException,
} from '@nestjs/common';
import { TravelRequestLifecycleDomainService } from './travel-request-lifecycle.domain.service';
import { TravelRequestNotifier } from './travel-request-notifier.service';
import { TravelRequestRepositoryPort } from '../ports/travel-request.repository.port';
import { EmployeeRepositoryPort } from '../../../employees/domain/repositories/employee.repository.port';
import { AuditService, WorkflowEventType } from '../../../audit/audit.service';
import {
  TravelRequest,
  TravelRequestContent,
} from '../entities/travel-request.entity';
import { TravelRequestStatus } from '../enums/travel-request-status.enum';
import { TravelMode } from '../enums/travel-mode.enum';
import { InvalidTransitionException } from '../errors/invalid-transition.exception';
import { Employee } from '../../../employees/domain/entities/employee.entity';
import { EmployeeStatus } from '../../../employees/domain/enums/employee-status.enum';
import { RoleEnum } from '../../../roles/roles.enum';
import {
  AdminPrincipal,
  EmployeePrincipal,
  ManagerPrincipal,
} from '../../../identity/domain/principal';
import { today } from '../../../utils/date';

const employeePrincipal: EmployeePrincipal = {
  kind: RoleEnum.employee,
  userId: 50,
  employeeId: 5,
};
const managerA: ManagerPrincipal = {
  kind: RoleEnum.manager,
  userId: 30,
  employeeId: 3,
};
const managerB: ManagerPrincipal = {
  kind: RoleEnum.manager,
  userId: 40,
  employeeId: 4,
};
const admin: AdminPrincipal = { kind: RoleEnum.admin, userId: 1 };

const content: TravelRequestContent = {
  purpose: 'Conference',
  mode: TravelMode.TRAIN,
  fromDate: '2024-03-04',
  toDate: '2024-03-06',
  fromWhere: 'Berlin',
  toWhere: 'Munich',
  lodging: false,
  lodgingInfo: null,
  additionalRequest: null,
  additionalInfo: null,
};

function buildRequest(overrides: Partial<TravelRequest> = {}): TravelRequest {
  return {
    id: 10,
    employeeId: 5,
    employee: {
      id: 5,
      username: 'estone',
      firstName: 'Eve',
      lastName: 'Stone',
      email: 'eve@example.com',
    },
    managerId: 3,
    manager: {
      id: 3,
      username: 'mhill',
      firstName: 'Mark',
      lastName: 'Hill',
      email: 'mark@example.com',
    },
    ...content,
    messageFromManager: null,
    messageFromAdmin: null,
    dateOfRequest: '2024-02-20',
    dateOfApproval: null,
    dateOfRejection: null,
    dateOfRevert: null,
    resubmissionRequest: false,
    isResubmitted: false,
    status: TravelRequestStatus.SUBMITTED,
    ...overrides,
  };
}

function buildEmployee(overrides: Partial<Employee> = {}): Employee {
  return {
    id: 5,
    username: 'estone',
    firstName: 'Eve',
    lastName: 'Stone',
    email: 'eve@example.com',
    userId: 50,
    isActive: true,
    isManager: false,
    managerId: 3,
    manager: null,
    status: EmployeeStatus.ACTIVE,
    createdOn: '2024-01-01',
    ...overrides,
  };
}

describe('TravelRequestLifecycleDomainService', () => {
  let service: TravelRequestLifecycleDomainService;
  let requestRepository: jest.Mocked<TravelRequestRepositoryPort>;
  let employeeRepository: jest.Mocked<EmployeeRepositoryPort>;
  let notifier: jest.Mocked<
    Pick<TravelRequestNotifier, 'requestSubmitted' | 'requestDecided'>
  >;
  let audit: jest.Mocked<Pick<AuditService, 'logAuthEvent' | 'logWorkflowEvent'>>;

  beforeEach(async () => {
    requestRepository = {
      list: jest.fn(),
      findById: jest.fn(),
      create: jest.fn(),
      transition: jest.fn(),
      updateContent: jest.fn(),
      delete: jest.fn(),
    };
    employeeRepository = {
      findById: jest.fn(),
      findByUserId: jest.fn(),
      findMany: jest.fn(),
      createWithAccount: jest.fn(),
      update: jest.fn(),
      deleteWithAccount: jest.fn(),
    };
    notifier = {
      requestSubmitted: jest.fn().mockResolvedValue(undefined),
      requestDecided: jest.fn().mockResolvedValue(undefined),
    };
    audit = {
      logAuthEvent: jest.fn(),
      logWorkflowEvent: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TravelRequestLifecycleDomainService,
        { provide: TravelRequestRepositoryPort, useValue: requestRepository },
        { provide: EmployeeRepositoryPort, useValue: employeeRepository },
        { provide: TravelRequestNotifier, useValue: notifier },
        { provide: AuditService, useValue: audit },
      ],
    }).compile();

    service = module.get(TravelRequestLifecycleDomainService);
  });

  describe('create', () => {
    it('should submit the request to the employee manager and notify them', async () => {
      const created = buildRequest();
      employeeRepository.findById.mockResolvedValue(buildEmployee());
      requestRepository.create.mockResolvedValue(created);

      const result = await service.create(employeePrincipal, content);

      expect(result).toBe(created);
      expect(requestRepository.create).toHaveBeenCalledWith({
        ...content,
        employeeId: 5,
        managerId: 3,
        status: TravelRequestStatus.SUBMITTED,
        dateOfRequest: today(),
      });
      expect(notifier.requestSubmitted).toHaveBeenCalledWith(created, false);
    });

    it('should store drafts as to_submit without notifying', async () => {
      employeeRepository.findById.mockResolvedValue(buildEmployee());
      requestRepository.create.mockResolvedValue(
        buildRequest({ status: TravelRequestStatus.TO_SUBMIT }),
      );

      await service.create(employeePrincipal, content, { saveAsDraft: true });

      expect(requestRepository.create).toHaveBeenCalledWith(
        expect.objectContaining({ status: TravelRequestStatus.TO_SUBMIT }),
      );
      expect(notifier.requestSubmitted).not.toHaveBeenCalled();
    });

    it('should refuse when the employee has no manager', async () => {
      employeeRepository.findById.mockResolvedValue(
        buildEmployee({ managerId: null }),
      );

      await expect(service.create(employeePrincipal, content)).rejects.toThrow(
        BadRequestException,
      );
      expect(requestRepository.create).not.toHaveBeenCalled();
    });

    it('should refuse when the dates are not in order', async () => {
      employeeRepository.findById.mockResolvedValue(buildEmployee());

      await expect(
        service.create(employeePrincipal, {
          ...content,
          fromDate: '2024-03-06',
          toDate: '2024-03-06',
        }),
      ).rejects.toThrow(BadRequestException);
      expect(requestRepository.create).not.toHaveBeenCalled();
    });

    it('should refuse lodging without lodging info', async () => {
      employeeRepository.findById.mockResolvedValue(buildEmployee());

      await expect(
        service.create(employeePrincipal, { ...content, lodging: true }),
      ).rejects.toThrow(BadRequestException);
    });
  });

  describe('decide', () => {
    it('should approve, stamp the date and notify the employee', async () => {
      const approved = buildRequest({
        status: TravelRequestStatus.APPROVED,
        dateOfApproval: today(),
        messageFromManager: 'ok',
      });
      requestRepository.findById.mockResolvedValue(buildRequest());
      requestRepository.transition.mockResolvedValue(approved);

      const result = await service.decide(managerA, 10, 'approve', 'ok');

      expect(result).toBe(approved);
      expect(requestRepository.transition).toHaveBeenCalledWith(
        10,
        TravelRequestStatus.SUBMITTED,
        {
          status: TravelRequestStatus.APPROVED,
          messageFromManager: 'ok',
          dateOfApproval: today(),
        },
      );
      expect(notifier.requestDecided).toHaveBeenCalledWith(approved, 'ok');
      expect(audit.logWorkflowEvent).toHaveBeenCalledWith(
        expect.objectContaining({
          requestId: 10,
          event: WorkflowEventType.REQUEST_APPROVED,
          fromStatus: TravelRequestStatus.SUBMITTED,
          toStatus: TravelRequestStatus.APPROVED,
        }),
      );
    });

    it('should revert with a resubmission request', async () => {
      requestRepository.findById.mockResolvedValue(buildRequest());
      requestRepository.transition.mockResolvedValue(
        buildRequest({ status: TravelRequestStatus.REVERTED }),
      );

      await service.decide(managerA, 10, 'revert', 'add hotel');

      expect(requestRepository.transition).toHaveBeenCalledWith(
        10,
        TravelRequestStatus.SUBMITTED,
        {
          status: TravelRequestStatus.REVERTED,
          messageFromManager: 'add hotel',
          dateOfRevert: today(),
          resubmissionRequest: true,
        },
      );
    });

    it('should reject and stamp the rejection date', async () => {
      requestRepository.findById.mockResolvedValue(buildRequest());
      requestRepository.transition.mockResolvedValue(
        buildRequest({ status: TravelRequestStatus.REJECTED }),
      );

      await service.decide(managerA, 10, 'reject', 'budget');

      expect(requestRepository.transition).toHaveBeenCalledWith(
        10,
        TravelRequestStatus.SUBMITTED,
        {
          status: TravelRequestStatus.REJECTED,
          messageFromManager: 'budget',
          dateOfRejection: today(),
        },
      );
    });

    it('should forbid a manager the request is not addressed to', async () => {
      requestRepository.findById.mockResolvedValue(buildRequest());

      await expect(
        service.decide(managerB, 10, 'approve', 'ok'),
      ).rejects.toThrow(ForbiddenException);
      expect(requestRepository.transition).not.toHaveBeenCalled();
    });

    it('should report a missing request as not found', async () => {
      requestRepository.findById.mockResolvedValue(null);

      await expect(
        service.decide(managerA, 99, 'approve', 'ok'),
      ).rejects.toThrow(NotFoundException);
    });

    it('should refuse an unknown action', async () => {
      requestRepository.findById.mockResolvedValue(buildRequest());

      await expect(
        service.decide(managerA, 10, 'escalate', 'ok'),
      ).rejects.toThrow(InvalidTransitionException);
      expect(requestRepository.transition).not.toHaveBeenCalled();
    });

    it('should refuse to approve a request that is not submitted', async () => {
      requestRepository.findById.mockResolvedValue(
        buildRequest({ status: TravelRequestStatus.APPROVED }),
      );

      await expect(
        service.decide(managerA, 10, 'approve', 'again'),
      ).rejects.toThrow(InvalidTransitionException);
      expect(requestRepository.transition).not.toHaveBeenCalled();
      expect(audit.logWorkflowEvent).toHaveBeenCalledWith(
        expect.objectContaining({
          event: WorkflowEventType.TRANSITION_REFUSED,
          success: false,
        }),
      );
    });

    it('should fail when another action changed the request first', async () => {
      requestRepository.findById.mockResolvedValue(buildRequest());
      requestRepository.transition.mockResolvedValue(null);

      await expect(
        service.decide(managerA, 10, 'approve', 'ok'),
      ).rejects.toThrow(InvalidTransitionException);
      expect(notifier.requestDecided).not.toHaveBeenCalled();
    });
  });

  describe('submit', () => {
    it('should resubmit a reverted request and flag it', async () => {
      const resubmitted = buildRequest({
        status: TravelRequestStatus.SUBMITTED,
        isResubmitted: true,
      });
      requestRepository.findById.mockResolvedValue(
        buildRequest({
          status: TravelRequestStatus.REVERTED,
          resubmissionRequest: true,
        }),
      );
      requestRepository.transition.mockResolvedValue(resubmitted);

      await service.submit(employeePrincipal, 10, 'submit');

      expect(requestRepository.transition).toHaveBeenCalledWith(
        10,
        TravelRequestStatus.REVERTED,
        { status: TravelRequestStatus.SUBMITTED, isResubmitted: true },
      );
      expect(notifier.requestSubmitted).toHaveBeenCalledWith(resubmitted, true);
    });

    it('should submit a draft as a first submission', async () => {
      const submitted = buildRequest();
      requestRepository.findById.mockResolvedValue(
        buildRequest({ status: TravelRequestStatus.TO_SUBMIT }),
      );
      requestRepository.transition.mockResolvedValue(submitted);

      await service.submit(employeePrincipal, 10, 'submit');

      expect(requestRepository.transition).toHaveBeenCalledWith(
        10,
        TravelRequestStatus.TO_SUBMIT,
        { status: TravelRequestStatus.SUBMITTED },
      );
      expect(notifier.requestSubmitted).toHaveBeenCalledWith(submitted, false);
    });

    it('should forbid other employees', async () => {
      requestRepository.findById.mockResolvedValue(
        buildRequest({ status: TravelRequestStatus.TO_SUBMIT, employeeId: 6 }),
      );

      await expect(
        service.submit(employeePrincipal, 10, 'submit'),
      ).rejects.toThrow(ForbiddenException);
    });

    it('should forbid acting on a request without an owner', async () => {
      requestRepository.findById.mockResolvedValue(
        buildRequest({
          status: TravelRequestStatus.TO_SUBMIT,
          employeeId: null,
          employee: null,
        }),
      );

      await expect(
        service.submit(employeePrincipal, 10, 'submit'),
      ).rejects.toThrow(ForbiddenException);
    });

    it('should refuse any action other than submit', async () => {
      requestRepository.findById.mockResolvedValue(
        buildRequest({ status: TravelRequestStatus.TO_SUBMIT }),
      );

      await expect(
        service.submit(employeePrincipal, 10, 'approve'),
      ).rejects.toThrow(InvalidTransitionException);
    });

    it('should refuse to submit an approved request', async () => {
      requestRepository.findById.mockResolvedValue(
        buildRequest({ status: TravelRequestStatus.APPROVED }),
      );

      await expect(
        service.submit(employeePrincipal, 10, 'submit'),
      ).rejects.toThrow(InvalidTransitionException);
      expect(requestRepository.transition).not.toHaveBeenCalled();
    });
  });

  describe('close', () => {
    it('should close an approved request with the admin note', async () => {
      const closed = buildRequest({
        status: TravelRequestStatus.CLOSED,
        messageFromAdmin: 'trip completed',
      });
      requestRepository.findById.mockResolvedValue(
        buildRequest({ status: TravelRequestStatus.APPROVED }),
      );
      requestRepository.transition.mockResolvedValue(closed);

      await service.close(admin, 10, 'close', 'trip completed');

      expect(requestRepository.transition).toHaveBeenCalledWith(
        10,
        TravelRequestStatus.APPROVED,
        {
          status: TravelRequestStatus.CLOSED,
          messageFromAdmin: 'trip completed',
        },
      );
      expect(notifier.requestDecided).toHaveBeenCalledWith(
        closed,
        'trip completed',
      );
    });

    it('should refuse to close a request twice', async () => {
      requestRepository.findById.mockResolvedValue(
        buildRequest({ status: TravelRequestStatus.CLOSED }),
      );

      await expect(
        service.close(admin, 10, 'close', 'again'),
      ).rejects.toThrow('Request not approved yet');
      expect(requestRepository.transition).not.toHaveBeenCalled();
    });

    it('should refuse an action other than close', async () => {
      requestRepository.findById.mockResolvedValue(
        buildRequest({ status: TravelRequestStatus.APPROVED }),
      );

      await expect(
        service.close(admin, 10, 'archive', 'note'),
      ).rejects.toThrow(InvalidTransitionException);
    });
  });

  describe('edit', () => {
    it('should revalidate the merged record', async () => {
      requestRepository.findById.mockResolvedValue(buildRequest());

      await expect(
        service.edit(employeePrincipal, 10, { toDate: '2024-03-01' }),
      ).rejects.toThrow(BadRequestException);
      expect(requestRepository.updateContent).not.toHaveBeenCalled();
    });

    it('should apply valid changes for the owner', async () => {
      const edited = buildRequest({ purpose: 'Workshop' });
      requestRepository.findById.mockResolvedValue(buildRequest());
      requestRepository.updateContent.mockResolvedValue(edited);

      const result = await service.edit(employeePrincipal, 10, {
        purpose: 'Workshop',
      });

      expect(result).toBe(edited);
      expect(requestRepository.updateContent).toHaveBeenCalledWith(10, {
        purpose: 'Workshop',
      });
    });
  });

  describe('remove', () => {
    it('should delete an own request in any status', async () => {
      requestRepository.findById.mockResolvedValue(
        buildRequest({ status: TravelRequestStatus.CLOSED }),
      );

      await service.remove(employeePrincipal, 10);

      expect(requestRepository.delete).toHaveBeenCalledWith(10);
    });

    it('should refuse requests whose owner was deleted', async () => {
      requestRepository.findById.mockResolvedValue(
        buildRequest({ employeeId: null, employee: null }),
      );

      await expect(service.remove(employeePrincipal, 10)).rejects.toThrow(
        ForbiddenException,
      );
      expect(requestRepository.delete).not.toHaveBeenCalled();
    });
  });

  describe('list', () => {
    it.each([
      [admin, { kind: 'all' }],
      [managerA, { kind: 'subtree', managerId: 3 }],
      [employeePrincipal, { kind: 'owned', employeeId: 5 }],
    ])('should scope the listing for %o', async (principal, scope) => {
      requestRepository.list.mockResolvedValue([]);

      await service.list(principal, {}, null);

      expect(requestRepository.list).toHaveBeenCalledWith(scope, {}, null);
    });

    it('should forbid principals without a profile', () => {
      expect(() =>
        service.list({ kind: 'anonymous', userId: 9 }, {}),
      ).toThrow(ForbiddenException);
    });
  });
});
