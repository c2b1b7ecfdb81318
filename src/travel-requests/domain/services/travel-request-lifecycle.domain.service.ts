import {
  BadRequestException,
  ForbiddenException,
  HttpStatus,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { EmployeeRepositoryPort } from '../../../employees/domain/repositories/employee.repository.port';
import { AuditService, WorkflowEventType } from '../../../audit/audit.service';
import {
  AdminPrincipal,
  EmployeePrincipal,
  ManagerPrincipal,
  Principal,
} from '../../../identity/domain/principal';
import { RoleEnum } from '../../../roles/roles.enum';
import { NullableType } from '../../../utils/types/nullable.type';
import { today } from '../../../utils/date';
import {
  TransitionChanges,
  TravelRequest,
  TravelRequestContent,
} from '../entities/travel-request.entity';
import { TravelRequestStatus } from '../enums/travel-request-status.enum';
import {
  isManagerAction,
  TravelRequestAction,
} from '../enums/travel-request-action.enum';
import {
  RequestFilters,
  RequestScope,
  RequestSort,
  TravelRequestRepositoryPort,
} from '../ports/travel-request.repository.port';
import { InvalidTransitionException } from '../errors/invalid-transition.exception';
import { TravelRequestStateMachine } from '../utils/travel-request-state-machine.util';
import { assertInvariants } from '../utils/travel-request-invariants.util';
import { TravelRequestNotifier } from './travel-request-notifier.service';

export interface CreateOptions {
  // Store as to_submit without notifying the manager
  saveAsDraft?: boolean;
}

const AUDIT_EVENTS: Record<TravelRequestStatus, WorkflowEventType> = {
  [TravelRequestStatus.TO_SUBMIT]: WorkflowEventType.REQUEST_CREATED,
  [TravelRequestStatus.SUBMITTED]: WorkflowEventType.REQUEST_SUBMITTED,
  [TravelRequestStatus.APPROVED]: WorkflowEventType.REQUEST_APPROVED,
  [TravelRequestStatus.REJECTED]: WorkflowEventType.REQUEST_REJECTED,
  [TravelRequestStatus.REVERTED]: WorkflowEventType.REQUEST_REVERTED,
  [TravelRequestStatus.CLOSED]: WorkflowEventType.REQUEST_CLOSED,
};

/**
 * TravelRequestLifecycleDomainService
 *
 * Every mutation of a travel request goes through here. Each action is one
 * read-validate-write: the record is fetched, the caller and the source
 * state are checked, then the status change is written with a
 * compare-and-set so that two concurrent actions cannot both succeed.
 *
 * Check order for actions: existence (404), caller (403), action and
 * source state (InvalidTransition). Notifications are sent after the
 * write.
 */
@Injectable()
export class TravelRequestLifecycleDomainService {
  private readonly logger = new Logger(TravelRequestLifecycleDomainService.name);

  constructor(
    private readonly requestRepository: TravelRequestRepositoryPort,
    private readonly employeeRepository: EmployeeRepositoryPort,
    private readonly notifier: TravelRequestNotifier,
    private readonly auditService: AuditService,
  ) {}

  /**
   * Create a request owned by the calling employee and addressed to their
   * current manager
   */
  async create(
    principal: EmployeePrincipal,
    content: TravelRequestContent,
    options: CreateOptions = {},
  ): Promise<TravelRequest> {
    const employee = await this.employeeRepository.findById(
      principal.employeeId,
    );
    if (!employee) {
      throw new ForbiddenException('Employee profile not found');
    }

    if (employee.managerId === null) {
      throw new BadRequestException({
        status: HttpStatus.BAD_REQUEST,
        errors: { manager: 'notAssigned' },
      });
    }

    assertInvariants({
      ...content,
      employeeId: employee.id,
      managerId: employee.managerId,
    });

    const status = options.saveAsDraft
      ? TravelRequestStatus.TO_SUBMIT
      : TravelRequestStatus.SUBMITTED;

    const request = await this.requestRepository.create({
      ...content,
      employeeId: employee.id,
      managerId: employee.managerId,
      status,
      dateOfRequest: today(),
    });

    this.auditService.logWorkflowEvent({
      requestId: request.id,
      actorUserId: principal.userId,
      event: WorkflowEventType.REQUEST_CREATED,
      success: true,
      toStatus: status,
    });

    if (status === TravelRequestStatus.SUBMITTED) {
      await this.notifier.requestSubmitted(request, false);
    }

    return request;
  }

  /**
   * Manager decision on a submitted request: approve, reject or revert.
   * The note becomes messageFromManager.
   */
  async decide(
    principal: ManagerPrincipal,
    id: number,
    action: string,
    note: string,
  ): Promise<TravelRequest> {
    const request = await this.getById(id);

    if (request.managerId !== principal.employeeId) {
      throw new ForbiddenException(
        'Only the manager the request is addressed to can act on it',
      );
    }

    if (!isManagerAction(action)) {
      throw this.refuse(request, principal, `Invalid action: ${action}`);
    }

    const target = TravelRequestStateMachine.targetOf(action);
    if (!TravelRequestStateMachine.isValidTransition(request.status, target)) {
      throw this.refuse(
        request,
        principal,
        `Cannot ${action} a request that is ${request.status}`,
      );
    }

    const date = today();
    const changes: TransitionChanges = {
      status: target,
      messageFromManager: note,
    };
    switch (action) {
      case TravelRequestAction.APPROVE:
        changes.dateOfApproval = date;
        break;
      case TravelRequestAction.REJECT:
        changes.dateOfRejection = date;
        break;
      case TravelRequestAction.REVERT:
        changes.dateOfRevert = date;
        changes.resubmissionRequest = true;
        break;
    }

    const updated = await this.applyTransition(request, principal, changes);
    await this.notifier.requestDecided(updated, note);
    return updated;
  }

  /**
   * Owner sends a draft or a reverted request to the manager
   */
  async submit(
    principal: EmployeePrincipal,
    id: number,
    action: string,
  ): Promise<TravelRequest> {
    const request = await this.getById(id);
    this.assertOwner(request, principal);

    if (action !== TravelRequestAction.SUBMIT) {
      throw this.refuse(request, principal, `Invalid action: ${action}`);
    }

    if (!TravelRequestStateMachine.canSubmit(request.status)) {
      throw this.refuse(
        request,
        principal,
        `Cannot submit a request that is ${request.status}`,
      );
    }

    const resubmitted = request.status === TravelRequestStatus.REVERTED;
    const changes: TransitionChanges = {
      status: TravelRequestStatus.SUBMITTED,
    };
    if (resubmitted) {
      changes.isResubmitted = true;
    }

    const updated = await this.applyTransition(request, principal, changes);
    await this.notifier.requestSubmitted(updated, resubmitted);
    return updated;
  }

  /**
   * Admin closes an approved request. The note becomes messageFromAdmin.
   */
  async close(
    principal: AdminPrincipal,
    id: number,
    action: string,
    note: string,
  ): Promise<TravelRequest> {
    const request = await this.getById(id);

    if (request.status !== TravelRequestStatus.APPROVED) {
      throw this.refuse(request, principal, 'Request not approved yet');
    }

    if (action !== TravelRequestAction.CLOSE) {
      throw this.refuse(request, principal, `Invalid action: ${action}`);
    }

    const updated = await this.applyTransition(request, principal, {
      status: TravelRequestStatus.CLOSED,
      messageFromAdmin: note,
    });
    await this.notifier.requestDecided(updated, note);
    return updated;
  }

  /**
   * Owner changes content fields. The merged record must satisfy the
   * creation invariants. Status is not checked.
   */
  async edit(
    principal: EmployeePrincipal,
    id: number,
    changes: Partial<TravelRequestContent>,
  ): Promise<TravelRequest> {
    const request = await this.getById(id);
    this.assertOwner(request, principal);

    assertInvariants({ ...request, ...changes });

    const updated = await this.requestRepository.updateContent(id, changes);

    this.auditService.logWorkflowEvent({
      requestId: id,
      actorUserId: principal.userId,
      event: WorkflowEventType.REQUEST_EDITED,
      success: true,
    });

    return updated;
  }

  /**
   * Owner deletes a request in any status
   */
  async remove(principal: EmployeePrincipal, id: number): Promise<void> {
    const request = await this.getById(id);
    this.assertOwner(request, principal);

    await this.requestRepository.delete(id);

    this.auditService.logWorkflowEvent({
      requestId: id,
      actorUserId: principal.userId,
      event: WorkflowEventType.REQUEST_DELETED,
      success: true,
      fromStatus: request.status,
    });
  }

  async getById(id: number): Promise<TravelRequest> {
    const request = await this.requestRepository.findById(id);
    if (!request) {
      throw new NotFoundException('Request not found');
    }
    return request;
  }

  /**
   * Requests visible to the principal, filtered and sorted
   */
  list(
    principal: Principal,
    filters: RequestFilters,
    sort?: NullableType<RequestSort>,
  ): Promise<TravelRequest[]> {
    return this.requestRepository.list(this.scopeOf(principal), filters, sort);
  }

  private scopeOf(principal: Principal): RequestScope {
    switch (principal.kind) {
      case RoleEnum.admin:
        return { kind: 'all' };
      case RoleEnum.manager:
        return { kind: 'subtree', managerId: principal.employeeId };
      case RoleEnum.employee:
        return { kind: 'owned', employeeId: principal.employeeId };
      case 'anonymous':
        throw new ForbiddenException(
          'No employee or admin profile exists for this account',
        );
    }
  }

  private assertOwner(
    request: TravelRequest,
    principal: EmployeePrincipal,
  ): void {
    if (request.employeeId === null) {
      throw new ForbiddenException('Request has no owning employee');
    }
    if (request.employeeId !== principal.employeeId) {
      throw new ForbiddenException(
        'You do not have permission to perform this action',
      );
    }
  }

  private async applyTransition(
    request: TravelRequest,
    principal: Principal,
    changes: TransitionChanges,
  ): Promise<TravelRequest> {
    const updated = await this.requestRepository.transition(
      request.id,
      request.status,
      changes,
    );
    if (!updated) {
      this.logger.warn(
        `Request ${request.id} changed while ${principal.kind} user ${principal.userId} acted on it`,
      );
      throw this.refuse(
        request,
        principal,
        'Request was changed by another action; reload and retry',
      );
    }

    this.auditService.logWorkflowEvent({
      requestId: request.id,
      actorUserId: principal.userId,
      event: AUDIT_EVENTS[changes.status],
      success: true,
      fromStatus: request.status,
      toStatus: changes.status,
    });

    return updated;
  }

  private refuse(
    request: TravelRequest,
    principal: Principal,
    message: string,
  ): InvalidTransitionException {
    this.auditService.logWorkflowEvent({
      requestId: request.id,
      actorUserId: principal.userId,
      event: WorkflowEventType.TRANSITION_REFUSED,
      success: false,
      fromStatus: request.status,
      errorMessage: message,
    });
    return new InvalidTransitionException(message);
  }
}
