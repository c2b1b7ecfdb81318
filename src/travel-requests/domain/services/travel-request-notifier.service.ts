import { Injectable, Logger } from '@nestjs/common';
import { NotificationDispatcherPort } from '../../../notifications/domain/notification-dispatcher.port';
import { NotificationMessage } from '../../../notifications/domain/notification-message';
import { AuditService, WorkflowEventType } from '../../../audit/audit.service';
import { EmployeeReference } from '../../../employees/domain/entities/employee.entity';
import { TravelRequest } from '../entities/travel-request.entity';
import { TravelRequestStatus } from '../enums/travel-request-status.enum';

const SIGNATURE = 'Thanks & Regards.';

/**
 * Decides whether and what to send after a request changed state.
 *
 * Runs after the change is stored. Delivery failures are logged and
 * audited, never rethrown: a lost notification must not undo a stored
 * transition.
 */
@Injectable()
export class TravelRequestNotifier {
  private readonly logger = new Logger(TravelRequestNotifier.name);

  constructor(
    private readonly dispatcher: NotificationDispatcherPort,
    private readonly auditService: AuditService,
  ) {}

  /**
   * Tell the addressed manager about a first submission or a resubmission
   */
  async requestSubmitted(
    request: TravelRequest,
    resubmitted: boolean,
  ): Promise<void> {
    const verb = resubmitted ? 'resubmitted' : 'submitted';
    const requester = request.employeeId ?? 'unknown';

    await this.send(request, request.manager, {
      subject: `Request ${verb} from employee-${requester}`,
      text: `I have ${verb} a request for travel. Please look into the details. ${SIGNATURE}`,
    });
  }

  /**
   * Tell the owner about a manager's decision or an admin closing the
   * request. The note is included as given.
   */
  async requestDecided(request: TravelRequest, note: string): Promise<void> {
    const content =
      request.status === TravelRequestStatus.CLOSED
        ? {
            subject: 'Request closed after approval',
            text: `Note: ${note}\nYour request for travel has been closed. ${SIGNATURE}`,
          }
        : {
            subject: `Request ${request.status}`,
            text: `Note: ${note}\nYour request for travel has been ${request.status}. ${SIGNATURE}`,
          };

    await this.send(request, request.employee, content);
  }

  private async send(
    request: TravelRequest,
    recipient: EmployeeReference | null,
    content: Omit<NotificationMessage, 'to'>,
  ): Promise<void> {
    if (!recipient?.email) {
      this.logger.warn(
        `No recipient address for request ${request.id}; notification skipped`,
      );
      return;
    }

    try {
      await this.dispatcher.dispatch({ to: recipient.email, ...content });
      this.auditService.logWorkflowEvent({
        requestId: request.id,
        event: WorkflowEventType.NOTIFICATION_SENT,
        success: true,
        toStatus: request.status,
      });
    } catch (error: unknown) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Notification for request ${request.id} failed: ${errorMessage}`,
      );
      this.auditService.logWorkflowEvent({
        requestId: request.id,
        event: WorkflowEventType.NOTIFICATION_FAILED,
        success: false,
        toStatus: request.status,
        errorMessage,
      });
    }
  }
}
