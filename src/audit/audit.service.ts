import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

export enum AuthEventType {
  LOGIN_SUCCESS = 'LOGIN_SUCCESS',
  LOGIN_FAILED = 'LOGIN_FAILED',
  TOKEN_VALIDATION_FAILED = 'TOKEN_VALIDATION_FAILED',
  ACCOUNT_CREATED = 'ACCOUNT_CREATED',
  ACCOUNT_UPDATED = 'ACCOUNT_UPDATED',
  ACCOUNT_DELETED = 'ACCOUNT_DELETED',
}

export enum WorkflowEventType {
  REQUEST_CREATED = 'REQUEST_CREATED',
  REQUEST_SUBMITTED = 'REQUEST_SUBMITTED',
  REQUEST_APPROVED = 'REQUEST_APPROVED',
  REQUEST_REJECTED = 'REQUEST_REJECTED',
  REQUEST_REVERTED = 'REQUEST_REVERTED',
  REQUEST_CLOSED = 'REQUEST_CLOSED',
  REQUEST_EDITED = 'REQUEST_EDITED',
  REQUEST_DELETED = 'REQUEST_DELETED',
  TRANSITION_REFUSED = 'TRANSITION_REFUSED',
  NOTIFICATION_SENT = 'NOTIFICATION_SENT',
  NOTIFICATION_FAILED = 'NOTIFICATION_FAILED',
}

export interface AuthEventData {
  userId: number | 'unknown';
  portal: string;
  event: AuthEventType;
  success: boolean;
  errorMessage?: string;
  metadata?: Record<string, unknown>;
}

export interface WorkflowEventData {
  requestId: number;
  actorUserId?: number;
  event: WorkflowEventType;
  success: boolean;
  fromStatus?: string;
  toStatus?: string;
  errorMessage?: string;
}

/**
 * Audit log for authentication, directory and workflow events.
 *
 * Entries are single-line JSON on stdout so a log shipper can index them.
 * Passwords, tokens and note contents are never logged.
 */
@Injectable()
export class AuditService {
  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  logAuthEvent(data: AuthEventData): void {
    this.write('auth', {
      userId: data.userId,
      portal: data.portal,
      event: data.event,
      success: data.success,
      errorType: data.errorMessage
        ? this.sanitizeErrorMessage(data.errorMessage)
        : undefined,
      ...(data.metadata ? { metadata: data.metadata } : {}),
    });
  }

  logWorkflowEvent(data: WorkflowEventData): void {
    this.write('workflow', {
      requestId: data.requestId,
      actorUserId: data.actorUserId,
      event: data.event,
      success: data.success,
      fromStatus: data.fromStatus,
      toStatus: data.toStatus,
      errorType: data.errorMessage
        ? this.sanitizeErrorMessage(data.errorMessage)
        : undefined,
    });
  }

  private write(component: string, fields: Record<string, unknown>): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      service: this.configService.get('app.name', { infer: true }),
      component,
      ...fields,
      environment: this.configService.get('app.nodeEnv', { infer: true }),
    };

    console.info(JSON.stringify(logEntry));
  }

  /**
   * Strip e-mail addresses and bearer tokens that may appear in error
   * messages from mail transports or strategies
   */
  private sanitizeErrorMessage(error: string): string {
    return error
      .replace(
        /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
        '[EMAIL_REDACTED]',
      )
      .replace(/Bearer\s+[^\s]+/gi, 'Bearer [TOKEN_REDACTED]')
      .substring(0, 500);
  }
}
