import { EmployeeReference } from '../../../employees/domain/entities/employee.entity';
import { TravelMode } from '../enums/travel-mode.enum';
import { TravelRequestStatus } from '../enums/travel-request-status.enum';

/**
 * Domain entity for TravelRequest
 *
 * All dates are calendar dates formatted YYYY-MM-DD.
 *
 * `employeeId` and `managerId` become null when the referenced employee is
 * deleted; the request itself is kept. `dateOfRequest` is set once at
 * creation. Status only changes through the lifecycle domain service.
 */
export interface TravelRequest {
  id: number;
  employeeId: number | null;
  employee: EmployeeReference | null;
  managerId: number | null;
  manager: EmployeeReference | null;
  purpose: string;
  mode: TravelMode;
  fromDate: string;
  toDate: string;
  fromWhere: string;
  toWhere: string;
  lodging: boolean;
  lodgingInfo: string | null;
  additionalRequest: string | null;
  additionalInfo: string | null;
  messageFromManager: string | null;
  messageFromAdmin: string | null;
  dateOfRequest: string;
  dateOfApproval: string | null;
  dateOfRejection: string | null;
  dateOfRevert: string | null;
  resubmissionRequest: boolean;
  isResubmitted: boolean;
  status: TravelRequestStatus;
}

/**
 * Fields the owning employee fills in and may edit
 */
export type TravelRequestContent = Pick<
  TravelRequest,
  | 'purpose'
  | 'mode'
  | 'fromDate'
  | 'toDate'
  | 'fromWhere'
  | 'toWhere'
  | 'lodging'
  | 'lodgingInfo'
  | 'additionalRequest'
  | 'additionalInfo'
>;

export type NewTravelRequest = TravelRequestContent &
  Pick<TravelRequest, 'employeeId' | 'managerId' | 'status' | 'dateOfRequest'>;

/**
 * Fields written together with a status change
 */
export type TransitionChanges = Pick<TravelRequest, 'status'> &
  Partial<
    Pick<
      TravelRequest,
      | 'dateOfApproval'
      | 'dateOfRejection'
      | 'dateOfRevert'
      | 'messageFromManager'
      | 'messageFromAdmin'
      | 'resubmissionRequest'
      | 'isResubmitted'
    >
  >;
