import { TravelRequestStatus } from '../enums/travel-request-status.enum';
import { TravelRequestAction } from '../enums/travel-request-action.enum';

/**
 * Travel Request State Machine Utility
 *
 * Valid Transitions:
 * - TO_SUBMIT → SUBMITTED (owning employee)
 * - REVERTED → SUBMITTED (owning employee, resubmission)
 * - SUBMITTED → APPROVED | REJECTED | REVERTED (the request's manager)
 * - APPROVED → CLOSED (admin)
 *
 * REJECTED and CLOSED accept no further action. Callers raise
 * InvalidTransitionException when a transition is refused.
 */
export class TravelRequestStateMachine {
  private static readonly VALID_TRANSITIONS: Map<
    TravelRequestStatus,
    TravelRequestStatus[]
  > = new Map([
    [TravelRequestStatus.TO_SUBMIT, [TravelRequestStatus.SUBMITTED]],
    [TravelRequestStatus.REVERTED, [TravelRequestStatus.SUBMITTED]],
    [
      TravelRequestStatus.SUBMITTED,
      [
        TravelRequestStatus.APPROVED,
        TravelRequestStatus.REJECTED,
        TravelRequestStatus.REVERTED,
      ],
    ],
    [TravelRequestStatus.APPROVED, [TravelRequestStatus.CLOSED]],
  ]);

  private static readonly ACTION_TARGETS: Record<
    TravelRequestAction,
    TravelRequestStatus
  > = {
    [TravelRequestAction.SUBMIT]: TravelRequestStatus.SUBMITTED,
    [TravelRequestAction.APPROVE]: TravelRequestStatus.APPROVED,
    [TravelRequestAction.REJECT]: TravelRequestStatus.REJECTED,
    [TravelRequestAction.REVERT]: TravelRequestStatus.REVERTED,
    [TravelRequestAction.CLOSE]: TravelRequestStatus.CLOSED,
  };

  /**
   * Unlike a generic status update, a transition to the same status is
   * never valid: repeating an action must fail.
   */
  static isValidTransition(
    fromStatus: TravelRequestStatus,
    toStatus: TravelRequestStatus,
  ): boolean {
    const validTargets = this.VALID_TRANSITIONS.get(fromStatus);
    if (!validTargets) {
      return false;
    }

    return validTargets.includes(toStatus);
  }

  static targetOf(action: TravelRequestAction): TravelRequestStatus {
    return this.ACTION_TARGETS[action];
  }

  /**
   * Source states from which the owning employee may submit
   */
  static canSubmit(status: TravelRequestStatus): boolean {
    return this.isValidTransition(status, TravelRequestStatus.SUBMITTED);
  }
}
