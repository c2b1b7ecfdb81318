import { TravelRequestStateMachine } from './travel-request-state-machine.util';
import { TravelRequestStatus } from '../enums/travel-request-status.enum';
import { TravelRequestAction } from '../enums/travel-request-action.enum';

describe('TravelRequestStateMachine', () => {
  describe('isValidTransition', () => {
    it.each([
      [TravelRequestStatus.TO_SUBMIT, TravelRequestStatus.SUBMITTED],
      [TravelRequestStatus.REVERTED, TravelRequestStatus.SUBMITTED],
      [TravelRequestStatus.SUBMITTED, TravelRequestStatus.APPROVED],
      [TravelRequestStatus.SUBMITTED, TravelRequestStatus.REJECTED],
      [TravelRequestStatus.SUBMITTED, TravelRequestStatus.REVERTED],
      [TravelRequestStatus.APPROVED, TravelRequestStatus.CLOSED],
    ])('should allow %s → %s', (from, to) => {
      expect(TravelRequestStateMachine.isValidTransition(from, to)).toBe(true);
    });

    it.each([
      [TravelRequestStatus.SUBMITTED, TravelRequestStatus.SUBMITTED],
      [TravelRequestStatus.APPROVED, TravelRequestStatus.APPROVED],
      [TravelRequestStatus.TO_SUBMIT, TravelRequestStatus.APPROVED],
      [TravelRequestStatus.REJECTED, TravelRequestStatus.SUBMITTED],
      [TravelRequestStatus.SUBMITTED, TravelRequestStatus.CLOSED],
      [TravelRequestStatus.CLOSED, TravelRequestStatus.SUBMITTED],
    ])('should refuse %s → %s', (from, to) => {
      expect(TravelRequestStateMachine.isValidTransition(from, to)).toBe(
        false,
      );
    });
  });

  it('should map actions to their target status', () => {
    expect(
      TravelRequestStateMachine.targetOf(TravelRequestAction.REVERT),
    ).toBe(TravelRequestStatus.REVERTED);
    expect(TravelRequestStateMachine.targetOf(TravelRequestAction.CLOSE)).toBe(
      TravelRequestStatus.CLOSED,
    );
  });

  it('should only allow submitting drafts and reverted requests', () => {
    expect(
      TravelRequestStateMachine.canSubmit(TravelRequestStatus.TO_SUBMIT),
    ).toBe(true);
    expect(
      TravelRequestStateMachine.canSubmit(TravelRequestStatus.REVERTED),
    ).toBe(true);
    expect(
      TravelRequestStateMachine.canSubmit(TravelRequestStatus.SUBMITTED),
    ).toBe(false);
  });
});
