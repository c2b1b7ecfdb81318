export enum TravelRequestStatus {
  TO_SUBMIT = 'to_submit', // Draft, not yet sent to the manager
  SUBMITTED = 'submitted', // Awaiting the manager's decision
  REJECTED = 'rejected',
  REVERTED = 'reverted', // Sent back to the employee for changes
  APPROVED = 'approved',
  CLOSED = 'closed', // Terminal, set by an admin after approval
}
