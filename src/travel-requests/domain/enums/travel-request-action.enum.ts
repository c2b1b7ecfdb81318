export enum TravelRequestAction {
  SUBMIT = 'submit',
  APPROVE = 'approve',
  REJECT = 'reject',
  REVERT = 'revert',
  CLOSE = 'close',
}

export const MANAGER_ACTIONS = [
  TravelRequestAction.APPROVE,
  TravelRequestAction.REJECT,
  TravelRequestAction.REVERT,
] as const;

export type ManagerAction = (typeof MANAGER_ACTIONS)[number];

export function isManagerAction(action: string): action is ManagerAction {
  return MANAGER_ACTIONS.some((candidate) => candidate === action);
}
