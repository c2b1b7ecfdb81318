import { EmployeeStatus } from '../enums/employee-status.enum';

/**
 * Compact view of an employee used wherever another record points at one
 * (a request's owner or addressee, an employee's manager).
 */
export interface EmployeeReference {
  id: number;
  username: string;
  firstName: string;
  lastName: string;
  email: string;
}

/**
 * Domain entity for Employee
 *
 * An employee profile is attached to exactly one account. `isManager`
 * decides whether the account acts as a Manager or an Employee.
 *
 * `managerId` is a weak reference: deleting the manager sets it to null
 * on every subordinate instead of cascading.
 */
export interface Employee extends EmployeeReference {
  userId: number;
  isActive: boolean;
  isManager: boolean;
  managerId: number | null;
  manager: EmployeeReference | null;
  status: EmployeeStatus;
  createdOn: string; // YYYY-MM-DD
}

export type NewEmployeeProfile = Pick<
  Employee,
  'isManager' | 'managerId' | 'status' | 'createdOn'
>;

export type EmployeeProfileChanges = Partial<
  Pick<Employee, 'isManager' | 'managerId' | 'status' | 'createdOn'>
>;
