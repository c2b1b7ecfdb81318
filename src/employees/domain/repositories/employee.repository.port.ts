import { NullableType } from '../../../utils/types/nullable.type';
import { AccountChanges, NewAccount } from '../../../users/domain/user';
import {
  Employee,
  EmployeeProfileChanges,
  NewEmployeeProfile,
} from '../entities/employee.entity';

/**
 * Repository Port for Employee profiles (Hexagonal Architecture)
 */
export abstract class EmployeeRepositoryPort {
  abstract findById(id: number): Promise<NullableType<Employee>>;

  abstract findByUserId(userId: number): Promise<NullableType<Employee>>;

  /**
   * List employees, optionally narrowed to those whose first or last name
   * contains `searchName` (case-insensitive)
   */
  abstract findMany(searchName?: string): Promise<Employee[]>;

  /**
   * Create the account and its employee profile in one transaction
   */
  abstract createWithAccount(
    account: NewAccount,
    profile: NewEmployeeProfile,
  ): Promise<Employee>;

  /**
   * Apply account changes and profile changes to an existing employee
   */
  abstract update(
    id: number,
    accountChanges: AccountChanges,
    profileChanges: EmployeeProfileChanges,
  ): Promise<Employee>;

  /**
   * Remove the profile, then its account. Every travel request and every
   * subordinate pointing at the employee keeps its row with the reference
   * set to null.
   */
  abstract deleteWithAccount(id: number): Promise<void>;
}
