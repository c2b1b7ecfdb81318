import { RoleEnum } from '../../roles/roles.enum';

/**
 * The caller of an operation, resolved once per request by the identity
 * directory and then passed explicitly to every domain operation.
 *
 * - admin: superuser account
 * - manager: account with an Employee profile where isManager is true
 * - employee: account with an Employee profile where isManager is false
 * - anonymous: authenticated account without any profile
 */
export type Principal =
  | { kind: RoleEnum.admin; userId: number }
  | { kind: RoleEnum.manager; userId: number; employeeId: number }
  | { kind: RoleEnum.employee; userId: number; employeeId: number }
  | { kind: 'anonymous'; userId: number };

export type PrincipalKind = Principal['kind'];

export type ManagerPrincipal = Extract<Principal, { kind: RoleEnum.manager }>;
export type EmployeePrincipal = Extract<Principal, { kind: RoleEnum.employee }>;
export type AdminPrincipal = Extract<Principal, { kind: RoleEnum.admin }>;
