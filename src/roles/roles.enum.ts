export enum RoleEnum {
  admin = 'admin',
  manager = 'manager',
  employee = 'employee',
}
