/**
 * Domain model for an account (the identity behind a principal).
 *
 * Role is not stored here: it is derived by the identity directory from
 * `isSuperuser` and the Employee/Admin profiles attached to the account.
 */
export interface User {
  id: number;
  username: string;
  password: string; // bcrypt hash, never serialized
  firstName: string;
  lastName: string;
  email: string;
  isActive: boolean;
  isSuperuser: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type NewAccount = Pick<
  User,
  'username' | 'password' | 'firstName' | 'lastName' | 'email' | 'isActive'
>;

export type AccountChanges = Partial<
  Pick<User, 'username' | 'firstName' | 'lastName' | 'email' | 'isActive'>
>;
