/**
 * Domain entity for Admin
 *
 * A capability marker only: admin behaviour comes from the superuser flag
 * on the account, this profile records that the account was provisioned
 * as an admin.
 */
export interface Admin {
  id: number;
  userId: number;
  username: string;
}
