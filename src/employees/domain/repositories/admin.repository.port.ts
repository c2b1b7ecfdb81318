import { NewAccount } from '../../../users/domain/user';
import { Admin } from '../entities/admin.entity';

export abstract class AdminRepositoryPort {
  abstract count(): Promise<number>;

  /**
   * Create a superuser account and its admin profile in one transaction
   */
  abstract createWithAccount(account: NewAccount): Promise<Admin>;
}
