import { NullableType } from '../../../utils/types/nullable.type';
import { User } from '../../domain/user';

/**
 * Read-side port for accounts. Accounts are written together with their
 * profile (see the employee and admin repositories) so that an identity
 * never exists without the profile it was created for.
 */
export abstract class UserRepository {
  abstract findById(id: User['id']): Promise<NullableType<User>>;

  abstract findByUsername(username: string): Promise<NullableType<User>>;
}
