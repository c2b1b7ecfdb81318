import { NewAccount, User } from '../../../../domain/user';
import { UserEntity } from '../entities/user.entity';

export class UserMapper {
  static toDomain(entity: UserEntity): User {
    return {
      id: entity.id,
      username: entity.username,
      password: entity.password,
      firstName: entity.firstName,
      lastName: entity.lastName,
      email: entity.email,
      isActive: entity.isActive,
      isSuperuser: entity.isSuperuser,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }

  static toPersistence(account: NewAccount, isSuperuser: boolean): UserEntity {
    const entity = new UserEntity();
    entity.username = account.username;
    entity.password = account.password;
    entity.firstName = account.firstName;
    entity.lastName = account.lastName;
    entity.email = account.email;
    entity.isActive = account.isActive;
    entity.isSuperuser = isSuperuser;
    return entity;
  }
}
