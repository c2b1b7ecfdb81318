import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { UserEntity } from '../entities/user.entity';
import { UserRepository } from '../../user.repository';
import { User } from '../../../../domain/user';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { UserMapper } from '../mappers/user.mapper';

@Injectable()
export class UsersRelationalRepository implements UserRepository {
  constructor(
    @InjectRepository(UserEntity)
    private readonly usersRepository: Repository<UserEntity>,
  ) {}

  async findById(id: User['id']): Promise<NullableType<User>> {
    const entity = await this.usersRepository.findOne({
      where: { id },
    });

    return entity ? UserMapper.toDomain(entity) : null;
  }

  async findByUsername(username: string): Promise<NullableType<User>> {
    const entity = await this.usersRepository.findOne({
      where: { username },
    });

    return entity ? UserMapper.toDomain(entity) : null;
  }
}
