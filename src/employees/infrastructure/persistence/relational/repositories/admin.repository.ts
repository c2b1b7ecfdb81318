import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { AdminRepositoryPort } from '../../../../domain/repositories/admin.repository.port';
import { Admin } from '../../../../domain/entities/admin.entity';
import { NewAccount } from '../../../../../users/domain/user';
import { AdminEntity } from '../entities/admin.entity';
import { EmployeeMapper } from '../mappers/employee.mapper';
import { UserMapper } from '../../../../../users/infrastructure/persistence/relational/mappers/user.mapper';

@Injectable()
export class AdminRelationalRepository extends AdminRepositoryPort {
  constructor(
    @InjectRepository(AdminEntity)
    private readonly repository: Repository<AdminEntity>,
    private readonly dataSource: DataSource,
  ) {
    super();
  }

  count(): Promise<number> {
    return this.repository.count();
  }

  async createWithAccount(account: NewAccount): Promise<Admin> {
    return this.dataSource.transaction(async (manager) => {
      const user = await manager.save(UserMapper.toPersistence(account, true));
      const saved = await manager.save(
        manager.create(AdminEntity, { userId: user.id }),
      );
      saved.user = user;
      return EmployeeMapper.adminToDomain(saved);
    });
  }
}
