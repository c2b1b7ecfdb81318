import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Brackets, DataSource, Repository } from 'typeorm';
import { EmployeeRepositoryPort } from '../../../../domain/repositories/employee.repository.port';
import {
  Employee,
  EmployeeProfileChanges,
  NewEmployeeProfile,
} from '../../../../domain/entities/employee.entity';
import {
  AccountChanges,
  NewAccount,
} from '../../../../../users/domain/user';
import { EmployeeEntity } from '../entities/employee.entity';
import { EmployeeMapper } from '../mappers/employee.mapper';
import { UserEntity } from '../../../../../users/infrastructure/persistence/relational/entities/user.entity';
import { UserMapper } from '../../../../../users/infrastructure/persistence/relational/mappers/user.mapper';
import { TravelRequestEntity } from '../../../../../travel-requests/infrastructure/persistence/relational/entities/travel-request.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';
import {
  containsPattern,
  LIKE_ESCAPE,
} from '../../../../../utils/like-pattern';

/**
 * Relational Repository Implementation for Employee
 *
 * Account and profile rows are always written in the same transaction.
 */
@Injectable()
export class EmployeeRelationalRepository extends EmployeeRepositoryPort {
  constructor(
    @InjectRepository(EmployeeEntity)
    private readonly repository: Repository<EmployeeEntity>,
    private readonly dataSource: DataSource,
  ) {
    super();
  }

  async findById(id: number): Promise<NullableType<Employee>> {
    const entity = await this.repository.findOne({
      where: { id },
      relations: { user: true, manager: { user: true } },
    });

    return entity ? EmployeeMapper.toDomain(entity) : null;
  }

  async findByUserId(userId: number): Promise<NullableType<Employee>> {
    const entity = await this.repository.findOne({
      where: { userId },
      relations: { user: true, manager: { user: true } },
    });

    return entity ? EmployeeMapper.toDomain(entity) : null;
  }

  async findMany(searchName?: string): Promise<Employee[]> {
    const query = this.repository
      .createQueryBuilder('employee')
      .innerJoinAndSelect('employee.user', 'account')
      .leftJoinAndSelect('employee.manager', 'manager')
      .leftJoinAndSelect('manager.user', 'managerAccount')
      .orderBy('employee.id', 'ASC');

    if (searchName) {
      const name = containsPattern(searchName);
      query.andWhere(
        new Brackets((qb) => {
          qb.where(`LOWER(account.firstName) LIKE :name ${LIKE_ESCAPE}`, {
            name,
          }).orWhere(`LOWER(account.lastName) LIKE :name ${LIKE_ESCAPE}`, {
            name,
          });
        }),
      );
    }

    const entities = await query.getMany();
    return entities.map((entity) => EmployeeMapper.toDomain(entity));
  }

  async createWithAccount(
    account: NewAccount,
    profile: NewEmployeeProfile,
  ): Promise<Employee> {
    const employeeId = await this.dataSource.transaction(async (manager) => {
      const user = await manager.save(UserMapper.toPersistence(account, false));

      const entity = manager.create(EmployeeEntity, {
        userId: user.id,
        isManager: profile.isManager,
        managerId: profile.managerId,
        status: profile.status,
        createdOn: profile.createdOn,
      });
      const saved = await manager.save(entity);
      return saved.id;
    });

    return this.getOrFail(employeeId);
  }

  async update(
    id: number,
    accountChanges: AccountChanges,
    profileChanges: EmployeeProfileChanges,
  ): Promise<Employee> {
    await this.dataSource.transaction(async (manager) => {
      const entity = await manager.findOne(EmployeeEntity, { where: { id } });
      if (!entity) {
        throw new Error(`Employee ${id} not found`);
      }

      if (Object.keys(profileChanges).length > 0) {
        await manager.update(EmployeeEntity, { id }, profileChanges);
      }
      if (Object.keys(accountChanges).length > 0) {
        await manager.update(UserEntity, { id: entity.userId }, accountChanges);
      }
    });

    return this.getOrFail(id);
  }

  async deleteWithAccount(id: number): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      const entity = await manager.findOne(EmployeeEntity, { where: { id } });
      if (!entity) {
        throw new Error(`Employee ${id} not found`);
      }

      // Soft orphaning: requests and subordinates keep their rows
      await manager.update(
        TravelRequestEntity,
        { employeeId: id },
        { employeeId: null },
      );
      await manager.update(
        TravelRequestEntity,
        { managerId: id },
        { managerId: null },
      );
      await manager.update(EmployeeEntity, { managerId: id }, { managerId: null });

      await manager.delete(EmployeeEntity, { id });
      await manager.delete(UserEntity, { id: entity.userId });
    });
  }

  private async getOrFail(id: number): Promise<Employee> {
    const employee = await this.findById(id);
    if (!employee) {
      throw new Error(`Employee ${id} not found after write`);
    }
    return employee;
  }
}
