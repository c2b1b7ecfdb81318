import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Brackets, Repository, SelectQueryBuilder } from 'typeorm';
import {
  RequestFilters,
  RequestScope,
  RequestSort,
  TravelRequestRepositoryPort,
} from '../../../../domain/ports/travel-request.repository.port';
import {
  NewTravelRequest,
  TransitionChanges,
  TravelRequest,
  TravelRequestContent,
} from '../../../../domain/entities/travel-request.entity';
import { TravelRequestStatus } from '../../../../domain/enums/travel-request-status.enum';
import { TravelRequestEntity } from '../entities/travel-request.entity';
import { TravelRequestMapper } from '../mappers/travel-request.mapper';
import { NullableType } from '../../../../../utils/types/nullable.type';
import {
  containsPattern,
  LIKE_ESCAPE,
} from '../../../../../utils/like-pattern';

@Injectable()
export class TravelRequestRelationalRepository extends TravelRequestRepositoryPort {
  constructor(
    @InjectRepository(TravelRequestEntity)
    private readonly repository: Repository<TravelRequestEntity>,
  ) {
    super();
  }

  async list(
    scope: RequestScope,
    filters: RequestFilters,
    sort?: NullableType<RequestSort>,
  ): Promise<TravelRequest[]> {
    const query = this.baseQuery();

    switch (scope.kind) {
      case 'subtree':
        // Uses the owner's current manager, not the request's addressee
        query.andWhere('employee.managerId = :scopeManagerId', {
          scopeManagerId: scope.managerId,
        });
        break;
      case 'owned':
        query.andWhere('request.employeeId = :scopeEmployeeId', {
          scopeEmployeeId: scope.employeeId,
        });
        break;
      case 'all':
        break;
    }

    this.applyFilters(query, filters);

    if (sort) {
      query.orderBy(`request.${sort.field}`, sort.direction);
      query.addOrderBy('request.id', 'ASC');
    } else {
      query.orderBy('request.id', 'ASC');
    }

    const entities = await query.getMany();
    return entities.map((entity) => TravelRequestMapper.toDomain(entity));
  }

  async findById(id: number): Promise<NullableType<TravelRequest>> {
    const entity = await this.baseQuery()
      .where('request.id = :id', { id })
      .getOne();

    return entity ? TravelRequestMapper.toDomain(entity) : null;
  }

  async create(data: NewTravelRequest): Promise<TravelRequest> {
    const saved = await this.repository.save(
      TravelRequestMapper.toPersistence(data),
    );
    return this.getOrFail(saved.id);
  }

  async transition(
    id: number,
    expectedStatus: TravelRequestStatus,
    changes: TransitionChanges,
  ): Promise<NullableType<TravelRequest>> {
    const result = await this.repository.update(
      { id, status: expectedStatus },
      changes,
    );
    if (!result.affected) {
      return null;
    }

    return this.findById(id);
  }

  async updateContent(
    id: number,
    changes: Partial<TravelRequestContent>,
  ): Promise<TravelRequest> {
    if (Object.keys(changes).length > 0) {
      await this.repository.update({ id }, changes);
    }
    return this.getOrFail(id);
  }

  async delete(id: number): Promise<void> {
    await this.repository.delete({ id });
  }

  private baseQuery(): SelectQueryBuilder<TravelRequestEntity> {
    return this.repository
      .createQueryBuilder('request')
      .leftJoinAndSelect('request.employee', 'employee')
      .leftJoinAndSelect('employee.user', 'employeeAccount')
      .leftJoinAndSelect('request.manager', 'manager')
      .leftJoinAndSelect('manager.user', 'managerAccount');
  }

  private applyFilters(
    query: SelectQueryBuilder<TravelRequestEntity>,
    filters: RequestFilters,
  ): void {
    if (filters.status) {
      query.andWhere('request.status = :status', { status: filters.status });
    }

    if (filters.dateFrom) {
      query.andWhere('request.dateOfRequest >= :dateFrom', {
        dateFrom: filters.dateFrom,
      });
    }

    if (filters.dateTo) {
      query.andWhere('request.dateOfRequest <= :dateTo', {
        dateTo: filters.dateTo,
      });
    }

    if (filters.requesterName) {
      const requesterName = containsPattern(filters.requesterName);
      query.andWhere(
        new Brackets((qb) => {
          qb.where(
            `LOWER(employeeAccount.firstName) LIKE :requesterName ${LIKE_ESCAPE}`,
            { requesterName },
          ).orWhere(
            `LOWER(employeeAccount.lastName) LIKE :requesterName ${LIKE_ESCAPE}`,
            { requesterName },
          );
        }),
      );
    }

    if (filters.purpose) {
      query.andWhere(`LOWER(request.purpose) LIKE :purpose ${LIKE_ESCAPE}`, {
        purpose: containsPattern(filters.purpose),
      });
    }
  }

  private async getOrFail(id: number): Promise<TravelRequest> {
    const request = await this.findById(id);
    if (!request) {
      throw new Error(`Travel request ${id} not found after write`);
    }
    return request;
  }
}
