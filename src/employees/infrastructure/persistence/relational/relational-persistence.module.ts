import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EmployeeEntity } from './entities/employee.entity';
import { AdminEntity } from './entities/admin.entity';
import { EmployeeRepositoryPort } from '../../../domain/repositories/employee.repository.port';
import { AdminRepositoryPort } from '../../../domain/repositories/admin.repository.port';
import { EmployeeRelationalRepository } from './repositories/employee.repository';
import { AdminRelationalRepository } from './repositories/admin.repository';

@Module({
  imports: [TypeOrmModule.forFeature([EmployeeEntity, AdminEntity])],
  providers: [
    {
      provide: EmployeeRepositoryPort,
      useClass: EmployeeRelationalRepository,
    },
    {
      provide: AdminRepositoryPort,
      useClass: AdminRelationalRepository,
    },
  ],
  exports: [TypeOrmModule, EmployeeRepositoryPort, AdminRepositoryPort],
})
export class RelationalEmployeePersistenceModule {}
