import { Module } from '@nestjs/common';
import { RelationalEmployeePersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';
import { RelationalUserPersistenceModule } from '../users/infrastructure/persistence/relational/relational-persistence.module';
import { IdentityModule } from '../identity/identity.module';
import { AuditModule } from '../audit/audit.module';
import { DirectoryAdminDomainService } from './domain/services/directory-admin.domain.service';
import { EmployeesService } from './employees.service';
import { AdminEmployeesController } from './controllers/admin-employees.controller';
import { EmployeeProfileController } from './controllers/employee-profile.controller';

@Module({
  imports: [
    RelationalEmployeePersistenceModule,
    RelationalUserPersistenceModule,
    IdentityModule,
    AuditModule,
  ],
  controllers: [AdminEmployeesController, EmployeeProfileController],
  providers: [DirectoryAdminDomainService, EmployeesService],
  exports: [EmployeesService],
})
export class EmployeesModule {}
