import { Module } from '@nestjs/common';
import { RelationalUserPersistenceModule } from '../users/infrastructure/persistence/relational/relational-persistence.module';
import { RelationalEmployeePersistenceModule } from '../employees/infrastructure/persistence/relational/relational-persistence.module';
import { IdentityDirectoryService } from './identity-directory.service';
import { RolesGuard } from '../roles/roles.guard';

@Module({
  imports: [RelationalUserPersistenceModule, RelationalEmployeePersistenceModule],
  providers: [IdentityDirectoryService, RolesGuard],
  exports: [IdentityDirectoryService, RolesGuard],
})
export class IdentityModule {}
