import { Module } from '@nestjs/common';
import { RelationalTravelRequestPersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';
import { RelationalEmployeePersistenceModule } from '../employees/infrastructure/persistence/relational/relational-persistence.module';
import { IdentityModule } from '../identity/identity.module';
import { NotificationsModule } from '../notifications/notifications.module';
import { AuditModule } from '../audit/audit.module';
import { TravelRequestLifecycleDomainService } from './domain/services/travel-request-lifecycle.domain.service';
import { TravelRequestNotifier } from './domain/services/travel-request-notifier.service';
import { TravelRequestsService } from './travel-requests.service';
import { AdminTravelRequestsController } from './controllers/admin-travel-requests.controller';
import { ManagerTravelRequestsController } from './controllers/manager-travel-requests.controller';
import { EmployeeTravelRequestsController } from './controllers/employee-travel-requests.controller';

@Module({
  imports: [
    RelationalTravelRequestPersistenceModule,
    RelationalEmployeePersistenceModule,
    IdentityModule,
    NotificationsModule,
    AuditModule,
  ],
  controllers: [
    AdminTravelRequestsController,
    ManagerTravelRequestsController,
    EmployeeTravelRequestsController,
  ],
  providers: [
    TravelRequestsService,
    TravelRequestLifecycleDomainService,
    TravelRequestNotifier,
  ],
})
export class TravelRequestsModule {}
