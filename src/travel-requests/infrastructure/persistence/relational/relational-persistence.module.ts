import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TravelRequestEntity } from './entities/travel-request.entity';
import { TravelRequestRepositoryPort } from '../../../domain/ports/travel-request.repository.port';
import { TravelRequestRelationalRepository } from './repositories/travel-request.repository';

@Module({
  imports: [TypeOrmModule.forFeature([TravelRequestEntity])],
  providers: [
    {
      provide: TravelRequestRepositoryPort,
      useClass: TravelRequestRelationalRepository,
    },
  ],
  exports: [TravelRequestRepositoryPort],
})
export class RelationalTravelRequestPersistenceModule {}
