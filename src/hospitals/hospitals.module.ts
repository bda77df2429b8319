import { Module } from '@nestjs/common';
import { HospitalRepository } from './domain/repositories/hospital.repository.port';
import { HospitalInMemoryRepository } from './infrastructure/persistence/in-memory/repositories/hospital.repository';
import {
  DEFAULT_HOSPITAL_SEED,
  HOSPITAL_SEED,
} from './infrastructure/persistence/in-memory/hospital.seed';
import { HospitalRegistryDomainService } from './domain/services/hospital-registry.domain.service';
import { HospitalsService } from './hospitals.service';
import { HospitalsController } from './hospitals.controller';

@Module({
  providers: [
    {
      provide: HOSPITAL_SEED,
      useValue: DEFAULT_HOSPITAL_SEED,
    },
    {
      provide: HospitalRepository,
      useClass: HospitalInMemoryRepository,
    },
    HospitalRegistryDomainService,
    HospitalsService,
  ],
  controllers: [HospitalsController],
  exports: [HospitalRegistryDomainService],
})
export class HospitalsModule {}
