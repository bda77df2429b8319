import { Injectable } from '@nestjs/common';
import { HospitalRegistryDomainService } from '../hospitals/domain/services/hospital-registry.domain.service';

/**
 * Health Check Service
 *
 * Used by monitoring systems and load balancers to verify the registry is
 * serving.
 */
@Injectable()
export class HealthService {
  constructor(
    private readonly hospitalRegistry: HospitalRegistryDomainService,
  ) {}

  async check(): Promise<{ status: string; hospitals: number }> {
    return {
      status: 'ok',
      hospitals: await this.hospitalRegistry.countHospitals(),
    };
  }
}
