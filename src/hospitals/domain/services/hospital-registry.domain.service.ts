import { Injectable, Logger } from '@nestjs/common';
import { HospitalRepository } from '../repositories/hospital.repository.port';
import { Hospital } from '../entities/hospital.entity';
import {
  HospitalNotFoundException,
  IcuCapacityExceededException,
} from '../exceptions/hospital.exceptions';

export const DEFAULT_SKIP = 0;
export const DEFAULT_LIMIT = 100;

export type CreateHospitalInput = Omit<Hospital, 'id'>;

/**
 * HospitalRegistryDomainService
 *
 * Owns the rules for hospital records:
 * - ICU beds may not exceed total beds
 * - IDs are assigned by the registry
 * - A rejected create leaves the collection untouched
 *
 * Pagination is permissive: out-of-range skip/limit values yield a shorter
 * (possibly empty) page, never an error.
 */
@Injectable()
export class HospitalRegistryDomainService {
  private readonly logger = new Logger(HospitalRegistryDomainService.name);

  constructor(private readonly hospitalRepository: HospitalRepository) {}

  /**
   * Register a new hospital
   *
   * @throws IcuCapacityExceededException when icuBeds > totalBeds
   */
  async createHospital(input: CreateHospitalInput): Promise<Hospital> {
    if (input.icuBeds > input.totalBeds) {
      this.logger.warn(
        `Rejected hospital: icuBeds=${input.icuBeds} exceeds totalBeds=${input.totalBeds}`,
      );
      throw new IcuCapacityExceededException(input.icuBeds, input.totalBeds);
    }

    const hospital = await this.hospitalRepository.create({
      name: input.name,
      location: input.location,
      totalBeds: input.totalBeds,
      icuBeds: input.icuBeds,
    });

    this.logger.log(`Hospital created: id=${hospital.id}`);
    return hospital;
  }

  async listHospitals(
    skip: number = DEFAULT_SKIP,
    limit: number = DEFAULT_LIMIT,
  ): Promise<Hospital[]> {
    return this.hospitalRepository.findAll(skip, limit);
  }

  /**
   * @throws HospitalNotFoundException when no record has this ID
   */
  async getHospital(id: number): Promise<Hospital> {
    const hospital = await this.hospitalRepository.findById(id);
    if (!hospital) {
      this.logger.warn(`Hospital lookup missed: id=${id}`);
      throw new HospitalNotFoundException(id);
    }

    return hospital;
  }

  async countHospitals(): Promise<number> {
    return this.hospitalRepository.count();
  }
}
