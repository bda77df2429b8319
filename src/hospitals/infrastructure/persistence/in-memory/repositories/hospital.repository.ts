import { Inject, Injectable } from '@nestjs/common';
import { HospitalRepository } from '../../../../domain/repositories/hospital.repository.port';
import { Hospital } from '../../../../domain/entities/hospital.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { HOSPITAL_SEED } from '../hospital.seed';

/**
 * Process-local hospital store
 *
 * Each instance owns its own ordered collection, copied from the seed it is
 * constructed with. Nothing survives a restart.
 *
 * IDs come from a counter starting at the highest seeded ID. Without a
 * delete operation this is always collection length + 1.
 *
 * create() assigns the ID and appends without yielding, so concurrent
 * requests cannot share an ID or observe a half-built record.
 */
@Injectable()
export class HospitalInMemoryRepository implements HospitalRepository {
  private readonly hospitals: Hospital[];
  private lastId: number;

  constructor(@Inject(HOSPITAL_SEED) seed: ReadonlyArray<Hospital>) {
    this.hospitals = seed.map((hospital) => this.copy(hospital));
    this.lastId = this.hospitals.reduce(
      (max, hospital) => Math.max(max, hospital.id),
      0,
    );
  }

  async create(data: Omit<Hospital, 'id'>): Promise<Hospital> {
    this.lastId += 1;
    const hospital: Hospital = {
      id: this.lastId,
      name: data.name,
      location: data.location,
      totalBeds: data.totalBeds,
      icuBeds: data.icuBeds,
    };

    this.hospitals.push(hospital);
    return this.copy(hospital);
  }

  async findAll(skip: number, limit: number): Promise<Hospital[]> {
    return this.hospitals
      .slice(skip, skip + limit)
      .map((hospital) => this.copy(hospital));
  }

  async findById(id: number): Promise<NullableType<Hospital>> {
    const hospital = this.hospitals.find((entry) => entry.id === id);
    return hospital ? this.copy(hospital) : null;
  }

  async count(): Promise<number> {
    return this.hospitals.length;
  }

  private copy(hospital: Hospital): Hospital {
    return { ...hospital };
  }
}
