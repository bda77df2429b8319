import { NullableType } from '../../../utils/types/nullable.type';
import { Hospital } from '../entities/hospital.entity';

export abstract class HospitalRepository {
  /**
   * Append a new hospital and assign its ID
   */
  abstract create(data: Omit<Hospital, 'id'>): Promise<Hospital>;

  /**
   * Contiguous slice [skip, skip + limit) in insertion order
   */
  abstract findAll(skip: number, limit: number): Promise<Hospital[]>;

  /**
   * Find hospital by ID
   */
  abstract findById(id: number): Promise<NullableType<Hospital>>;

  abstract count(): Promise<number>;
}
