import { Hospital } from '../../../domain/entities/hospital.entity';

export const HOSPITAL_SEED = 'HOSPITAL_SEED';

export const DEFAULT_HOSPITAL_SEED: ReadonlyArray<Hospital> = [
  {
    id: 1,
    name: 'City General Hospital',
    location: 'Delhi',
    totalBeds: 250,
    icuBeds: 50,
  },
  {
    id: 2,
    name: 'Metro Care Hospital',
    location: 'Mumbai',
    totalBeds: 180,
    icuBeds: 30,
  },
];
