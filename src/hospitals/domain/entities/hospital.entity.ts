/**
 * Domain entity for a hospital facility record
 *
 * NOTE: icuBeds <= totalBeds is checked when the record is created.
 * Records are never updated afterwards.
 */
export interface Hospital {
  id: number; // Assigned by the registry, never client supplied
  name: string;
  location: string;
  totalBeds: number; // Total bed capacity
  icuBeds: number; // ICU-designated beds, part of totalBeds
}
