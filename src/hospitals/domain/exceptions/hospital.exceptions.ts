import { BadRequestException, NotFoundException } from '@nestjs/common';

export class IcuCapacityExceededException extends BadRequestException {
  constructor(
    readonly icuBeds: number,
    readonly totalBeds: number,
  ) {
    super('ICU beds cannot exceed total beds');
  }
}

export class HospitalNotFoundException extends NotFoundException {
  constructor(readonly hospitalId: number) {
    super(`Hospital with ID ${hospitalId} not found`);
  }
}
