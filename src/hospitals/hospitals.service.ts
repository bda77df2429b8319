import { Injectable } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { HospitalRegistryDomainService } from './domain/services/hospital-registry.domain.service';
import { Hospital } from './domain/entities/hospital.entity';
import { CreateHospitalDto } from './dto/create-hospital.dto';
import { ListHospitalsDto } from './dto/list-hospitals.dto';
import { HospitalResponseDto } from './dto/hospital-response.dto';

/**
 * Hospitals Service (Application Layer)
 *
 * Thin facade over HospitalRegistryDomainService that maps the snake_case
 * wire format onto domain entities and back. Rules live in the domain
 * service.
 */
@Injectable()
export class HospitalsService {
  constructor(
    private readonly hospitalRegistry: HospitalRegistryDomainService,
  ) {}

  async create(dto: CreateHospitalDto): Promise<HospitalResponseDto> {
    const hospital = await this.hospitalRegistry.createHospital({
      name: dto.name,
      location: dto.location,
      totalBeds: dto.total_beds,
      icuBeds: dto.icu_beds,
    });

    return this.toResponseDto(hospital);
  }

  async findAll(query: ListHospitalsDto): Promise<HospitalResponseDto[]> {
    const hospitals = await this.hospitalRegistry.listHospitals(
      query.skip,
      query.limit,
    );

    return hospitals.map((hospital) => this.toResponseDto(hospital));
  }

  async findOne(id: number): Promise<HospitalResponseDto> {
    const hospital = await this.hospitalRegistry.getHospital(id);
    return this.toResponseDto(hospital);
  }

  private toResponseDto(hospital: Hospital): HospitalResponseDto {
    return plainToInstance(
      HospitalResponseDto,
      {
        id: hospital.id,
        name: hospital.name,
        location: hospital.location,
        total_beds: hospital.totalBeds,
        icu_beds: hospital.icuBeds,
      },
      { excludeExtraneousValues: true },
    );
  }
}
