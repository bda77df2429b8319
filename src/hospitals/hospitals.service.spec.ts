import { Test, TestingModule } from '@nestjs/testing';
import { HospitalsService } from './hospitals.service';
import { HospitalRegistryDomainService } from './domain/services/hospital-registry.domain.service';
import { HospitalResponseDto } from './dto/hospital-response.dto';
import { HospitalNotFoundException } from './domain/exceptions/hospital.exceptions';

describe('HospitalsService', () => {
  let service: HospitalsService;
  let mockRegistry: {
    createHospital: jest.Mock;
    listHospitals: jest.Mock;
    getHospital: jest.Mock;
  };

  const sunrise = {
    id: 3,
    name: 'Sunrise Clinic',
    location: 'Pune',
    totalBeds: 100,
    icuBeds: 20,
  };

  beforeEach(async () => {
    mockRegistry = {
      createHospital: jest.fn(),
      listHospitals: jest.fn(),
      getHospital: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        HospitalsService,
        { provide: HospitalRegistryDomainService, useValue: mockRegistry },
      ],
    }).compile();

    service = module.get<HospitalsService>(HospitalsService);
  });

  describe('create', () => {
    it('should map the snake_case body onto the domain input', async () => {
      mockRegistry.createHospital.mockResolvedValue(sunrise);

      const result = await service.create({
        name: 'Sunrise Clinic',
        location: 'Pune',
        total_beds: 100,
        icu_beds: 20,
      });

      expect(mockRegistry.createHospital).toHaveBeenCalledWith({
        name: 'Sunrise Clinic',
        location: 'Pune',
        totalBeds: 100,
        icuBeds: 20,
      });
      expect(result).toBeInstanceOf(HospitalResponseDto);
      expect({ ...result }).toEqual({
        id: 3,
        name: 'Sunrise Clinic',
        location: 'Pune',
        total_beds: 100,
        icu_beds: 20,
      });
    });
  });

  describe('findAll', () => {
    it('should pass undefined pagination through to the domain defaults', async () => {
      mockRegistry.listHospitals.mockResolvedValue([]);

      await service.findAll({});

      expect(mockRegistry.listHospitals).toHaveBeenCalledWith(
        undefined,
        undefined,
      );
    });

    it('should map every hospital to a response DTO', async () => {
      mockRegistry.listHospitals.mockResolvedValue([sunrise]);

      const result = await service.findAll({ skip: 2, limit: 1 });

      expect(mockRegistry.listHospitals).toHaveBeenCalledWith(2, 1);
      expect(result).toHaveLength(1);
      expect(result[0].total_beds).toBe(100);
      expect(result[0].icu_beds).toBe(20);
    });
  });

  describe('findOne', () => {
    it('should return the mapped hospital', async () => {
      mockRegistry.getHospital.mockResolvedValue(sunrise);

      const result = await service.findOne(3);

      expect(mockRegistry.getHospital).toHaveBeenCalledWith(3);
      expect(result.id).toBe(3);
      expect(result.name).toBe('Sunrise Clinic');
    });

    it('should propagate not-found failures', async () => {
      mockRegistry.getHospital.mockRejectedValue(
        new HospitalNotFoundException(42),
      );

      await expect(service.findOne(42)).rejects.toThrow(
        'Hospital with ID 42 not found',
      );
    });
  });
});
