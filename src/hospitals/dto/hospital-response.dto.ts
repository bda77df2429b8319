import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';

export class HospitalResponseDto {
  @ApiProperty({ description: 'Hospital ID', example: 1 })
  @Expose()
  id!: number;

  @ApiProperty({ example: 'City General Hospital' })
  @Expose()
  name!: string;

  @ApiProperty({ example: 'Delhi' })
  @Expose()
  location!: string;

  @ApiProperty({ description: 'Total bed capacity', example: 250 })
  @Expose()
  total_beds!: number;

  @ApiProperty({ description: 'ICU-designated beds', example: 50 })
  @Expose()
  icu_beds!: number;
}
