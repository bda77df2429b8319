import { IsInt, IsNotEmpty, IsString, Min } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class CreateHospitalDto {
  @ApiProperty({ example: 'Sunrise Clinic' })
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiProperty({ example: 'Pune' })
  @IsString()
  @IsNotEmpty()
  location!: string;

  @ApiProperty({
    description: 'Total bed capacity',
    example: 100,
    minimum: 0,
  })
  @IsInt()
  @Min(0)
  total_beds!: number;

  @ApiProperty({
    description: 'ICU-designated beds (may not exceed total_beds)',
    example: 20,
    minimum: 0,
  })
  @IsInt()
  @Min(0)
  icu_beds!: number;
}
