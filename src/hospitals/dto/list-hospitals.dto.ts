import { IsInt, IsOptional } from 'class-validator';
import { Type } from 'class-transformer';
import { ApiPropertyOptional } from '@nestjs/swagger';

export class ListHospitalsDto {
  @ApiPropertyOptional({
    description: 'Number of records to skip',
    example: 0,
    default: 0,
  })
  @IsInt()
  @Type(() => Number)
  @IsOptional()
  skip?: number;

  @ApiPropertyOptional({
    description: 'Maximum number of records to return',
    example: 100,
    default: 100,
  })
  @IsInt()
  @Type(() => Number)
  @IsOptional()
  limit?: number;
}
