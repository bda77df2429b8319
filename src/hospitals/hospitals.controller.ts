import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiCreatedResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
} from '@nestjs/swagger';
import { HospitalsService } from './hospitals.service';
import { CreateHospitalDto } from './dto/create-hospital.dto';
import { ListHospitalsDto } from './dto/list-hospitals.dto';
import { HospitalResponseDto } from './dto/hospital-response.dto';

@ApiTags('Hospitals')
@Controller('hospitals')
export class HospitalsController {
  constructor(private readonly hospitalsService: HospitalsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Create Hospital',
    description:
      'Register a new hospital. The ID is assigned by the registry; ICU beds may not exceed total beds.',
  })
  @ApiCreatedResponse({
    description: 'Hospital created',
    type: HospitalResponseDto,
  })
  @ApiBadRequestResponse({
    description: 'Invalid request body or ICU beds exceed total beds',
  })
  async create(@Body() dto: CreateHospitalDto): Promise<HospitalResponseDto> {
    return this.hospitalsService.create(dto);
  }

  @Get()
  @ApiOperation({
    summary: 'List Hospitals',
    description:
      'Return hospitals in insertion order. Skipping past the end returns an empty list.',
  })
  @ApiOkResponse({
    description: 'Page of hospitals',
    type: HospitalResponseDto,
    isArray: true,
  })
  async findAll(
    @Query() query: ListHospitalsDto,
  ): Promise<HospitalResponseDto[]> {
    return this.hospitalsService.findAll(query);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get Hospital' })
  @ApiParam({
    name: 'id',
    type: Number,
    description: 'Hospital ID',
    example: 1,
  })
  @ApiOkResponse({
    description: 'Hospital details',
    type: HospitalResponseDto,
  })
  @ApiNotFoundResponse({
    description: 'Hospital not found',
  })
  async findOne(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<HospitalResponseDto> {
    return this.hospitalsService.findOne(id);
  }
}
