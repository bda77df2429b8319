import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiOkResponse } from '@nestjs/swagger';

import { HomeService } from './home.service';
import { HealthService } from './health.service';

@ApiTags('Home')
@Controller()
export class HomeController {
  constructor(
    private service: HomeService,
    private healthService: HealthService,
  ) {}

  @Get()
  @ApiOperation({
    summary: 'Get Application Information',
    description: 'Get the API name and version. This is a public endpoint.',
  })
  @ApiOkResponse({
    description: 'Application information',
    schema: {
      type: 'object',
      properties: {
        name: { type: 'string', example: 'Hospital Registry API' },
        version: { type: 'string', example: '1.0.0' },
      },
    },
  })
  appInfo() {
    return this.service.appInfo();
  }

  @Get('health')
  @ApiOperation({
    summary: 'Health Check',
    description: 'Report service status and the number of stored hospitals.',
  })
  @ApiOkResponse({
    description: 'Health status',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'ok' },
        hospitals: { type: 'number', example: 2 },
      },
    },
  })
  async health() {
    return this.healthService.check();
  }
}
