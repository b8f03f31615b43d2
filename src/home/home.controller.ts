import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiOkResponse } from '@nestjs/swagger';

import { AppInfo, HomeService } from './home.service';
import { HealthService } from './health.service';
import { StorageHealth } from '../document-summaries/domain/ports/artifact-storage.port';

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
    description: 'Name, version and purpose of the API. Public endpoint.',
  })
  @ApiOkResponse({
    description: 'Application information',
    schema: {
      type: 'object',
      properties: {
        name: { type: 'string', example: 'Clinical Summary API' },
        version: { type: 'string', example: '1.0.0' },
        description: { type: 'string' },
      },
    },
  })
  appInfo(): AppInfo {
    return this.service.appInfo();
  }

  @Get('health/storage')
  @ApiOperation({
    summary: 'Artifact Storage Health Check',
    description:
      'Checks that the configured artifact storage (local directory or GCS bucket) is writable/accessible.',
  })
  @ApiOkResponse({
    description: 'Storage health status',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'healthy' },
        driver: { type: 'string', example: 'local' },
        location: { type: 'string', example: '/srv/summaries/output' },
        error: { type: 'string', nullable: true },
      },
    },
  })
  storageHealth(): Promise<StorageHealth> {
    return this.healthService.checkStorageHealth();
  }
}
