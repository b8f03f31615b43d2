import {
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiCreatedResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { DocumentSummariesService } from './document-summaries.service';
import { MasterReportResponseDto } from './dto/run-result-response.dto';
import { ServiceApiKeyGuard } from '../auth/guards/service-api-key.guard';

@ApiTags('Reports')
@Controller({ path: 'reports', version: '1' })
@UseGuards(ServiceApiKeyGuard)
@ApiBearerAuth()
export class ReportsController {
  constructor(private readonly summariesService: DocumentSummariesService) {}

  @Post('master')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Write the master report',
    description:
      'Writes MASTER_REPORT.md and document_index.json over every stored summary.',
  })
  @ApiCreatedResponse({ type: MasterReportResponseDto })
  @ApiUnauthorizedResponse({ description: 'Missing or invalid service API key' })
  generateMasterReport(): Promise<MasterReportResponseDto> {
    return this.summariesService.generateMasterReport();
  }
}
