import {
  Body,
  Controller,
  Get,
  Header,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { Throttle } from '@nestjs/throttler';
import {
  ApiBadRequestResponse,
  ApiBearerAuth,
  ApiConflictResponse,
  ApiCreatedResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiProduces,
  ApiTags,
  ApiTooManyRequestsResponse,
  ApiUnauthorizedResponse,
  ApiUnprocessableEntityResponse,
} from '@nestjs/swagger';
import { DocumentSummariesService } from './document-summaries.service';
import { CreateSummaryDto } from './dto/create-summary.dto';
import { ProcessBatchDto } from './dto/process-batch.dto';
import { ValidateSummaryDto } from './dto/validate-summary.dto';
import { SummaryListQueryDto } from './dto/summary-list-query.dto';
import { DocumentSummaryResponseDto } from './dto/document-summary-response.dto';
import { RunResultResponseDto } from './dto/run-result-response.dto';
import { SummaryValidationResponseDto } from './dto/summary-validation-response.dto';
import {
  InfinityPaginationResponse,
  InfinityPaginationResponseDto,
} from '../utils/dto/infinity-pagination-response.dto';
import { ServiceApiKeyGuard } from '../auth/guards/service-api-key.guard';
import { VectorPayload } from './utils/vector-payload';

const SUMMARY_ID_PARAM = {
  name: 'id',
  type: String,
  format: 'uuid',
  description: 'Summary UUID',
  example: '123e4567-e89b-12d3-a456-426614174000',
};

/**
 * Document Summaries Controller
 *
 * HIPAA Compliance:
 * - Writes require the service API key
 * - Ingest endpoints are rate limited
 * - Source text and storage paths are never returned
 */
@ApiTags('Document Summaries')
@Controller({ path: 'summaries', version: '1' })
export class DocumentSummariesController {
  constructor(private readonly summariesService: DocumentSummariesService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @UseGuards(ServiceApiKeyGuard)
  @ApiBearerAuth()
  @Throttle({ default: { limit: 20, ttl: 60000 } }) // 20 records per minute
  @ApiOperation({
    summary: 'Summarize an extraction record',
    description:
      'Runs type-specific extraction, chunking and Markdown rendering, and writes the summary artifacts.',
  })
  @ApiCreatedResponse({ type: DocumentSummaryResponseDto })
  @ApiBadRequestResponse({ description: 'Invalid extraction record' })
  @ApiUnauthorizedResponse({ description: 'Missing or invalid service API key' })
  @ApiUnprocessableEntityResponse({
    description: 'Summary recorded as FAILED',
  })
  @ApiTooManyRequestsResponse({ description: 'Too many requests' })
  createSummary(
    @Body() dto: CreateSummaryDto,
  ): Promise<DocumentSummaryResponseDto> {
    return this.summariesService.createSummary(dto);
  }

  @Post('batch')
  @HttpCode(HttpStatus.CREATED)
  @UseGuards(ServiceApiKeyGuard)
  @ApiBearerAuth()
  @Throttle({ default: { limit: 5, ttl: 60000 } })
  @ApiOperation({
    summary: 'Process a run of extraction records',
    description:
      'Records are processed in order; failures are listed and the run continues. Ends by writing the master report.',
  })
  @ApiCreatedResponse({ type: RunResultResponseDto })
  @ApiBadRequestResponse({ description: 'Invalid records or batch too large' })
  @ApiUnauthorizedResponse({ description: 'Missing or invalid service API key' })
  @ApiTooManyRequestsResponse({ description: 'Too many requests' })
  processBatch(@Body() dto: ProcessBatchDto): Promise<RunResultResponseDto> {
    return this.summariesService.processBatch(dto.records);
  }

  @Post('validate')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Validate a Markdown summary',
    description: 'Reports structural issues in the summary header.',
  })
  @ApiOkResponse({ type: SummaryValidationResponseDto })
  validateSummary(
    @Body() dto: ValidateSummaryDto,
  ): SummaryValidationResponseDto {
    return this.summariesService.validateMarkdown(dto.markdown);
  }

  @Get()
  @ApiOperation({ summary: 'List summaries, newest first' })
  @ApiOkResponse({ type: InfinityPaginationResponse(DocumentSummaryResponseDto) })
  listSummaries(
    @Query() query: SummaryListQueryDto,
  ): Promise<InfinityPaginationResponseDto<DocumentSummaryResponseDto>> {
    return this.summariesService.listSummaries(query);
  }

  @Get(':id')
  @ApiParam(SUMMARY_ID_PARAM)
  @ApiOperation({ summary: 'Get a summary' })
  @ApiOkResponse({ type: DocumentSummaryResponseDto })
  @ApiNotFoundResponse({ description: 'Summary not found' })
  getSummary(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<DocumentSummaryResponseDto> {
    return this.summariesService.getSummary(id);
  }

  @Get(':id/markdown')
  @Header('Content-Type', 'text/markdown; charset=utf-8')
  @ApiParam(SUMMARY_ID_PARAM)
  @ApiProduces('text/markdown')
  @ApiOperation({ summary: 'Get the Markdown summary' })
  @ApiOkResponse({ description: 'Markdown document', type: String })
  @ApiNotFoundResponse({ description: 'Summary not found' })
  @ApiConflictResponse({ description: 'Summary has not been generated' })
  getSummaryMarkdown(@Param('id', ParseUUIDPipe) id: string): Promise<string> {
    return this.summariesService.getSummaryMarkdown(id);
  }

  @Get(':id/chunks')
  @ApiParam(SUMMARY_ID_PARAM)
  @ApiOperation({
    summary: 'Get the vector payload',
    description: 'Text and image chunks ready for embedding.',
  })
  @ApiOkResponse({ description: 'Vector payload' })
  @ApiNotFoundResponse({ description: 'Summary not found' })
  @ApiConflictResponse({ description: 'Summary has not been generated' })
  getVectorPayload(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<VectorPayload> {
    return this.summariesService.getVectorPayload(id);
  }

  @Post(':id/reprocess')
  @HttpCode(HttpStatus.OK)
  @UseGuards(ServiceApiKeyGuard)
  @ApiBearerAuth()
  @ApiParam(SUMMARY_ID_PARAM)
  @ApiOperation({
    summary: 'Re-run extraction',
    description: 'Allowed for SUMMARIZED and FAILED summaries.',
  })
  @ApiOkResponse({ type: DocumentSummaryResponseDto })
  @ApiBadRequestResponse({ description: 'Summary cannot be reprocessed' })
  @ApiNotFoundResponse({ description: 'Summary not found' })
  @ApiUnprocessableEntityResponse({
    description: 'Summary recorded as FAILED',
  })
  reprocessSummary(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<DocumentSummaryResponseDto> {
    return this.summariesService.reprocessSummary(id);
  }
}
