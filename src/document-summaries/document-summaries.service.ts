import { Injectable, Logger } from '@nestjs/common';
import { plainToClass } from 'class-transformer';
import {
  DocumentSummaryDomainService,
  FailedDocument,
} from './domain/services/document-summary.domain.service';
import { DocumentSummary } from './domain/entities/document-summary.entity';
import { SourceDocument } from './domain/entities/source-document.entity';
import { CreateSummaryDto } from './dto/create-summary.dto';
import { DocumentSummaryResponseDto } from './dto/document-summary-response.dto';
import { SummaryListQueryDto } from './dto/summary-list-query.dto';
import {
  MasterReportResponseDto,
  RunResultResponseDto,
} from './dto/run-result-response.dto';
import { SummaryValidationResponseDto } from './dto/summary-validation-response.dto';
import { InfinityPaginationResponseDto } from '../utils/dto/infinity-pagination-response.dto';
import { infinityPagination } from '../utils/infinity-pagination';
import { VectorPayload } from './utils/vector-payload';
import {
  parseSummaryMarkdown,
  validateSummaryMarkdown,
} from './utils/summary-markdown.parser';

/**
 * Application service between the HTTP/CLI surfaces and the domain.
 * Maps DTOs to domain inputs and domain records to response DTOs.
 */
@Injectable()
export class DocumentSummariesService {
  private readonly logger = new Logger(DocumentSummariesService.name);

  constructor(private readonly domainService: DocumentSummaryDomainService) {}

  async createSummary(
    dto: CreateSummaryDto,
  ): Promise<DocumentSummaryResponseDto> {
    const summary = await this.domainService.summarizeDocument(
      this.toSourceDocument(dto),
    );
    return this.toResponseDto(summary);
  }

  /**
   * @param preFailures Records rejected before validation passed (CLI input
   *   files that are unreadable or invalid); listed in the run report
   */
  async processBatch(
    records: CreateSummaryDto[],
    preFailures: FailedDocument[] = [],
  ): Promise<RunResultResponseDto> {
    this.logger.log(`[APP SERVICE] Processing batch of ${records.length}`);
    return this.domainService.processBatch(
      records.map((record) => this.toSourceDocument(record)),
      preFailures,
    );
  }

  async getSummary(id: string): Promise<DocumentSummaryResponseDto> {
    return this.toResponseDto(await this.domainService.getSummary(id));
  }

  async listSummaries(
    query: SummaryListQueryDto,
  ): Promise<InfinityPaginationResponseDto<DocumentSummaryResponseDto>> {
    const page = query.page ?? 1;
    const limit = query.limit ?? 20;

    const result = await this.domainService.listSummaries({
      skip: (page - 1) * limit,
      limit,
      status: query.status,
      documentType: query.documentType,
    });

    return infinityPagination(
      result.data.map((summary) => this.toResponseDto(summary)),
      result.total,
      { page, limit },
    );
  }

  getSummaryMarkdown(id: string): Promise<string> {
    return this.domainService.getSummaryMarkdown(id);
  }

  getVectorPayload(id: string): Promise<VectorPayload> {
    return this.domainService.getVectorPayload(id);
  }

  async reprocessSummary(id: string): Promise<DocumentSummaryResponseDto> {
    return this.toResponseDto(await this.domainService.reprocessSummary(id));
  }

  generateMasterReport(): Promise<MasterReportResponseDto> {
    return this.domainService.generateMasterReport();
  }

  validateMarkdown(markdown: string): SummaryValidationResponseDto {
    const issues = validateSummaryMarkdown(markdown);
    const parsed = parseSummaryMarkdown(markdown);

    return {
      valid: issues.length === 0,
      issues,
      documentType: parsed.documentType,
      sections: parsed.sections.map((section) => section.heading),
      imageCount: parsed.images.length,
    };
  }

  toSourceDocument(dto: CreateSummaryDto): SourceDocument {
    return {
      documentName: dto.documentName,
      pageCount: dto.pageCount,
      pages: dto.pages.map((page) => ({
        pageNumber: page.pageNumber,
        text: page.text,
      })),
      classification: {
        documentType: dto.classification.documentType,
        confidence: dto.classification.confidence,
      },
      images: (dto.images ?? []).map((image) => ({
        pageNumber: image.pageNumber,
        index: image.index,
        captionText: image.captionText,
        classificationTag: image.classificationTag,
      })),
    };
  }

  toResponseDto(summary: DocumentSummary): DocumentSummaryResponseDto {
    return plainToClass(DocumentSummaryResponseDto, summary, {
      excludeExtraneousValues: true,
    });
  }
}
