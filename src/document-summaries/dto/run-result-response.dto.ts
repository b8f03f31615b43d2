import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { DocumentType } from '../domain/enums/document-type.enum';

export class ProcessedDocumentDto {
  @ApiProperty({ format: 'uuid' })
  summaryId!: string;

  @ApiProperty()
  file!: string;

  @ApiProperty({ enum: DocumentType })
  type!: DocumentType;

  @ApiProperty()
  confidence!: number;

  @ApiProperty()
  folder!: string;

  @ApiProperty()
  chunks!: number;
}

export class FailedDocumentDto {
  @ApiPropertyOptional({
    format: 'uuid',
    description: 'Present when a FAILED summary was recorded',
  })
  summaryId?: string;

  @ApiProperty()
  file!: string;

  @ApiProperty({ description: 'Sanitized error message' })
  error!: string;
}

export class RunStatisticsDto {
  @ApiProperty()
  totalProcessed!: number;

  @ApiProperty({
    type: Object,
    example: { case_report: 2, textbook: 1 },
  })
  byType!: Partial<Record<DocumentType, number>>;

  @ApiProperty()
  totalFailed!: number;
}

export class MasterReportResponseDto {
  @ApiProperty({ example: 'output/MASTER_REPORT.md' })
  markdownLocation!: string;

  @ApiProperty({ example: 'output/document_index.json' })
  indexLocation!: string;

  @ApiProperty({ type: RunStatisticsDto })
  statistics!: RunStatisticsDto;
}

export class RunResultResponseDto {
  @ApiProperty({ type: [ProcessedDocumentDto] })
  processed!: ProcessedDocumentDto[];

  @ApiProperty({ type: [FailedDocumentDto] })
  failed!: FailedDocumentDto[];

  @ApiProperty({ type: MasterReportResponseDto })
  report!: MasterReportResponseDto;
}
