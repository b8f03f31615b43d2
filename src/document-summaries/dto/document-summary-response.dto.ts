import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { DocumentType } from '../domain/enums/document-type.enum';
import { ImageClassification } from '../domain/enums/image-classification.enum';
import { SummaryStatus } from '../domain/enums/summary-status.enum';
import {
  ChapterHeading,
  ClinicalTimeline,
  Diagnostics,
  ExtractedData,
  KeyConcept,
  PatientDemographics,
} from '../domain/entities/extracted-data.entity';

export class ExtractedImageDto {
  @ApiProperty()
  @Expose()
  pageNumber!: number;

  @ApiProperty()
  @Expose()
  index!: number;

  @ApiProperty()
  @Expose()
  captionText!: string;

  @ApiProperty({ enum: ImageClassification })
  @Expose()
  classificationTag!: ImageClassification;
}

export class DocumentSummaryResponseDto {
  @ApiProperty({ format: 'uuid' })
  @Expose()
  id!: string;

  @ApiProperty({ example: '3f2a9c1b7d4e', description: 'Prefix of chunk ids' })
  @Expose()
  documentKey!: string;

  @ApiProperty()
  @Expose()
  documentName!: string;

  @ApiProperty({ enum: DocumentType })
  @Expose()
  documentType!: DocumentType;

  @ApiProperty({ description: 'Classifier confidence as a fraction' })
  @Expose()
  confidence!: number;

  @ApiProperty({ enum: SummaryStatus })
  @Expose()
  status!: SummaryStatus;

  @ApiProperty()
  @Expose()
  pageCount!: number;

  @ApiPropertyOptional({ type: Object, nullable: true })
  @Expose()
  demographics?: PatientDemographics | null;

  @ApiPropertyOptional({ type: Object, nullable: true })
  @Expose()
  timeline?: ClinicalTimeline | null;

  @ApiPropertyOptional({ type: Object, nullable: true })
  @Expose()
  diagnostics?: Diagnostics | null;

  @ApiPropertyOptional({ type: [Object], nullable: true })
  @Expose()
  chapterStructure?: ChapterHeading[] | null;

  @ApiPropertyOptional({ type: [Object], nullable: true })
  @Expose()
  keyConcepts?: KeyConcept[] | null;

  @ApiPropertyOptional({
    type: Object,
    nullable: true,
    description: 'Type-specific extraction, discriminated by `strategy`',
  })
  @Expose()
  extractedData?: ExtractedData | null;

  @ApiProperty({ type: [ExtractedImageDto] })
  @Expose()
  extractedImages!: ExtractedImageDto[];

  @ApiProperty()
  @Expose()
  chunkCount!: number;

  @ApiProperty({ example: 'case_report_dengue_case' })
  @Expose()
  artifactFolder!: string;

  @ApiPropertyOptional({ nullable: true })
  @Expose()
  errorMessage?: string | null;

  @ApiPropertyOptional({ nullable: true })
  @Expose()
  processedAt?: Date | null;

  @ApiProperty()
  @Expose()
  createdAt!: Date;

  @ApiProperty()
  @Expose()
  updatedAt!: Date;

  // Never exposed: source text and storage paths
}
